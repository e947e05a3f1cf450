export const PARLEY_PROTOCOL_PACKAGE = '@parley/protocol';

export {
  AckReadFrameSchema,
  ChatFrameSchema,
  HeartbeatFrameSchema,
  InboundFrameSchema,
  MAX_ROW_ID,
  MessageIdSchema,
  OfflineMessageFrameSchema,
  OutboundFrameSchema,
  parseInboundFrame,
  type AckReadFrame,
  type ChatFrame,
  type HeartbeatFrame,
  type InboundFrame,
  type InboundFrameType,
  type OfflineMessageFrame,
  type OutboundFrame,
} from './frames.js';
export { HANDSHAKE_ERRORS, SOCKET_EVENTS, UPDATES_SOCKET_PATH, type SocketEvent } from './events.js';
