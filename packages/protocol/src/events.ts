export const UPDATES_SOCKET_PATH = '/v1/updates';

export const SOCKET_EVENTS = {
  message: 'message',
  ping: 'ping',
  pong: 'pong',
  error: 'error',
} as const;

export type SocketEvent = (typeof SOCKET_EVENTS)[keyof typeof SOCKET_EVENTS];

export const HANDSHAKE_ERRORS = {
  missingToken: 'Missing authentication token',
  invalidToken: 'Invalid authentication token',
} as const;
