import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export const metricsRegistry = new Registry();

export function enableDefaultMetrics(): void {
    collectDefaultMetrics({ register: metricsRegistry });
}

export const websocketConnectionsGauge = new Gauge({
    name: 'parley_websocket_connections',
    help: 'Live connections currently registered',
    registers: [metricsRegistry],
});

export const websocketEventsCounter = new Counter({
    name: 'parley_websocket_events_total',
    help: 'Websocket events by type',
    labelNames: ['event_type'] as const,
    registers: [metricsRegistry],
});

export const deliveriesCounter = new Counter({
    name: 'parley_deliveries_total',
    help: 'Chat frame deliveries by outcome',
    labelNames: ['outcome'] as const,
    registers: [metricsRegistry],
});

export const cacheLookupsCounter = new Counter({
    name: 'parley_cache_lookups_total',
    help: 'Cache lookups by cache and result',
    labelNames: ['cache', 'result'] as const,
    registers: [metricsRegistry],
});

export const fastStoreFailuresCounter = new Counter({
    name: 'parley_fast_store_failures_total',
    help: 'Swallowed fast store failures by component',
    labelNames: ['component', 'operation'] as const,
    registers: [metricsRegistry],
});

export const backgroundJobsCounter = new Counter({
    name: 'parley_background_jobs_total',
    help: 'Best-effort background jobs by result',
    labelNames: ['job', 'result'] as const,
    registers: [metricsRegistry],
});

export const httpRequestsCounter = new Counter({
    name: 'parley_http_requests_total',
    help: 'HTTP requests by route and status',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [metricsRegistry],
});
