import client from 'prom-client';

// Default process metrics (memory, CPU, event loop, etc.)
client.collectDefaultMetrics({
  labels: { app: 'reversal-scanner' },
});

export const scanDurationSeconds = new client.Histogram({
  name: 'scan_duration_seconds',
  help: 'Wall-clock duration of a full scan run',
  labelNames: ['status'],
  buckets: [1, 5, 15, 30, 60, 120, 300, 600],
});

export const scanSymbolOutcomesTotal = new client.Counter({
  name: 'scan_symbol_outcomes_total',
  help: 'Per-symbol scan outcomes',
  labelNames: ['outcome'],
});

export const historySourceTotal = new client.Counter({
  name: 'price_history_source_total',
  help: 'Which tier of the fallback chain supplied price history',
  labelNames: ['source'],
});

export const activeScanGauge = new client.Gauge({
  name: 'scan_active',
  help: '1 while a scan is running',
});

export const metricsRegistry = client.register;

export const httpRequestsTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'HTTP responses by method, route and status code',
  labelNames: ['method', 'route', 'status'],
});
