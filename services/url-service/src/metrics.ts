import client from "prom-client";

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

const HTTP_LABELS = ["method", "route", "status_code"] as const;
type HttpLabels = Record<(typeof HTTP_LABELS)[number], string>;

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "HTTP requests served, by route template",
  labelNames: HTTP_LABELS,
  registers: [registry],
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "Time from request arrival to response, in seconds",
  labelNames: HTTP_LABELS,
  // redirects and lookups sit in the low milliseconds
  buckets: [0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 1],
  registers: [registry],
});

/** Unmatched requests are labelled "unmatched" so arbitrary paths cannot blow up cardinality. */
export function observeHttpRequest(
  method: string,
  route: string | undefined,
  statusCode: number,
  elapsedMs: number
): HttpLabels {
  const labels: HttpLabels = {
    method,
    route: route ?? "unmatched",
    status_code: String(statusCode),
  };
  httpRequestsTotal.inc(labels);
  httpRequestDurationSeconds.observe(labels, elapsedMs / 1000);
  return labels;
}

export const urlsCreatedTotal = new client.Counter({
  name: "urls_created_total",
  help: "Short URLs created",
  registers: [registry],
});

export const redirectsTotal = new client.Counter({
  name: "redirects_total",
  help: "Short code lookups on the redirect path",
  labelNames: ["result"] as const,
  registers: [registry],
});

// Submitted fire-and-forget work (access increments) not yet settled
export const backgroundTasksPending = new client.Gauge({
  name: "background_tasks_pending",
  help: "Background tasks submitted but not yet settled",
  registers: [registry],
});

export const backgroundTaskFailuresTotal = new client.Counter({
  name: "background_task_failures_total",
  help: "Background tasks that rejected",
  labelNames: ["task"] as const,
  registers: [registry],
});
