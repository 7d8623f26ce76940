import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * IMPORTANT NOTE:
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records TRUE milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'prescreen_runtime_';

// Default node/process metrics
client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// Time spent in one conversation stage, from activation to hand-off or end
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Conversation stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [1000, 5000, 10000, 30000, 60000, 120000, 300000, 600000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Unexpected errors raised inside a conversation stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const toolCallsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tool_calls_total`,
  help: 'Tool calls received from the model, by responder kind and outcome',
  labelNames: ['responder', 'outcome'] as const,
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Calls currently held by this process',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls completed (teardown)',
  labelNames: ['status', 'reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of candidate turns per call',
  buckets: [0, 1, 2, 3, 5, 10, 20, 40],
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath =
    typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
      ? route.path
      : undefined;

  if (routePath) return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

// ---------- exports used by server ----------

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      const durationMs = nsToMs(nowNs() - start);
      httpRequestDurationMs.observe(
        {
          method: req.method,
          route: getRouteLabel(req),
          code: String(res.statusCode),
        },
        durationMs,
      );
    } catch {
      // never break requests due to metrics
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

// ---------- conversation API ----------

/**
 * Starts a stage timer and returns an end() function.
 * Records TRUE milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();

  return () => {
    try {
      stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
    } catch {
      // swallow
    }
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export type ToolCallOutcome = 'handled' | 'stale_agent' | 'call_ended';

/** `responder` is the agent kind (`greeting`, `knockout`, ...), never a per-call id. */
export function incToolCall(responder: string, outcome: ToolCallOutcome): void {
  toolCallsTotal.inc({ responder, outcome });
}

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

/** Record per-call metrics at teardown */
export function recordCallMetrics(opts: {
  status?: string;
  reason?: string;
  durationMs: number;
  turns: number;
}): void {
  try {
    callCompletionsTotal.inc({ status: opts.status ?? 'unknown', reason: opts.reason ?? 'unknown' });
    callDurationSeconds.observe(opts.durationMs / 1000);
    callTurns.observe(opts.turns);
  } catch {
    // swallow
  }
}
