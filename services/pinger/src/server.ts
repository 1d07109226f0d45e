import express from 'express';
import type { NextFunction, Request, Response, ErrorRequestHandler, RequestHandler } from 'express';
import { z } from 'zod';
import { DATA_RANGES, DATA_RANGE_NAMES, buildDashboard } from './dashboard';
import { createLogger } from './logger';
import { METRICS_CONTENT_TYPE, renderMetrics } from './metrics';
import type { PingEngine } from './engine';
import type { DisconnectRecord, SnapshotRecord } from './db';
import type { QueryStore } from './writers/store';

const logger = createLogger('HTTP');

export interface AppOptions {
  engine: PingEngine;
  store: QueryStore;
  /** Clear metrics after each scrape; otherwise /metrics only peeks */
  drainOnScrape?: boolean;
  now?: () => number;
}

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
  }
}

const dataQuerySchema = z.object({
  range: z.enum(DATA_RANGE_NAMES).default('24h'),
});

const disconnectsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function serializeSnapshot(row: SnapshotRecord) {
  return {
    target_name: row.targetName,
    host: row.host,
    total_pings: row.totalPings,
    successful_pings: row.successfulPings,
    failed_pings: row.failedPings,
    success_rate: row.successRate,
    avg_response_time: row.avgResponseTime,
    min_response_time: row.minResponseTime,
    max_response_time: row.maxResponseTime,
    last_status: row.lastStatus,
    timestamp: row.timestamp.getTime(),
  };
}

function serializeDisconnect(row: DisconnectRecord) {
  return {
    target_name: row.targetName,
    host: row.host,
    start_time: row.startTime.getTime(),
    end_time: row.endTime ? row.endTime.getTime() : null,
    disconnect_count: row.disconnectCount,
    duration_ms: row.endTime ? row.endTime.getTime() - row.startTime.getTime() : null,
  };
}

export function createApp(options: AppOptions): express.Express {
  const { engine, store } = options;
  const drainOnScrape = options.drainOnScrape ?? true;
  const now = options.now ?? Date.now;
  const app = express();

  app.disable('x-powered-by');

  app.get('/metrics', (_req, res) => {
    const snapshot = drainOnScrape ? engine.metrics.drain() : engine.metrics.peek();
    res.setHeader('Content-Type', METRICS_CONTENT_TYPE);
    res.status(200).send(renderMetrics(snapshot));
  });

  app.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        running: engine.isRunning,
        targets: engine.targets.length,
      },
    });
  });

  app.get('/api/targets', (_req, res) => {
    res.json({
      success: true,
      data: engine.views().map((view) => ({
        name: view.target.name,
        host: view.target.host,
        interval_ms: view.target.intervalMs,
        timeout_ms: view.target.timeoutMs,
        state: view.stats.currentState,
        ping_count: view.stats.pingCount,
        success_count: view.stats.successCount,
        failure_count: view.stats.failureCount,
        success_rate: view.successRate,
        min_rt: view.stats.minRt,
        max_rt: view.stats.maxRt,
        avg_rt: view.stats.avgRt,
        last_result_at: view.stats.lastResultAt,
        open_disconnect: view.openEvent
          ? {
              start_time: view.openEvent.startTime,
              consecutive_failures: view.openEvent.consecutiveFailureCount,
            }
          : null,
      })),
    });
  });

  app.get(
    '/api/data',
    asyncHandler(async (req, res) => {
      const parsed = dataQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new HttpError(400, 'VALIDATION_ERROR', parsed.error.issues[0].message);
      }

      const range = parsed.data.range;
      const span = DATA_RANGES[range];
      const since = new Date(now() - span.windowMs);

      const [summaries, disconnects, series] = await Promise.all([
        store.summarizeRange(since),
        store.summarizeDisconnects(since),
        store.responseTimeSeries(since, span.bucketSeconds),
      ]);

      res.json({
        success: true,
        data: buildDashboard({ range, since, views: engine.views(), summaries, disconnects, series }),
      });
    })
  );

  app.get(
    '/api/statistics/:target',
    asyncHandler(async (req, res) => {
      const name = req.params.target;
      if (!engine.view(name)) {
        throw new HttpError(404, 'NOT_FOUND', `Unknown target ${name}`);
      }

      const row = await store.latestSnapshot(name);
      if (!row) {
        throw new HttpError(404, 'NOT_FOUND', `No statistics found for ${name}`);
      }
      res.json({ success: true, data: serializeSnapshot(row) });
    })
  );

  app.get(
    '/api/disconnects/:target',
    asyncHandler(async (req, res) => {
      const name = req.params.target;
      if (!engine.view(name)) {
        throw new HttpError(404, 'NOT_FOUND', `Unknown target ${name}`);
      }

      const parsed = disconnectsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new HttpError(400, 'VALIDATION_ERROR', parsed.error.issues[0].message);
      }

      const rows = await store.listDisconnects(name, parsed.data.limit);
      res.json({
        success: true,
        data: {
          target_name: name,
          disconnect_count: rows.length,
          disconnects: rows.map(serializeDisconnect),
        },
      });
    })
  );

  app.use((req, _res, next) => {
    next(new HttpError(404, 'NOT_FOUND', `No route for ${req.method} ${req.path}`));
  });

  const errorHandler: ErrorRequestHandler = (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction
  ) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof HttpError) {
      res.status(error.status).json({
        success: false,
        error: { code: error.code, message: error.message },
      });
      return;
    }

    logger.error(`${req.method} ${req.path} failed:`, error);
    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message:
          process.env.NODE_ENV === 'production'
            ? 'An unexpected error occurred'
            : error instanceof Error
              ? error.message
              : String(error),
      },
    });
  };

  app.use(errorHandler);

  return app;
}
