// HTTP + SSE gateway
//
//   POST /run              {topic, include_voice?} → {run_id}
//   GET  /stream/:runId    text/event-stream (?from=N or Last-Event-ID)
//   GET  /runs             retained run summaries
//   GET  /runs/:runId      run snapshot
//   GET  /health

import type { Server } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { MarketIntelError, errorMessage } from '../types/errors.js';
import type { MarketIntelService } from '../orchestrator/service.js';
import type { RunSubscription } from '../gateway/event-stream.js';
import { SSE_HEADERS, SSE_KEEPALIVE, formatSseEvent, resolveFromSequence } from '../gateway/sse.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface AppOptions {
  /** Default for requests that omit include_voice */
  includeVoiceDefault?: boolean;
  keepAliveMs?: number;
  logger?: Logger;
}

const RunRequestSchema = z.object({
  topic: z.string({ required_error: 'topic is required', invalid_type_error: 'topic must be a string' }),
  include_voice: z.boolean().optional(),
  includeVoice: z.boolean().optional(),
});

export function statusForError(err: unknown): number {
  if (err instanceof MarketIntelError) {
    if (err.kind === 'InvalidInput') return 400;
    if (err.kind === 'NotFound') return 404;
    return 500;
  }
  // body-parser errors carry their own 4xx status (400, 413, 415)
  return clientStatusOf(err) ?? 500;
}

function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(service: MarketIntelService, options: AppOptions = {}): express.Express {
  const includeVoiceDefault = options.includeVoiceDefault ?? true;
  const keepAliveMs = options.keepAliveMs ?? 15_000;
  const logger = options.logger ?? createLogger('HTTP');

  const app = express();

  // Any content type is read as JSON
  app.post('/run', express.json({ type: () => true, limit: '16kb' }), (req: Request, res: Response, next: NextFunction) => {
    const parsed = RunRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues.map(i => i.message).join('; ') });
      return;
    }
    const { topic, include_voice, includeVoice } = parsed.data;
    try {
      const runId = service.submit(topic, include_voice ?? includeVoice ?? includeVoiceDefault);
      res.json({ run_id: runId });
    } catch (err) {
      next(err);
    }
  });

  app.get('/stream/:runId', (req: Request, res: Response, next: NextFunction) => {
    let subscription: RunSubscription;
    try {
      const from = resolveFromSequence(req.query.from, req.get('Last-Event-ID'));
      subscription = service.subscribe(req.params.runId, from);
    } catch (err) {
      next(err);
      return;
    }

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const keepalive = setInterval(() => {
      if (!res.writableEnded) res.write(SSE_KEEPALIVE);
    }, keepAliveMs);

    // Client went away: detach only, the run keeps going
    res.on('close', () => {
      clearInterval(keepalive);
      subscription.close();
    });

    const pump = async (): Promise<void> => {
      try {
        for await (const event of subscription.events()) {
          if (res.writableEnded) break;
          res.write(formatSseEvent(event));
        }
      } finally {
        clearInterval(keepalive);
        subscription.close();
        if (!res.writableEnded) res.end();
      }
    };

    pump().catch((err) => {
      logger.error('Stream failed', { runId: req.params.runId, error: errorMessage(err) });
    });
  });

  app.get('/runs', (_req: Request, res: Response) => {
    res.json({ runs: service.listRuns() });
  });

  app.get('/runs/:runId', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(service.getRun(req.params.runId));
    } catch (err) {
      next(err);
    }
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', runs: service.registry.size });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);
    const message = err instanceof SyntaxError ? 'Invalid JSON body' : errorMessage(err);
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path, error: message });
    } else {
      logger.debug('Request rejected', { method: req.method, path: req.path, status, error: message });
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({ error: message });
  });

  return app;
}

export interface ServerOptions extends AppOptions {
  port: number;
  host?: string;
}

/** Listen and resolve once the port is bound */
export function startServer(service: MarketIntelService, options: ServerOptions): Promise<Server> {
  const logger = options.logger ?? createLogger('HTTP');
  const app = createApp(service, { ...options, logger });

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host ?? '0.0.0.0', () => {
      logger.info('Listening', { host: options.host ?? '0.0.0.0', port: options.port });
      resolve(server);
    });
    server.once('error', reject);
  });
}
