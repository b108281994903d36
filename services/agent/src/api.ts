import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { timingSafeEqual } from 'node:crypto';
import { trace } from '@opentelemetry/api';
import { logger, type StreamEvent } from '@toolloop/shared';
import type { Agent } from './agent.js';
import { streamAgent } from './stream.js';

const log = logger.child({ module: 'api' });

export interface ApiDeps {
  /** Build a fresh agent for one prompt session */
  createAgent(): Promise<Agent>;
  startTime?: number;
  /** Aborting it cancels every in-flight run and refuses new prompts */
  shutdownSignal?: AbortSignal;
}

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Health checks bypass auth
  if (req.path === '/ping') {
    next();
    return;
  }

  const configuredToken = process.env.AUTH_TOKEN;
  if (!configuredToken) {
    next();
    return;
  }

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'unauthorized' });
    return;
  }

  if (!safeCompare(authHeader.slice(7), configuredToken)) {
    res.status(401).json({ error: 'unauthorized' });
    return;
  }

  next();
}

function writeEvent(res: Response, event: StreamEvent): void {
  res.write(`data: ${JSON.stringify(event)}\n\n`);
}

export function createApi(deps: ApiDeps) {
  const startTime = deps.startTime ?? Date.now();
  let activeSessions = 0;

  const app = express();
  app.use(express.json());

  // Trace ID header middleware
  app.use((_req, res, next) => {
    const span = trace.getActiveSpan();
    if (span) {
      res.setHeader('X-Trace-Id', span.spanContext().traceId);
    }
    next();
  });

  app.use(authMiddleware);

  app.get('/ping', (_req, res) => {
    res.json({ status: 'ok', uptime: Date.now() - startTime, activeSessions });
  });

  app.post('/api/v1/prompt', async (req, res) => {
    const body: unknown = req.body;
    const prompt = typeof body === 'object' && body !== null && 'prompt' in body ? body.prompt : undefined;

    if (!prompt || typeof prompt !== 'string') {
      res.status(400).json({ error: 'prompt is required and must be a string' });
      return;
    }

    if (deps.shutdownSignal?.aborted) {
      res.status(503).json({ error: 'shutting down' });
      return;
    }

    log.info({ prompt: prompt.slice(0, 200) }, 'prompt stream request');

    const run = new AbortController();
    const onShutdown = () => run.abort();
    deps.shutdownSignal?.addEventListener('abort', onShutdown, { once: true });

    let clientGone = false;
    res.on('close', () => {
      if (!res.writableEnded) {
        clientGone = true;
        log.info('client disconnected before the stream finished');
        run.abort();
      }
    });

    activeSessions++;
    try {
      const agent = await deps.createAgent();

      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      // Leaving the loop early closes the stream, which runs agent cleanup
      for await (const event of streamAgent(agent, prompt, run.signal)) {
        if (clientGone) break;
        writeEvent(res, event);
      }

      res.end();
    } catch (err) {
      log.error({ err }, 'prompt stream error');
      if (!res.headersSent) {
        res.status(500).json({ error: 'internal server error' });
      } else {
        writeEvent(res, { type: 'error', error: 'internal server error' });
        res.end();
      }
    } finally {
      deps.shutdownSignal?.removeEventListener('abort', onShutdown);
      activeSessions--;
    }
  });

  return app;
}
