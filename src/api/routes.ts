/**
 * HTTP routes for the limbic core service.
 *
 * The only write is POST /v1/core/stimulus, which goes through the
 * input channel like any other stimulus. Everything else reads.
 */

import { Router, Request, Response } from 'express';
import { InputError } from '../core/errors';
import { InputChannel } from '../consciousness/input';
import { CoreHandle } from '../consciousness/core-handle';
import { LifeLoop } from '../consciousness/loop';
import { SnapshotLog } from '../memory/snapshot-log';

export type Stimulus =
  | { kind: 'signal'; signal: number }
  | { kind: 'text'; text: string };

/**
 * Accepts `{ signal: number }` or `{ text: string }`, nothing else.
 * @returns The stimulus, or an error message for a 400 response.
 */
export function parseStimulus(body: unknown): Stimulus | { error: string } {
  if (typeof body !== 'object' || body === null) {
    return { error: 'Body must be a JSON object' };
  }
  const { signal, text }: Record<string, unknown> = { ...body };

  if (signal !== undefined && text !== undefined) {
    return { error: 'Provide either "signal" or "text", not both' };
  }
  if (signal !== undefined) {
    if (typeof signal !== 'number' || !Number.isFinite(signal)) {
      return { error: '"signal" must be a finite number' };
    }
    return { kind: 'signal', signal };
  }
  if (text !== undefined) {
    if (typeof text !== 'string' || text.trim().length === 0) {
      return { error: '"text" must be a non-empty string' };
    }
    return { kind: 'text', text };
  }
  return { error: 'Missing "signal" or "text" field' };
}

/** Positive integer query parameter, capped; fallback otherwise */
export function parseLimit(value: unknown, fallback: number, max: number = 1000): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) return fallback;
  return Math.min(parsed, max);
}

export interface CoreRouteDeps {
  handle: CoreHandle;
  input: InputChannel;
  loop: LifeLoop;
  log: SnapshotLog;
}

export function createCoreRouter({ handle, input, loop, log }: CoreRouteDeps): Router {
  const router = Router();

  router.get('/v1/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      running: loop.isRunning(),
      tick: handle.tickCount,
      sessionId: log.sessionId,
      persistence: log.getStats(),
    });
  });

  router.get('/v1/core', (_req: Request, res: Response) => {
    res.json({
      snapshot: handle.peek(),
      life: loop.getStatus(),
      input: input.getStats(),
    });
  });

  router.post('/v1/core/stimulus', async (req: Request, res: Response) => {
    const stimulus = parseStimulus(req.body);
    if ('error' in stimulus) {
      res.status(400).json({ error: stimulus.error });
      return;
    }

    try {
      const snapshot = stimulus.kind === 'signal'
        ? await input.submit(stimulus.signal)
        : await input.submitText(stimulus.text);
      res.json({ snapshot });
    } catch (err) {
      if (err instanceof InputError) {
        res.status(400).json({ error: err.message, code: err.code });
        return;
      }
      console.error('  [core] Stimulus error:', err);
      res.status(500).json({ error: 'Stimulus failed' });
    }
  });

  router.get('/v1/core/snapshots', (req: Request, res: Response) => {
    const snapshots = log.getRecent(parseLimit(req.query.limit, 50));
    res.json({ snapshots, count: snapshots.length });
  });

  router.get('/v1/core/awareness', (req: Request, res: Response) => {
    const events = log.getAwarenessEvents(parseLimit(req.query.limit, 20));
    res.json({ events, count: events.length });
  });

  router.get('/v1/core/export', (req: Request, res: Response) => {
    const session = typeof req.query.session === 'string' ? req.query.session : log.sessionId;
    const records = log.exportTrainingRecords(session);
    res.json({ sessionId: session, records, count: records.length });
  });

  return router;
}
