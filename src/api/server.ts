/**
 * Gift Card Empire API Server
 *
 * Hono-based command/snapshot surface for a display layer. Commands are
 * queued on the engine and answered once the next tick has applied them.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import { createSaveId } from '../types.js';
import { loadServerConfig, type ServerConfig } from '../config.js';
import { SaveFormatError } from '../errors.js';
import { SimulationEngine } from '../simulation/engine.js';
import { startHostLoop } from '../simulation/host-loop.js';
import { isRecord } from '../utils/guards.js';
import { createSaveStore, type SaveStore } from '../storage/sqlite.js';
import { parseCommand, statusForFailure } from './commands.js';

// =============================================================================
// APP SETUP
// =============================================================================

export interface AppContext {
  engine: SimulationEngine;
  saves: SaveStore;
}

const DEFAULT_ACTIVITY_LIMIT = 20;

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  // ===========================================================================
  // GAME ROUTES
  // ===========================================================================

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.get('/api/snapshot', (c) => {
    return c.json(ctx.engine.snapshot());
  });

  app.get('/api/activity', (c) => {
    const raw = c.req.query('limit');
    const limit = raw === undefined ? DEFAULT_ACTIVITY_LIMIT : Number.parseInt(raw, 10);
    if (!Number.isInteger(limit) || limit < 0) {
      return c.json({ error: 'limit must be a non-negative integer' }, 400);
    }
    return c.json({ activity: ctx.engine.activityTail(limit) });
  });

  app.post('/api/commands', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const parsed = parseCommand(body);
    if (!parsed.ok) {
      return c.json({ error: parsed.error }, 400);
    }

    try {
      const result = await ctx.engine.submit(parsed.value);
      if (!result.ok) {
        return c.json({ error: result.error.message, kind: result.error.kind }, statusForFailure(result.error.kind));
      }
      return c.json({ outcome: result.outcome, version: ctx.engine.snapshot().version });
    } catch (error) {
      console.error('[Server] Command failed:', error);
      return c.json({ error: 'Command could not be applied' }, 500);
    }
  });

  // ===========================================================================
  // SAVE ROUTES
  // ===========================================================================

  app.get('/api/saves', async (c) => {
    try {
      const saves = await ctx.saves.listSaves();
      return c.json({ saves });
    } catch (error) {
      console.error('[Server] List saves error:', error);
      return c.json({ error: 'Failed to list saves' }, 500);
    }
  });

  app.post('/api/saves', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be JSON' }, 400);
    }

    const name = isRecord(body) ? body.name : undefined;
    if (typeof name !== 'string' || name.trim() === '') {
      return c.json({ error: 'name is required' }, 400);
    }

    try {
      const save = await ctx.saves.saveGame(name.trim(), ctx.engine.exportState());
      return c.json({ save }, 201);
    } catch (error) {
      console.error('[Server] Save error:', error);
      return c.json({ error: 'Failed to save game' }, 500);
    }
  });

  app.put('/api/saves/:id', async (c) => {
    const id = createSaveId(c.req.param('id'));
    try {
      const save = await ctx.saves.overwriteSave(id, ctx.engine.exportState());
      if (!save) {
        return c.json({ error: 'Save not found' }, 404);
      }
      return c.json({ save });
    } catch (error) {
      console.error('[Server] Overwrite save error:', error);
      return c.json({ error: 'Failed to save game' }, 500);
    }
  });

  app.post('/api/saves/:id/load', async (c) => {
    const id = createSaveId(c.req.param('id'));
    try {
      const saved = await ctx.saves.loadGame(id);
      if (!saved) {
        return c.json({ error: 'Save not found' }, 404);
      }
      const snapshot = ctx.engine.restore(saved.state);
      console.log(`[Server] Loaded save "${saved.name}" at day ${snapshot.time.day}`);
      return c.json({ snapshot });
    } catch (error) {
      if (error instanceof SaveFormatError) {
        return c.json({ error: error.message }, 422);
      }
      console.error('[Server] Load save error:', error);
      return c.json({ error: 'Failed to load save' }, 500);
    }
  });

  app.delete('/api/saves/:id', async (c) => {
    const id = createSaveId(c.req.param('id'));
    try {
      const deleted = await ctx.saves.deleteSave(id);
      if (!deleted) {
        return c.json({ error: 'Save not found' }, 404);
      }
      return c.json({ success: true });
    } catch (error) {
      console.error('[Server] Delete save error:', error);
      return c.json({ error: 'Failed to delete save' }, 500);
    }
  });

  return app;
}

// =============================================================================
// SERVER START
// =============================================================================

export interface RunningServer {
  ctx: AppContext;
  stop(): void;
}

export function startServer(config: ServerConfig = loadServerConfig()): RunningServer {
  const saves = createSaveStore(config.dbPath);
  const engine = new SimulationEngine({ seed: config.seed, difficulty: config.difficulty });
  const ctx: AppContext = { engine, saves };
  const app = createApp(ctx);

  console.log(`[Engine] New ${config.difficulty} game, seed ${config.seed}`);
  const loop = startHostLoop(engine, { intervalMs: config.tickIntervalMs });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
    },
    (info) => {
      console.log(`[Server] Gift Card Empire running at http://localhost:${info.port}`);
      console.log(`[Server] Ticking every ${config.tickIntervalMs}ms, saves in ${config.dbPath}`);
    }
  );

  return {
    ctx,
    stop: () => {
      loop.stop();
      server.close();
      saves.close();
    },
  };
}
