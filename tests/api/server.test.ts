/**
 * API Server Tests
 *
 * Drives the Hono app in process with a fast host loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { createApp } from '../../src/api/server.js';
import { parseCommand, statusForFailure } from '../../src/api/commands.js';
import { SimulationEngine } from '../../src/simulation/engine.js';
import { startHostLoop, type HostLoop } from '../../src/simulation/host-loop.js';
import { SQLiteSaveStore } from '../../src/storage/sqlite.js';

const post = (app: Hono, path: string, body: unknown) =>
  app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });

describe('API server', () => {
  let engine: SimulationEngine;
  let saves: SQLiteSaveStore;
  let loop: HostLoop;
  let app: Hono;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    engine = new SimulationEngine({ seed: 21 });
    saves = new SQLiteSaveStore(':memory:');
    loop = startHostLoop(engine, { intervalMs: 5 });
    app = createApp({ engine, saves });
  });

  afterEach(() => {
    loop.stop();
    saves.close();
    vi.restoreAllMocks();
  });

  it('should report health', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok' });
  });

  it('should serve the latest snapshot', async () => {
    const res = await app.request('/api/snapshot');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      difficulty: 'normal',
      player: { cash: 500_000, reputation: 300 },
      inventory: [],
    });
  });

  describe('POST /api/commands', () => {
    it('should apply a purchase on the next tick', async () => {
      const res = await post(app, '/api/commands', {
        type: 'Purchase',
        retailer: 'Starbucks',
        denomination: 1000,
        quantity: 1,
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ outcome: { type: 'Purchase', totalCost: 800 } });
      expect(engine.snapshot().player.cash).toBe(499_200);
    });

    it('should reject a malformed command', async () => {
      const res = await post(app, '/api/commands', { type: 'Explode' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unknown command type: Explode' });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await app.request('/api/commands', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{oops',
      });
      expect(res.status).toBe(400);
    });

    it('should map engine failures to status codes', async () => {
      const funds = await post(app, '/api/commands', {
        type: 'Purchase',
        retailer: 'Amazon',
        denomination: 10000,
        quantity: 100,
      });
      expect(funds.status).toBe(409);
      expect(await funds.json()).toMatchObject({ kind: 'InsufficientFunds' });

      const unknown = await post(app, '/api/commands', { type: 'AcceptOrder', orderId: 9999 });
      expect(unknown.status).toBe(404);
      expect(await unknown.json()).toEqual({ error: 'Order #9999 is not active', kind: 'UnknownOrder' });

      const invalid = await post(app, '/api/commands', {
        type: 'Purchase',
        retailer: 'Starbucks',
        denomination: 1000,
        quantity: 0,
      });
      expect(invalid.status).toBe(400);
      expect(await invalid.json()).toMatchObject({ kind: 'InvalidCommand' });
    });
  });

  it('should return the activity tail', async () => {
    const res = await app.request('/api/activity?limit=2');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ activity: engine.activityTail(2) });

    const bad = await app.request('/api/activity?limit=-1');
    expect(bad.status).toBe(400);
  });

  describe('saves', () => {
    it('should save, load and delete a game', async () => {
      const created = await post(app, '/api/saves', { name: 'Opening day' });
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ save: { name: 'Opening day', cash: 500_000 } });

      const [summary] = await saves.listSaves();
      await post(app, '/api/commands', { type: 'Purchase', retailer: 'Starbucks', denomination: 1000, quantity: 1 });
      expect(engine.snapshot().player.cash).toBe(499_200);

      const loaded = await post(app, `/api/saves/${summary.id}/load`, {});
      expect(loaded.status).toBe(200);
      expect(engine.snapshot().player.cash).toBe(500_000);
      expect(engine.snapshot().inventory).toEqual([]);

      const listed = await app.request('/api/saves');
      expect(await listed.json()).toMatchObject({ saves: [{ name: 'Opening day' }] });

      const removed = await app.request(`/api/saves/${summary.id}`, { method: 'DELETE' });
      expect(removed.status).toBe(200);
      const again = await app.request(`/api/saves/${summary.id}`, { method: 'DELETE' });
      expect(again.status).toBe(404);
    });

    it('should overwrite an existing save', async () => {
      await post(app, '/api/saves', { name: 'Slot' });
      const [summary] = await saves.listSaves();
      await post(app, '/api/commands', { type: 'Purchase', retailer: 'Starbucks', denomination: 1000, quantity: 1 });

      const res = await app.request(`/api/saves/${summary.id}`, { method: 'PUT' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ save: { name: 'Slot', cash: 499_200 } });
    });

    it('should require a save name', async () => {
      const res = await post(app, '/api/saves', {});
      expect(res.status).toBe(400);
    });

    it('should refuse an inconsistent save and keep playing', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const good = engine.exportState();
      const bad = await saves.saveGame('Broken', { ...good, nextOrderId: 1 });
      const before = engine.snapshot().player;

      const res = await post(app, `/api/saves/${bad.id}/load`, {});
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({ error: expect.stringContaining('is not below the next order id 1') });
      expect(engine.snapshot().player).toEqual(before);
    });

    it('should 404 on unknown saves', async () => {
      const res = await post(app, '/api/saves/nope/load', {});
      expect(res.status).toBe(404);
    });
  });
});

describe('parseCommand', () => {
  it('should build typed commands', () => {
    expect(parseCommand({ type: 'Pause' })).toEqual({ ok: true, value: { type: 'Pause' } });
    expect(parseCommand({ type: 'LiquidateLot', lotId: 3 })).toEqual({
      ok: true,
      value: { type: 'LiquidateLot', lotId: 3 },
    });
  });

  it('should reject bad fields', () => {
    expect(parseCommand('Pause')).toEqual({ ok: false, error: 'Command must be a JSON object' });
    expect(parseCommand({ type: 'Purchase', retailer: 'Costco', denomination: 1000, quantity: 1 })).toEqual({
      ok: false,
      error: 'Unknown retailer: Costco',
    });
    expect(parseCommand({ type: 'DeclineOrder', orderId: '12' })).toEqual({
      ok: false,
      error: 'orderId must be a positive integer',
    });
  });

  it('should map failure kinds to HTTP status codes', () => {
    expect(statusForFailure('UnknownOrder')).toBe(404);
    expect(statusForFailure('InvalidCommand')).toBe(400);
    expect(statusForFailure('UnfulfillableOrder')).toBe(409);
  });
});
