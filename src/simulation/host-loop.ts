/**
 * Host loop: drives the engine on a fixed real-time cadence and feeds it the
 * measured elapsed time, so late timers do not slow the game clock down.
 */

import type { SimulationEngine } from './engine.js';

export interface HostLoopOptions {
  intervalMs: number;
  /** Injected for tests */
  now?: () => number;
}

export interface HostLoop {
  stop(): void;
}

export function startHostLoop(engine: SimulationEngine, options: HostLoopOptions): HostLoop {
  const now = options.now ?? Date.now;
  let last = now();

  const timer = setInterval(() => {
    const current = now();
    const elapsed = current - last;
    last = current;
    try {
      engine.tick(elapsed);
    } catch (error) {
      clearInterval(timer);
      console.error('[Engine] Tick failed, host loop stopped:', error);
    }
  }, options.intervalMs);

  return {
    stop: () => clearInterval(timer),
  };
}
