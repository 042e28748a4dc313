/**
 * Gift Card Empire - Main Entry Points
 */

export * from './types.js';
export { DIFFICULTY_PRESETS, loadServerConfig, type ServerConfig } from './config.js';
export { ACHIEVEMENTS, AchievementTracker } from './simulation/achievements.js';
export { InvariantViolation, SaveFormatError } from './errors.js';
export { SimulationEngine, type EngineOptions, type SnapshotListener } from './simulation/engine.js';
export { startHostLoop, type HostLoop } from './simulation/host-loop.js';
export type { ReadonlySnapshot } from './simulation/snapshot.js';
export { createSaveStore, SQLiteSaveStore, type SaveStore, type SaveSummary } from './storage/sqlite.js';
export { createApp, startServer } from './api/server.js';
