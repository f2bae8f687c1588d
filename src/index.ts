/**
 * Rollback State - deterministic rollback for frame-stepped simulations
 *
 * Features:
 * - Frame-indexed input ledger with hold-last-known prediction
 * - Bounded rollback window with a single compacted checkpoint
 * - Full resimulation from the checkpoint so late inputs are never lost
 */

// ============================================
// Sync (Rollback State)
// ============================================
export * from './sync';

// ============================================
// Logging
// ============================================
export { makeLogger, envLogLevel, logger } from './logging';
export type { ILogger, LogFields } from './logging';
