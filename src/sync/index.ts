/**
 * Sync Module
 *
 * Rollback state management for deterministic frame-stepped simulations.
 */

export { RollbackStateManager, createRollbackManager } from './rollback';
export { InputLedger, compareParticipantIds } from './input-ledger';
export type { InputLedgerState } from './input-ledger';
export { CheckpointStore } from './checkpoint';
export type { FoldStep } from './checkpoint';
export { resolveRollbackConfig, isPlainData, maxHistorySchema, MAX_HISTORY_LIMIT } from './config';
export { RollbackError, InputTooOldError, RollbackConfigError, assertFrameIndex } from './errors';
export type { SubmitResult } from './errors';
export { defaultCloneValue, defaultValuesEqual, defaultDescribeValue } from './types';
export type {
    FrameIndex,
    ParticipantId,
    FrameInputs,
    UpdateFn,
    RollbackConfig,
    RollbackOptions,
    RollbackStats
} from './types';
