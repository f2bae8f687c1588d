/**
 * Rollback Types
 *
 * Shared type definitions for the input ledger, checkpoint store and
 * rollback manager.
 */

import { isDeepStrictEqual } from 'node:util';
import type { ILogger } from '../logging';

/** Discrete simulation tick. Non-negative integer, never decreases. */
export type FrameIndex = number;

/** Stable identity of one input source (assigned by the caller, usually a UUID). */
export type ParticipantId = string;

/** Inputs in effect for one frame, sorted by participant id. */
export type FrameInputs<Input> = ReadonlyMap<ParticipantId, Input>;

/**
 * Simulation step. Must be pure: it is called again on identical
 * inputs whenever a frame is replayed.
 */
export type UpdateFn<Input, State> = (inputs: FrameInputs<Input>, state: State) => State;

/**
 * Configuration for a rollback manager.
 */
export interface RollbackConfig<Input, State> {
    /** Frames kept reachable behind the current frame */
    maxHistory: number;
    /** Delete ledger entries once they fall behind the checkpoint */
    pruneHistory: boolean;
    cloneInput: (input: Input) => Input;
    cloneState: (state: State) => State;
    inputsEqual: (a: Input, b: Input) => boolean;
    /** Debug representation used in log lines */
    describeInput: (input: Input) => string;
    logger: ILogger;
}

/** Everything but the window size is optional at construction. */
export type RollbackOptions<Input, State> = Partial<Omit<RollbackConfig<Input, State>, 'maxHistory'>>;

export const defaultCloneValue = <T>(value: T): T => structuredClone(value);

export const defaultValuesEqual = <T>(a: T, b: T): boolean => isDeepStrictEqual(a, b);

export const defaultDescribeValue = <T>(value: T): string => JSON.stringify(value) ?? String(value);

/**
 * Statistics for rollback debugging.
 */
export interface RollbackStats {
    currentFrame: FrameIndex;
    oldestFrame: FrameIndex;
    maxHistory: number;
    /** Number of times the checkpoint advanced */
    compactionCount: number;
    /** Total update function calls, across compaction and replay */
    framesReplayed: number;
    acceptedInputs: number;
    rejectedInputs: number;
    /** Accepted inputs for frames at or before the current frame */
    lateInputs: number;
    /** Late inputs that differed from what was held for that frame */
    predictionMisses: number;
    /** Frames with at least one recorded input */
    ledgerFrames: number;
}
