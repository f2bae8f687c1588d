/**
 * Rollback State Manager
 *
 * Deterministic rollback for frame-stepped simulations:
 * - Sparse input ledger with hold-last-known prediction
 * - Single checkpoint anchored at the oldest reachable frame
 * - Full resimulation from the checkpoint on every tick, so late inputs
 *   for any frame still inside the window are always picked up
 *
 * Simulation-agnostic: the caller passes a pure update function per call.
 * Transport is the caller's concern.
 */

import { CheckpointStore } from './checkpoint';
import { resolveRollbackConfig } from './config';
import { InputTooOldError, RollbackConfigError, type SubmitResult, assertFrameIndex } from './errors';
import { InputLedger, type InputLedgerState } from './input-ledger';
import type {
    FrameIndex,
    FrameInputs,
    ParticipantId,
    RollbackConfig,
    RollbackOptions,
    RollbackStats,
    UpdateFn,
} from './types';

export class RollbackStateManager<Input, State> {
    private readonly config: RollbackConfig<Input, State>;
    private readonly ledger: InputLedger<Input>;
    private readonly checkpoint: CheckpointStore<State>;

    private _currentFrameIndex: FrameIndex = 0;
    private _currentFrameState: State;

    /** Earliest frame changed by a mispredicted late input since the last tick */
    private _pendingRollbackFrame: FrameIndex | undefined;

    // Stats
    private compactionCount = 0;
    private framesReplayed = 0;
    private acceptedInputs = 0;
    private rejectedInputs = 0;
    private lateInputs = 0;
    private predictionMisses = 0;

    constructor(initialState: State, maxHistory: number, options: RollbackOptions<Input, State> = {}) {
        this.config = resolveRollbackConfig(maxHistory, options, initialState);
        this.ledger = new InputLedger(this.config.cloneInput);
        this.checkpoint = new CheckpointStore(initialState, this.config.cloneState);
        this._currentFrameState = this.config.cloneState(initialState);
    }

    get maxHistory(): number {
        return this.config.maxHistory;
    }

    /** Oldest frame still accepting input; the checkpoint is anchored here */
    get oldestFrameIndex(): FrameIndex {
        return this.checkpoint.frame;
    }

    get currentFrameIndex(): FrameIndex {
        return this._currentFrameIndex;
    }

    /** State computed by the last progressFrame (stale after a late input until the next tick) */
    get currentFrameState(): State {
        return this.config.cloneState(this._currentFrameState);
    }

    get checkpointState(): State {
        return this.checkpoint.state;
    }

    get pendingRollbackFrame(): FrameIndex | undefined {
        return this._pendingRollbackFrame;
    }

    // ============================================
    // Input Management
    // ============================================

    /**
     * Record a participant's input for a frame. Accepted for any frame at
     * or after the checkpoint, including frames already simulated.
     * Does not recompute anything.
     */
    handleInput(frame: FrameIndex, participantId: ParticipantId, input: Input): SubmitResult {
        assertFrameIndex(frame);
        if (participantId.length === 0) {
            throw new RollbackConfigError('participantId must not be empty');
        }

        const { logger, describeInput, inputsEqual } = this.config;
        const oldest = this.oldestFrameIndex;

        if (frame < oldest) {
            this.rejectedInputs++;
            logger.debug({ frame, participantId, oldestValidFrame: oldest }, 'input too old');
            return { ok: false, error: new InputTooOldError(frame, oldest) };
        }

        // Nothing has been simulated before the first tick
        if (this._currentFrameIndex > 0 && frame <= this._currentFrameIndex) {
            this.lateInputs++;

            const held = this.ledger.resolveParticipant(frame, participantId, oldest);
            if (held === undefined || !inputsEqual(held.input, input)) {
                this.predictionMisses++;
                if (this._pendingRollbackFrame === undefined || frame < this._pendingRollbackFrame) {
                    this._pendingRollbackFrame = frame;
                }
                logger.debug({
                    frame,
                    participantId,
                    currentFrame: this._currentFrameIndex,
                    held: held === undefined ? null : describeInput(held.input),
                    actual: describeInput(input),
                }, 'late input changed a simulated frame');
            }
        }

        this.ledger.setInput(frame, participantId, input);
        this.acceptedInputs++;
        return { ok: true };
    }

    /** Inputs in effect at a frame, with hold-last-known prediction applied */
    getFrameInputs(frame: FrameIndex): FrameInputs<Input> {
        assertFrameIndex(frame);
        return this.ledger.resolve(frame, this.oldestFrameIndex);
    }

    // ============================================
    // Replay
    // ============================================

    /**
     * Rebuild a frame's state from the checkpoint, folding the update
     * function over every frame from the oldest through `frame`. Always
     * fresh; nothing is cached. Frames before the checkpoint yield the
     * checkpoint state.
     */
    stateAt(frame: FrameIndex, update: UpdateFn<Input, State>): State {
        assertFrameIndex(frame);

        const horizon = this.oldestFrameIndex;
        const state = this.replay(update, this.checkpoint.state, horizon, frame, horizon);
        this.framesReplayed += Math.max(0, frame - horizon + 1);
        return state;
    }

    /**
     * Advance one tick: fold frames that leave the window into a new
     * checkpoint, then recompute the next frame from it. Nothing is
     * committed until every update call has returned, so a throwing
     * update leaves the manager on the previous tick.
     */
    progressFrame(update: UpdateFn<Input, State>): void {
        const { maxHistory, cloneState } = this.config;
        const nextFrame = this._currentFrameIndex + 1;
        const oldest = this.oldestFrameIndex;
        const targetOldest = Math.max(oldest, nextFrame - maxHistory);

        // Resolving against the old horizon gives the same inputs the
        // ledger yields once the carried frame is pinned at targetOldest
        const checkpointState = this.checkpoint.fold(targetOldest, (frame, state) =>
            update(this.ledger.resolve(frame, oldest), state)
        );
        const nextState = this.replay(update, cloneState(checkpointState), targetOldest, nextFrame, oldest);

        if (targetOldest > oldest) {
            this.compact(oldest, targetOldest, checkpointState);
        }
        this.framesReplayed += nextFrame - oldest + 1;
        this._currentFrameIndex = nextFrame;
        this._currentFrameState = nextState;
        this._pendingRollbackFrame = undefined;
    }

    private compact(oldest: FrameIndex, targetOldest: FrameIndex, checkpointState: State): void {
        const { pruneHistory, logger } = this.config;

        // Resolved against the old horizon so held inputs survive the move
        const carried = this.ledger.resolve(targetOldest, oldest);

        this.checkpoint.commit(targetOldest, checkpointState);
        this.ledger.replaceFrame(targetOldest, carried);
        this.compactionCount++;

        logger.debug({ from: oldest, to: targetOldest, folded: targetOldest - oldest }, 'checkpoint advanced');

        if (pruneHistory) {
            const removed = this.ledger.prune(targetOldest);
            if (removed > 0) {
                logger.debug({ before: targetOldest, removed }, 'ledger pruned');
            }
        }
    }

    /** Fold the update function over [from, through], resolving inputs against `horizon` */
    private replay(
        update: UpdateFn<Input, State>,
        state: State,
        from: FrameIndex,
        through: FrameIndex,
        horizon: FrameIndex
    ): State {
        let current = state;
        for (let frame = from; frame <= through; frame++) {
            current = update(this.ledger.resolve(frame, horizon), current);
        }
        return current;
    }

    // ============================================
    // Debugging
    // ============================================

    /** Deterministic dump of every recorded input (frames ascending, participants sorted) */
    getLedgerState(): InputLedgerState<Input> {
        return this.ledger.getState();
    }

    getRollbackStats(): RollbackStats {
        return {
            currentFrame: this._currentFrameIndex,
            oldestFrame: this.oldestFrameIndex,
            maxHistory: this.config.maxHistory,
            compactionCount: this.compactionCount,
            framesReplayed: this.framesReplayed,
            acceptedInputs: this.acceptedInputs,
            rejectedInputs: this.rejectedInputs,
            lateInputs: this.lateInputs,
            predictionMisses: this.predictionMisses,
            ledgerFrames: this.ledger.size,
        };
    }
}

export function createRollbackManager<Input, State>(
    initialState: State,
    maxHistory: number,
    options: RollbackOptions<Input, State> = {}
): RollbackStateManager<Input, State> {
    return new RollbackStateManager(initialState, maxHistory, options);
}
