/**
 * Checkpoint Store
 *
 * Holds the single confirmed state snapshot that every replay starts from.
 * The snapshot is anchored at the oldest frame still reachable; frames
 * behind it are folded in once and never replayed again.
 */

import { RollbackConfigError } from './errors';
import type { FrameIndex } from './types';

/** Step applied to each folded frame: (frame, state) -> next state */
export type FoldStep<State> = (frame: FrameIndex, state: State) => State;

export class CheckpointStore<State> {
    private _frame: FrameIndex = 0;
    private _state: State;

    constructor(initialState: State, private readonly cloneState: (state: State) => State) {
        this._state = cloneState(initialState);
    }

    /** Frame the checkpoint is anchored at (the oldest reachable frame) */
    get frame(): FrameIndex {
        return this._frame;
    }

    /** A copy of the checkpoint state */
    get state(): State {
        return this.cloneState(this._state);
    }

    /**
     * Fold every frame in [frame, targetFrame) onto a copy of the checkpoint
     * and return the result. The store itself is left untouched.
     */
    fold(targetFrame: FrameIndex, step: FoldStep<State>): State {
        let state = this.cloneState(this._state);
        for (let frame = this._frame; frame < targetFrame; frame++) {
            state = step(frame, state);
        }
        return state;
    }

    /** Anchor the checkpoint at a later frame with a state folded by `fold` */
    commit(frame: FrameIndex, state: State): void {
        if (frame < this._frame) {
            throw new RollbackConfigError(`checkpoint cannot move back from ${this._frame} to ${frame}`);
        }
        this._state = state;
        this._frame = frame;
    }
}
