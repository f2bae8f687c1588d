import type { FrameIndex } from './types';

export class RollbackError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * An input arrived for a frame already folded into the checkpoint.
 * Recoverable: callers typically log or drop the late packet.
 */
export class InputTooOldError extends RollbackError {
    readonly inputFrame: FrameIndex;
    readonly oldestValidFrame: FrameIndex;

    constructor(inputFrame: FrameIndex, oldestValidFrame: FrameIndex) {
        super(`Input for frame ${inputFrame} is older than oldest valid frame of ${oldestValidFrame}`);
        this.inputFrame = inputFrame;
        this.oldestValidFrame = oldestValidFrame;
    }
}

/** Invalid construction parameters or call arguments. Thrown, never returned. */
export class RollbackConfigError extends RollbackError {}

export type SubmitResult =
    | { ok: true }
    | { ok: false; error: InputTooOldError };

export function assertFrameIndex(frame: FrameIndex, label = 'frame'): void {
    if (!Number.isSafeInteger(frame) || frame < 0) {
        throw new RollbackConfigError(`${label} must be a non-negative integer, got ${frame}`);
    }
}
