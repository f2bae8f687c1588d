/**
 * InputLedger - Sparse per-frame record of participant inputs
 *
 * Stores whatever each participant submitted for each frame. Frames with
 * no entry for a participant are filled in at read time by repeating that
 * participant's most recent earlier input (hold-last-known prediction).
 *
 * Key guarantees:
 * 1. Resolved inputs iterate in participant id order, identical on every peer
 * 2. Last write wins for a (frame, participant) pair
 * 3. Stored and returned inputs are clones, so callers cannot mutate history
 * 4. Serialization is sorted and therefore deterministic
 */

import type { FrameIndex, FrameInputs, ParticipantId } from './types';

/**
 * Serialized ledger contents.
 */
export interface InputLedgerState<Input> {
    frames: Array<{
        frame: FrameIndex;
        inputs: Array<{ participantId: ParticipantId; input: Input }>;
    }>;
}

export const compareParticipantIds = (a: ParticipantId, b: ParticipantId): number =>
    a < b ? -1 : a > b ? 1 : 0;

export class InputLedger<Input> {
    /** Stored frames: frame number -> participant -> input */
    private history: Map<FrameIndex, Map<ParticipantId, Input>> = new Map();

    constructor(private readonly cloneInput: (input: Input) => Input) {}

    /**
     * Store (or overwrite) a participant's input for a frame.
     */
    setInput(frame: FrameIndex, participantId: ParticipantId, input: Input): void {
        let frameInputs = this.history.get(frame);

        if (!frameInputs) {
            frameInputs = new Map();
            this.history.set(frame, frameInputs);
        }

        frameInputs.set(participantId, this.cloneInput(input));
    }

    /**
     * Raw inputs recorded at exactly this frame, with no prediction applied.
     */
    getFrame(frame: FrameIndex): FrameInputs<Input> | undefined {
        const frameInputs = this.history.get(frame);
        return frameInputs ? this.sortedCopy(frameInputs) : undefined;
    }

    /**
     * Replace everything recorded at a frame. Used by compaction to pin
     * carried-forward predictions to the new horizon.
     */
    replaceFrame(frame: FrameIndex, inputs: FrameInputs<Input>): void {
        if (inputs.size === 0) {
            this.history.delete(frame);
            return;
        }
        this.history.set(frame, this.sortedCopy(inputs));
    }

    /**
     * Inputs in effect at `frame`: for every participant, the latest
     * submission at or before `frame`, looking no further back than
     * `horizon`. Participants with nothing in range are absent.
     */
    resolve(frame: FrameIndex, horizon: FrameIndex): FrameInputs<Input> {
        const found = new Map<ParticipantId, Input>();

        for (const f of this.framesDescending(frame, horizon)) {
            const frameInputs = this.history.get(f);
            if (!frameInputs) continue;

            for (const [participantId, input] of frameInputs) {
                if (!found.has(participantId)) {
                    found.set(participantId, input);
                }
            }
        }

        return this.sortedCopy(found);
    }

    /**
     * The input one participant has in effect at `frame`. Wrapped so that
     * a held `undefined` input is distinct from nothing held.
     */
    resolveParticipant(frame: FrameIndex, participantId: ParticipantId, horizon: FrameIndex): { input: Input } | undefined {
        for (const f of this.framesDescending(frame, horizon)) {
            const frameInputs = this.history.get(f);
            if (!frameInputs?.has(participantId)) continue;

            for (const [id, input] of frameInputs) {
                if (id === participantId) {
                    return { input: this.cloneInput(input) };
                }
            }
        }
        return undefined;
    }

    /**
     * Remove frames before the specified frame number.
     *
     * @returns Number of frames removed
     */
    prune(beforeFrame: FrameIndex): number {
        const toRemove: FrameIndex[] = [];

        for (const frame of this.history.keys()) {
            if (frame < beforeFrame) {
                toRemove.push(frame);
            }
        }

        for (const frame of toRemove) {
            this.history.delete(frame);
        }

        return toRemove.length;
    }

    /**
     * Serialize for snapshots. Frames ascending, participants sorted.
     */
    getState(): InputLedgerState<Input> {
        const frames: InputLedgerState<Input>['frames'] = [];

        const sortedFrames = Array.from(this.history.entries())
            .sort((a, b) => a[0] - b[0]);

        for (const [frame, frameInputs] of sortedFrames) {
            const inputs = Array.from(this.sortedCopy(frameInputs), ([participantId, input]) => ({
                participantId,
                input
            }));
            frames.push({ frame, inputs });
        }

        return { frames };
    }

    /**
     * Restore from serialized state. Clears existing data first.
     */
    setState(state: InputLedgerState<Input>): void {
        this.history.clear();

        for (const { frame, inputs } of state.frames) {
            for (const { participantId, input } of inputs) {
                this.setInput(frame, participantId, input);
            }
        }
    }

    /** Number of frames with at least one recorded input */
    get size(): number {
        return this.history.size;
    }

    clear(): void {
        this.history.clear();
    }

    /**
     * Candidate frames in [horizon, frame], newest first. Walks the map keys
     * instead of the range when the range is wider than the ledger.
     */
    private framesDescending(frame: FrameIndex, horizon: FrameIndex): FrameIndex[] {
        if (frame < horizon) return [];

        if (frame - horizon + 1 > this.history.size) {
            return Array.from(this.history.keys())
                .filter(f => f >= horizon && f <= frame)
                .sort((a, b) => b - a);
        }

        const frames: FrameIndex[] = [];
        for (let f = frame; f >= horizon; f--) {
            frames.push(f);
        }
        return frames;
    }

    private sortedCopy(inputs: ReadonlyMap<ParticipantId, Input>): Map<ParticipantId, Input> {
        const entries = Array.from(inputs.entries());
        entries.sort((a, b) => compareParticipantIds(a[0], b[0]));
        return new Map(entries.map(([participantId, input]): [ParticipantId, Input] => [
            participantId,
            this.cloneInput(input)
        ]));
    }
}
