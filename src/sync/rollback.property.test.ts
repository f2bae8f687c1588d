import { describe, test, expect, vi } from 'vitest';
import fc from 'fast-check';
import { RollbackStateManager } from './rollback';
import type { FrameInputs } from './types';

interface Submission {
    frame: number;
    participantId: string;
    value: number;
}

const MODULUS = 1_000_003;

// Order-sensitive fold so a misplaced frame changes the result
const hashUpdate = (inputs: FrameInputs<number>, state: number): number => {
    let next = state;
    for (const [participantId, value] of inputs) {
        next = (next * 31 + participantId.charCodeAt(0) * 7 + value) % MODULUS;
    }
    return (next * 17 + inputs.size) % MODULUS;
};

const submissionArb = fc.uniqueArray(
    fc.record({
        frame: fc.integer({ min: 0, max: 20 }),
        participantId: fc.constantFrom('a', 'b', 'c'),
        value: fc.integer({ min: -50, max: 50 })
    }),
    { selector: s => `${s.frame}:${s.participantId}`, maxLength: 30 }
);

const silentLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

function createManager(maxHistory: number, pruneHistory = false) {
    return new RollbackStateManager<number, number>(0, maxHistory, { pruneHistory, logger: silentLogger() });
}

// Straight fold from frame 0 with the full input history and no window
function referenceState(submissions: Submission[], frame: number): number {
    let state = 0;
    for (let f = 0; f <= frame; f++) {
        const held = new Map<string, { frame: number; value: number }>();
        for (const s of submissions) {
            if (s.frame > f) continue;
            const current = held.get(s.participantId);
            if (!current || s.frame > current.frame) {
                held.set(s.participantId, { frame: s.frame, value: s.value });
            }
        }
        const ids = Array.from(held.keys()).sort();
        state = hashUpdate(new Map(ids.map((id): [string, number] => [id, held.get(id)?.value ?? 0])), state);
    }
    return state;
}

describe('RollbackStateManager properties', () => {
    test('matches an unwindowed replay when every input is known up front', () => {
        fc.assert(
            fc.property(submissionArb, fc.integer({ min: 0, max: 6 }), fc.integer({ min: 1, max: 25 }), (submissions, maxHistory, ticks) => {
                const manager = createManager(maxHistory);
                for (const s of submissions) {
                    expect(manager.handleInput(s.frame, s.participantId, s.value).ok).toBe(true);
                }

                for (let tick = 1; tick <= ticks; tick++) {
                    manager.progressFrame(hashUpdate);
                    expect(manager.currentFrameState).toBe(referenceState(submissions, tick));
                }
            })
        );
    });

    test('does not depend on submission order', () => {
        fc.assert(
            fc.property(submissionArb, fc.integer({ min: 0, max: 6 }), (submissions, maxHistory) => {
                const forward = createManager(maxHistory);
                const reversed = createManager(maxHistory);

                for (const s of submissions) {
                    forward.handleInput(s.frame, s.participantId, s.value);
                }
                for (const s of [...submissions].reverse()) {
                    reversed.handleInput(s.frame, s.participantId, s.value);
                }

                for (let tick = 0; tick < 24; tick++) {
                    forward.progressFrame(hashUpdate);
                    reversed.progressFrame(hashUpdate);
                    expect(reversed.currentFrameState).toBe(forward.currentFrameState);
                }
                expect(reversed.getLedgerState()).toEqual(forward.getLedgerState());
            })
        );
    });

    test('pruned and unpruned ledgers replay identically with inputs arriving mid-run', () => {
        fc.assert(
            fc.property(submissionArb, fc.integer({ min: 0, max: 6 }), (submissions, maxHistory) => {
                const kept = createManager(maxHistory);
                const pruned = createManager(maxHistory, true);

                for (let tick = 0; tick < 24; tick++) {
                    // Deliver each submission a couple of ticks after its frame
                    for (const s of submissions) {
                        if (s.frame + 2 !== tick) continue;
                        const a = kept.handleInput(s.frame, s.participantId, s.value);
                        const b = pruned.handleInput(s.frame, s.participantId, s.value);
                        expect(b.ok).toBe(a.ok);
                    }

                    kept.progressFrame(hashUpdate);
                    pruned.progressFrame(hashUpdate);

                    expect(pruned.currentFrameState).toBe(kept.currentFrameState);
                    expect(pruned.oldestFrameIndex).toBe(kept.oldestFrameIndex);
                    expect(pruned.getRollbackStats().ledgerFrames).toBeLessThanOrEqual(kept.getRollbackStats().ledgerFrames);
                }
            })
        );
    });

    test('keeps the window bounded and rejects exactly the inputs behind it', () => {
        fc.assert(
            fc.property(fc.integer({ min: 0, max: 8 }), fc.integer({ min: 0, max: 30 }), fc.integer({ min: 0, max: 40 }), (maxHistory, ticks, frame) => {
                const manager = createManager(maxHistory);
                for (let tick = 0; tick < ticks; tick++) {
                    manager.progressFrame(hashUpdate);
                }

                const oldest = manager.oldestFrameIndex;
                expect(oldest).toBeLessThanOrEqual(manager.currentFrameIndex);
                expect(manager.currentFrameIndex - oldest).toBe(Math.min(ticks, maxHistory));

                const result = manager.handleInput(frame, 'a', 1);
                expect(result.ok).toBe(frame >= oldest);
                if (!result.ok) {
                    expect(result.error.inputFrame).toBe(frame);
                    expect(result.error.oldestValidFrame).toBe(oldest);
                }
            })
        );
    });
});
