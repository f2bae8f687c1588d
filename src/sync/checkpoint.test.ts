import { describe, test, expect, vi } from 'vitest';
import { CheckpointStore } from './checkpoint';
import { RollbackConfigError } from './errors';

interface Tally {
    frames: number[];
}

const cloneTally = (tally: Tally): Tally => ({ frames: [...tally.frames] });

describe('CheckpointStore', () => {
    test('starts at frame 0 with a copy of the initial state', () => {
        const initial: Tally = { frames: [] };
        const store = new CheckpointStore(initial, cloneTally);
        initial.frames.push(42);

        expect(store.frame).toBe(0);
        expect(store.state).toEqual({ frames: [] });
    });

    test('fold steps each frame in order without moving the anchor', () => {
        const store = new CheckpointStore<Tally>({ frames: [] }, cloneTally);

        const folded = store.fold(3, (frame, state) => {
            state.frames.push(frame);
            return state;
        });

        expect(folded).toEqual({ frames: [0, 1, 2] });
        expect(store.frame).toBe(0);
        expect(store.state).toEqual({ frames: [] });
    });

    test('commit moves the anchor and later folds start from it', () => {
        const store = new CheckpointStore<Tally>({ frames: [] }, cloneTally);
        store.commit(3, store.fold(3, (frame, state) => ({ frames: [...state.frames, frame] })));

        expect(store.frame).toBe(3);
        expect(store.state).toEqual({ frames: [0, 1, 2] });

        store.commit(5, store.fold(5, (frame, state) => ({ frames: [...state.frames, frame * 10] })));
        expect(store.state).toEqual({ frames: [0, 1, 2, 30, 40] });
    });

    test('fold to a target at or behind the anchor runs no steps', () => {
        const store = new CheckpointStore<Tally>({ frames: [7] }, cloneTally);
        store.commit(2, store.state);

        const step = vi.fn((_frame: number, state: Tally) => state);
        expect(store.fold(2, step)).toEqual({ frames: [7] });
        expect(store.fold(1, step)).toEqual({ frames: [7] });
        expect(step).not.toHaveBeenCalled();
    });

    test('a throwing step leaves the checkpoint as it was', () => {
        const store = new CheckpointStore<Tally>({ frames: [] }, cloneTally);

        expect(() =>
            store.fold(4, (frame, state) => {
                if (frame === 2) throw new Error('boom');
                state.frames.push(frame);
                return state;
            })
        ).toThrow('boom');
        expect(store.frame).toBe(0);
        expect(store.state).toEqual({ frames: [] });
    });

    test('commit refuses to move the anchor backwards', () => {
        const store = new CheckpointStore<Tally>({ frames: [] }, cloneTally);
        store.commit(4, store.state);

        expect(() => store.commit(3, store.state)).toThrow(RollbackConfigError);
        expect(() => store.commit(3, store.state)).toThrow('checkpoint cannot move back from 4 to 3');
        expect(store.frame).toBe(4);
    });

    test('state getter hands out copies', () => {
        const store = new CheckpointStore<Tally>({ frames: [1] }, cloneTally);
        store.state.frames.push(2);

        expect(store.state).toEqual({ frames: [1] });
    });
});
