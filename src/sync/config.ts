import * as v from 'valibot';
import { logger as defaultLogger } from '../logging';
import { RollbackConfigError } from './errors';
import {
    type RollbackConfig,
    type RollbackOptions,
    defaultCloneValue,
    defaultDescribeValue,
    defaultValuesEqual,
} from './types';

/** Upper bound keeps replay depth and cursor math in int32 range. */
export const MAX_HISTORY_LIMIT = 2 ** 31 - 1;

export const maxHistorySchema = v.pipe(
    v.number('maxHistory must be a number'),
    v.integer('maxHistory must be an integer'),
    v.minValue(0, 'maxHistory must not be negative'),
    v.maxValue(MAX_HISTORY_LIMIT, `maxHistory must be at most ${MAX_HISTORY_LIMIT}`),
);

/**
 * True for values `structuredClone` copies without losing anything:
 * primitives, plain objects and arrays, and the built-ins it knows
 * (Map, Set, Date, RegExp, buffers). Class instances and functions fail.
 */
export function isPlainData(value: unknown, seen: Set<object> = new Set()): boolean {
    if (typeof value === 'function' || typeof value === 'symbol') return false;
    if (typeof value !== 'object' || value === null) return true;

    if (seen.has(value)) return true;
    seen.add(value);

    const proto: unknown = Object.getPrototypeOf(value);
    if (value instanceof Map && proto === Map.prototype) {
        for (const [key, entry] of value) {
            if (!isPlainData(key, seen) || !isPlainData(entry, seen)) return false;
        }
        return true;
    }
    if (value instanceof Set && proto === Set.prototype) {
        for (const entry of value) {
            if (!isPlainData(entry, seen)) return false;
        }
        return true;
    }
    if (value instanceof Date || value instanceof RegExp || value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
        return true;
    }
    if (proto !== Object.prototype && proto !== Array.prototype && proto !== null) return false;

    return Object.values(value).every(entry => isPlainData(entry, seen));
}

/**
 * Validate `maxHistory` and fill option defaults. When `initialState` is
 * given and no `cloneState` is supplied, the state must be plain data so
 * the default clone keeps its shape.
 */
export function resolveRollbackConfig<Input, State>(
    maxHistory: number,
    options: RollbackOptions<Input, State> = {},
    initialState?: State
): RollbackConfig<Input, State> {
    const parsed = v.safeParse(maxHistorySchema, maxHistory);
    if (!parsed.success) {
        throw new RollbackConfigError(parsed.issues.map(issue => issue.message).join('; '));
    }

    if (options.cloneState === undefined && !isPlainData(initialState)) {
        throw new RollbackConfigError(
            'initial state is not plain data and the default clone would drop its prototype; pass a cloneState option'
        );
    }

    return {
        maxHistory: parsed.output,
        pruneHistory: options.pruneHistory ?? false,
        cloneInput: options.cloneInput ?? defaultCloneValue,
        cloneState: options.cloneState ?? defaultCloneValue,
        inputsEqual: options.inputsEqual ?? defaultValuesEqual,
        describeInput: options.describeInput ?? defaultDescribeValue,
        logger: options.logger ?? defaultLogger,
    };
}
