import { InvalidInputError } from './errors';

/** Values a ScalarSet can hold. */
export type ElementKey = number | string;

/**
 * Which numbers are admitted as elements.
 * - `integer`: safe integers only (default).
 * - `finite`: any finite number.
 *
 * Strings are always admitted.
 */
export type ElementPolicy = 'integer' | 'finite';

export const DEFAULT_POLICY: ElementPolicy = 'integer';

/** True if a set using `target` must re-validate keys coming from a set using `source`. */
export function isStricter(target: ElementPolicy, source: ElementPolicy): boolean {
    return target === 'integer' && source === 'finite';
}

/**
 * Describes a value for error messages: primitives by `typeof`,
 * objects by constructor name.
 */
export function typeName(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'Array';
    if (typeof value === 'object') {
        const ctor: unknown = value.constructor;
        if (typeof ctor === 'function' && ctor.name) return ctor.name;
        return 'Object';
    }
    return typeof value;
}

export function isElement(value: unknown, policy: ElementPolicy = DEFAULT_POLICY): value is ElementKey {
    if (typeof value === 'string') return true;
    if (typeof value !== 'number') return false;
    return policy === 'integer' ? Number.isSafeInteger(value) : Number.isFinite(value);
}

export function assertElement(value: unknown, policy: ElementPolicy = DEFAULT_POLICY): ElementKey {
    if (isElement(value, policy)) return value;

    if (typeof value === 'number') {
        const kind = policy === 'integer' ? 'non-integer' : 'non-finite';
        throw new InvalidInputError(`Cannot use a ${kind} 'number' (${value}) as a set element`);
    }
    throw new InvalidInputError(`Cannot use a '${typeName(value)}' as a set element`);
}

// Reads the property instead of using `in`, which would hit the `has` trap of an indexed view.
export function isIterable(value: unknown): value is Iterable<unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const method: unknown = Reflect.get(value, Symbol.iterator);
    return typeof method === 'function';
}

// Canonical decimal integers only: "0", "-900"; not "007", "-0" or "1e3".
const INTEGER_KEY = /^(?:0|-?[1-9][0-9]*)$/;

/**
 * Maps a property key coming through an indexed view back to an element.
 * Canonical integer strings become numbers; every other string is kept.
 */
export function decodePropertyKey(key: string): ElementKey {
    if (INTEGER_KEY.test(key)) {
        const n = Number(key);
        if (Number.isSafeInteger(n)) return n;
    }
    return key;
}
