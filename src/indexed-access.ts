import { decodePropertyKey, ElementKey } from './elements';
import { InvalidInputError, NotSupportedError } from './errors';

/** `view[key]` reads membership, `view[key] = flag` adds or removes. */
export type IndexedView = Record<ElementKey, boolean>;

/** The two supported variants of indexed access. */
export interface IndexedAccess {
    get(key: ElementKey): boolean;
    set(key: ElementKey, present: boolean): unknown;
}

/**
 * All four variants of indexed access. `has` and `deleteProperty` are
 * terminal: they always throw instead of falling back to lookup/removal.
 */
function indexedHandler(target: IndexedAccess): ProxyHandler<IndexedView> {
    return {
        get(_view, property) {
            if (typeof property === 'symbol') return undefined;
            return target.get(decodePropertyKey(property));
        },
        set(_view, property, value: unknown) {
            if (typeof property === 'symbol') {
                throw new InvalidInputError(`Cannot use a 'symbol' as a set element`);
            }
            target.set(decodePropertyKey(property), Boolean(value));
            return true;
        },
        has() {
            throw new NotSupportedError('has');
        },
        deleteProperty() {
            throw new NotSupportedError('deleteProperty');
        },
    };
}

export function createIndexedView(target: IndexedAccess): IndexedView {
    return new Proxy<IndexedView>({}, indexedHandler(target));
}
