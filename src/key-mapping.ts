import type { ElementKey, ElementPolicy } from './elements';

/** Key-presence mapping: element -> opaque marker. */
export type KeyMapping = ReadonlyMap<ElementKey, unknown>;

/**
 * Read-only face of a table shared by one or more ScalarSets.
 * Has no mutators and never exposes the table itself.
 */
class KeyMappingView implements ReadonlyMap<ElementKey, unknown> {
    readonly #table: KeyMapping;

    constructor(table: KeyMapping) {
        this.#table = table;
    }

    get size(): number { return this.#table.size; }
    has(key: ElementKey): boolean { return this.#table.has(key); }
    get(key: ElementKey): unknown { return this.#table.get(key); }

    forEach(callbackfn: (value: unknown, key: ElementKey, map: ReadonlyMap<ElementKey, unknown>) => void, thisArg?: unknown): void {
        this.#table.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
    }

    keys() { return this.#table.keys(); }
    values() { return this.#table.values(); }
    entries() { return this.#table.entries(); }
    [Symbol.iterator]() { return this.#table[Symbol.iterator](); }
}

interface Issued {
    readonly table: KeyMapping;
    readonly policy: ElementPolicy;
}

const viewsByTable = new WeakMap<KeyMapping, KeyMappingView>();
const issuedViews = new WeakMap<KeyMapping, Issued>();

/**
 * _O(1)_ Wraps `table` for export. The same table always gets the same view.
 * A table issued under both policies is recorded as `finite`, so stricter
 * sets re-validate it.
 */
export function issue(table: KeyMapping, policy: ElementPolicy): KeyMapping {
    let view = viewsByTable.get(table);
    if (view === undefined) {
        view = new KeyMappingView(table);
        viewsByTable.set(table, view);
    }
    const previous = issuedViews.get(view);
    const recorded: ElementPolicy = previous !== undefined && previous.policy !== policy ? 'finite' : policy;
    issuedViews.set(view, { table, policy: recorded });
    return view;
}

/** The table behind a view produced by `issue`, or undefined for any other mapping. */
export function redeem(mapping: KeyMapping): Issued | undefined {
    return issuedViews.get(mapping);
}
