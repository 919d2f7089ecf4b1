/**
 * @module scalar-set
 * @description
 * Mutable, insertion-ordered set of integers and strings backed by a
 * key-presence mapping (a native `Map` whose values are never read).
 *
 * * Contract:
 * - Membership is key presence only; marker values are opaque.
 * - Insertion order of the mapping is the iteration order of the set.
 * - "Copy-on-Share": exporting the table (`toArrayKeys`, `iterator`) is O(1);
 *   the next mutation copies the table first, so exported views are stable.
 */

import {
    assertElement,
    DEFAULT_POLICY,
    ElementKey,
    ElementPolicy,
    isIterable,
    isStricter,
    typeName,
} from './elements';
import { InvalidInputError } from './errors';
import { createIndexedView, IndexedAccess, IndexedView } from './indexed-access';
import { issue, KeyMapping, redeem } from './key-mapping';
import { OrderedKeyIterator } from './ordered-key-iterator';


/** Anything the bulk operations accept as "the other set". */
export type SetSource = ScalarSet | Iterable<ElementKey>;

export interface ScalarSetOptions {
    /** Which numbers are valid elements. Defaults to `'integer'`. */
    readonly elements?: ElementPolicy;
}

const MARKER = true;

/**
 * Copy of java.util.Set over scalar values with O(1) conversion to and from
 * a key-presence mapping.
 */
export class ScalarSet implements Iterable<ElementKey>, IndexedAccess {
    private _entries: KeyMapping;
    // Writable alias of `_entries`; null while the table is shared.
    private _owned: Map<ElementKey, unknown> | null;
    readonly policy: ElementPolicy;

    constructor(contents: SetSource = [], options: ScalarSetOptions = {}) {
        this.policy = options.elements ?? DEFAULT_POLICY;
        const table = new Map<ElementKey, unknown>();
        this._entries = table;
        this._owned = table;
        this.load(contents);
    }

    // === FACTORIES ===

    /**
     * Normalizes untyped input into a set.
     * @throws InvalidInputError naming the rejected type.
     */
    static from(contents: unknown, options: ScalarSetOptions = {}): ScalarSet {
        const set = new ScalarSet([], options);
        set.load(contents);
        return set;
    }

    /**
     * _O(1)_ for a table produced by `toArrayKeys()`, which is adopted as is.
     * Any other mapping is validated key by key and copied.
     */
    static fromKeyMapping(mapping: KeyMapping, options: ScalarSetOptions = {}): ScalarSet {
        const set = new ScalarSet([], options);
        const issued = redeem(mapping);

        if (issued !== undefined && !isStricter(set.policy, issued.policy)) {
            set._entries = issued.table;
            set._owned = null;
            return set;
        }

        return set.replace(ScalarSet.collect(mapping.keys(), set.policy));
    }

    /** _O(n)_ Union of all sources, in the order given. */
    static unionAll(sources: Iterable<SetSource>, options: ScalarSetOptions = {}): ScalarSet {
        const set = new ScalarSet([], options);
        for (const source of sources) set.addAll(source);
        return set;
    }

    /** _O(n)_ Copy of `a` keeping only the members also in `b`. */
    static intersect(a: SetSource, b: SetSource, options: ScalarSetOptions = {}): ScalarSet {
        return new ScalarSet(a, options).retainAll(b);
    }

    /**
     * Turns a set source into a key-presence mapping for reading. A ScalarSet
     * hands over its own table; iterables are validated into a new Map.
     */
    private static toKeys(source: unknown, policy: ElementPolicy): KeyMapping {
        if (source instanceof ScalarSet && !isStricter(policy, source.policy)) return source._entries;
        return ScalarSet.collectSource(source, policy);
    }

    /** Validates every element of `source` into a fresh table. */
    private static collectSource(source: unknown, policy: ElementPolicy): Map<ElementKey, unknown> {
        if (source instanceof ScalarSet) return ScalarSet.collect(source._entries.keys(), policy);
        if (isIterable(source)) return ScalarSet.collect(source, policy);
        throw new InvalidInputError(`Cannot use a '${typeName(source)}' as a set`);
    }

    /** Like `toKeys` under the loosest policy, but null where the input is not a set source. */
    private static tryKeys(source: unknown): KeyMapping | null {
        try {
            return ScalarSet.toKeys(source, 'finite');
        } catch (err) {
            if (err instanceof InvalidInputError) return null;
            throw err;
        }
    }

    private static collect(values: Iterable<unknown>, policy: ElementPolicy): Map<ElementKey, unknown> {
        const table = new Map<ElementKey, unknown>();
        for (const value of values) table.set(assertElement(value, policy), MARKER);
        return table;
    }

    // === COPY-ON-SHARE ===

    /** Replaces the contents with `source`, sharing its table when it is a ScalarSet. */
    private load(source: unknown): void {
        if (source instanceof ScalarSet && !isStricter(this.policy, source.policy)) {
            this._entries = source.share();
            this._owned = null;
            return;
        }
        this.replace(ScalarSet.collectSource(source, this.policy));
    }

    private writable(): Map<ElementKey, unknown> {
        if (this._owned === null) {
            this._owned = new Map(this._entries);
            this._entries = this._owned;
        }
        return this._owned;
    }

    private share(): KeyMapping {
        this._owned = null;
        return this._entries;
    }

    private replace(table: Map<ElementKey, unknown>): this {
        this._entries = table;
        this._owned = table;
        return this;
    }

    private derive(table: Map<ElementKey, unknown>): ScalarSet {
        return new ScalarSet([], { elements: this.policy }).replace(table);
    }

    // === java.util.Set ===

    /** _O(1)_ Adds the element if not already present. */
    add(e: ElementKey): this {
        const key = assertElement(e, this.policy);
        if (!this._entries.has(key)) this.writable().set(key, MARKER);
        return this;
    }

    /** _O(1)_ Removes the element if present. */
    remove(e: ElementKey): this {
        if (this._entries.has(e)) this.writable().delete(e);
        return this;
    }

    contains(e: ElementKey): boolean { return this._entries.has(e); }

    isEmpty(): boolean { return this._entries.size === 0; }

    /** Cardinality as a property, like native collections. */
    get size(): number { return this._entries.size; }

    /** Cardinality as a call. */
    count(): number { return this._entries.size; }

    clear(): this { return this.replace(new Map()); }

    /**
     * _O(n)_ Set union in place. Elements already present keep their position.
     */
    addAll(source: SetSource): this {
        if (source === this) return this;
        const other = ScalarSet.toKeys(source, this.policy);
        if (other.size === 0) return this;

        const table = this.writable();
        for (const key of other.keys()) table.set(key, MARKER);
        return this;
    }

    /** _O(n)_ Set difference in place. */
    removeAll(source: SetSource): this {
        const other = ScalarSet.toKeys(source, this.policy);
        const table = new Map<ElementKey, unknown>();
        for (const key of this._entries.keys()) {
            if (!other.has(key)) table.set(key, MARKER);
        }
        return this.replace(table);
    }

    /** _O(n)_ Set intersection in place. Keeps this set's order. */
    retainAll(source: SetSource): this {
        const other = ScalarSet.toKeys(source, this.policy);
        const table = new Map<ElementKey, unknown>();
        for (const key of this._entries.keys()) {
            if (other.has(key)) table.set(key, MARKER);
        }
        return this.replace(table);
    }

    /** _O(n)_ */
    containsAll(source: SetSource): boolean {
        const other = ScalarSet.toKeys(source, this.policy);
        for (const key of other.keys()) {
            if (!this._entries.has(key)) return false;
        }
        return true;
    }

    /**
     * _O(n)_ True if `other` holds exactly the same elements, in any order.
     * Values that cannot be read as a set compare unequal.
     */
    equals(other: unknown): boolean {
        if (other === this) return true;

        const keys = ScalarSet.tryKeys(other);
        if (keys === null || keys.size !== this._entries.size) return false;
        for (const key of keys.keys()) {
            if (!this._entries.has(key)) return false;
        }
        return true;
    }

    /** _O(n)_ Elements in insertion order. */
    toArray(): ElementKey[] { return [...this._entries.keys()]; }

    /**
     * _O(1)_ Read-only view of the key-presence mapping. Marker values are unspecified.
     * `ScalarSet.fromKeyMapping(s.toArrayKeys())` rebuilds `s` in O(1).
     */
    toArrayKeys(): KeyMapping { return issue(this.share(), this.policy); }

    /** Cursor producing the elements with positions 0,1,2... */
    iterator(): OrderedKeyIterator { return new OrderedKeyIterator(this.share()); }

    [Symbol.iterator](): Iterator<ElementKey> { return this.iterator(); }

    /** `[position, element]` pairs in insertion order. */
    entries(): IterableIterator<[number, ElementKey]> { return this.iterator().entries(); }

    // === INDEXED ACCESS ===

    /** Existence probe: same as `contains`, not element retrieval. */
    get(key: ElementKey): boolean { return this._entries.has(key); }

    set(key: ElementKey, present: boolean): this {
        return present ? this.add(key) : this.remove(key);
    }

    /**
     * Property-style view: `view[k]`, `view[k] = true`, `view[k] = false`.
     * `k in view` and `delete view[k]` throw NotSupportedError.
     *
     * Every string property read is a membership probe, including `toString`,
     * `valueOf` and `constructor`: the view has no methods, so `${view}` or
     * `String(view)` throw a TypeError.
     */
    indexed(): IndexedView { return createIndexedView(this); }

    // === NON-MUTATING ALGEBRA ===

    clone(): ScalarSet { return new ScalarSet(this, { elements: this.policy }); }

    union(other: SetSource): ScalarSet { return this.clone().addAll(other); }

    intersection(other: SetSource): ScalarSet { return this.clone().retainAll(other); }

    difference(other: SetSource): ScalarSet { return this.clone().removeAll(other); }

    symmetricDifference(other: SetSource): ScalarSet {
        const keys = ScalarSet.toKeys(other, this.policy);
        const table = new Map<ElementKey, unknown>();
        for (const key of this._entries.keys()) {
            if (!keys.has(key)) table.set(key, MARKER);
        }
        for (const key of keys.keys()) {
            if (!this._entries.has(key)) table.set(key, MARKER);
        }
        return this.derive(table);
    }

    isSubset(other: SetSource): boolean {
        const keys = ScalarSet.toKeys(other, this.policy);
        if (this._entries.size > keys.size) return false;
        for (const key of this._entries.keys()) {
            if (!keys.has(key)) return false;
        }
        return true;
    }

    isSuperset(other: SetSource): boolean { return this.containsAll(other); }

    toSet(): Set<ElementKey> { return new Set(this._entries.keys()); }

    toString(): string {
        if (this.isEmpty()) return '∅';
        return `{${this.toArray().map(String).join(', ')}}`;
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
