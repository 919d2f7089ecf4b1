import type { ElementKey } from './elements';

/**
 * Cursor over the keys of a key-presence mapping.
 *
 * Yields the keys as values. `position()` is a counter starting at 0 on every
 * pass, independent of anything the mapping itself would report.
 * The mapping is treated as a snapshot and is never written to.
 */
export class OrderedKeyIterator implements IterableIterator<ElementKey> {
    readonly #mapping: ReadonlyMap<ElementKey, unknown>;
    #cursor: Iterator<ElementKey>;
    #head: IteratorResult<ElementKey>;
    #position = 0;

    constructor(mapping: ReadonlyMap<ElementKey, unknown>) {
        this.#mapping = mapping;
        this.#cursor = mapping.keys();
        this.#head = this.#cursor.next();
    }

    get length(): number { return this.#mapping.size; }

    valid(): boolean { return !this.#head.done; }

    current(): ElementKey | undefined {
        const head = this.#head;
        return head.done ? undefined : head.value;
    }

    position(): number { return this.#position; }

    advance(): void {
        if (this.#head.done) return;
        this.#head = this.#cursor.next();
        this.#position++;
    }

    restart(): void {
        this.#cursor = this.#mapping.keys();
        this.#head = this.#cursor.next();
        this.#position = 0;
    }

    next(): IteratorResult<ElementKey> {
        const head = this.#head;
        if (head.done) return { done: true, value: undefined };
        this.advance();
        return { done: false, value: head.value };
    }

    [Symbol.iterator](): this { return this; }

    /** A separate pass of `[position, key]` pairs; does not move this cursor. */
    *entries(): Generator<[number, ElementKey], void, undefined> {
        let i = 0;
        for (const key of this.#mapping.keys()) yield [i++, key];
    }
}
