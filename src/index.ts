/**
 * @module scalar-set
 * Insertion-ordered set of integers and strings with java.util.Set style
 * algebra and O(1) conversion to and from a key-presence mapping.
 */

import { ElementKey } from './elements';
import { ScalarSet, ScalarSetOptions } from './scalar-set';

export { ScalarSet } from './scalar-set';
export type { ScalarSetOptions, SetSource } from './scalar-set';
export type { KeyMapping } from './key-mapping';
export { OrderedKeyIterator } from './ordered-key-iterator';
export type { IndexedAccess, IndexedView } from './indexed-access';
export { InvalidInputError, NotSupportedError } from './errors';
export { assertElement, isElement, DEFAULT_POLICY } from './elements';
export type { ElementKey, ElementPolicy } from './elements';

export function emptySet(options?: ScalarSetOptions): ScalarSet { return new ScalarSet([], options); }
export function singleton(element: ElementKey, options?: ScalarSetOptions): ScalarSet { return new ScalarSet([element], options); }
