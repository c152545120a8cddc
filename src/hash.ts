/**
 * @module linear-dict/hash
 * @description
 * Key contract and storage engine for linear combinations.
 * * Architecture:
 * - Engine: "Compact Layout" Hash Table (Open Addressing, linear slot search).
 * - Storage: Dense arrays for data (iteration O(N)), Uint32Array for slots.
 * - Ordering: a total order over keys, used only for display.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Primitive keys supported natively (string and number). */
type Primitive = string | number;

/**
 * Capability set every non-primitive key must provide:
 * Hash, Eq, Ord (for display) and Display.
 */
interface Structural {
    /** Stable hash code. Objects that are `equals` MUST share it. */
    readonly hashCode: number;

    /** Checks structural equality with another object. */
    equals(other: unknown): boolean;

    /**
     * Orders this key against another structural key.
     * Only consulted when both hash codes collide or for sorted output.
     */
    compare(other: Structural): number;

    toString(): string;
}

/** Anything usable as a vector in a linear combination. */
type Key = Primitive | Structural;

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

/**
 * Computes a 32-bit hash code for a given key.
 * - Numbers: Integer bit mixing (fractional part folded in).
 * - Strings: FNV-1a.
 * - Objects: Delegates to `.hashCode`.
 */
function getHashCode(val: Key): number {
    if (typeof val === 'number') {
        let h = (val | 0) ^ Math.trunc((val % 1) * 0x7fffffff);
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        return (h >>> 16) ^ h;
    }
    if (typeof val === 'string') {
        let h = 0x811c9dc5;
        for (let i = 0; i < val.length; i++) {
            h ^= val.charCodeAt(i);
            h = Math.imul(h, 0x01000193);
        }
        return h;
    }
    return val.hashCode;
}

/** Determines equality between two keys. */
function areEqual(a: Key, b: Key): boolean {
    if (a === b) return true;
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    return false;
}

/**
 * Global Comparator providing a Total Ordering over keys.
 * Used for sorted output (`LinearDict.format`).
 * * Logic:
 * 1. Identity check.
 * 2. Type segregation (Numbers < Strings < Objects).
 * 3. Natural order within primitives.
 * 4. `Structural.compare` for objects.
 */
function compare(a: Key, b: Key): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') {
        if (Number.isNaN(a) || Number.isNaN(b)) return Number.isNaN(a) ? (Number.isNaN(b) ? 0 : 1) : -1;
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    if (typeof a === 'object' && typeof b === 'object') return a.compare(b);

    const score = (v: Key) => (typeof v === 'number') ? 1 : (typeof v === 'string' ? 2 : 3);
    return score(a) - score(b);
}

/**
 * Helper to compare sequences of keys lexicographically (used for Tuples).
 */
function compareSequences(a: ReadonlyArray<Key>, b: ReadonlyArray<Key>): number {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
        const diff = compare(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return a.length - b.length;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders two structural keys of different classes: by class name, then by
 * rendered text. Custom `Structural` implementations can delegate to it for
 * operands they do not know.
 */
function compareForeign(a: Structural, b: Structural): number {
    return compareText(a.constructor.name, b.constructor.name) || compareText(a.toString(), b.toString());
}

// ============================================================================
// 3. TUPLE (Immutable)
// ============================================================================

/**
 * An immutable, fixed-length sequence of keys.
 * Useful as a composite vector, e.g. a `(qubit, pauli)` pair.
 * @template T The type of the tuple elements array.
 */
class Tuple<T extends Key[]> implements Structural {
    readonly #elements: T;
    readonly #hashCode: number;

    /**
     * Creates a new Tuple.
     * Copies the input array and freezes the internal store.
     * Computes the hash code immediately.
     */
    constructor(...elements: T) {
        this.#elements = elements.slice() as T;
        Object.freeze(this.#elements);

        let h = 1;
        for (const e of this.#elements) {
            h = (Math.imul(h, 31) + getHashCode(e)) | 0;
        }
        this.#hashCode = h;
    }

    get length() { return this.#elements.length; }
    get raw() { return this.#elements; }
    get hashCode() { return this.#hashCode; }

    /** Returns the element at the specified index. */
    get(index: number): Key | undefined { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        if (this.hashCode !== other.hashCode) return false;
        return compareSequences(this.#elements, other.raw) === 0;
    }

    compare(other: Structural): number {
        if (!(other instanceof Tuple)) return compareForeign(this, other);
        return compareSequences(this.#elements, other.raw);
    }

    toString(): string {
        return `(${this.#elements.map(e => String(e)).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 4. HASH MAP
// ============================================================================

/**
 * A Hash Map keyed by value semantics, optimized for iteration.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * Instead of storing objects like `{ key, value }`, this map maintains parallel arrays:
 * - `_keys`: Stores the keys.
 * - `_values`: Stores the values at the same index.
 * - `_hashes`: Stores the pre-calculated hashes at the same index.
 *
 * Iteration follows the dense arrays, i.e. insertion order. Deletion closes
 * the gap in the dense arrays, so the remaining entries keep their order.
 *
 * @template K Key type.
 * @template V Value type (unconstrained).
 */
class HashMap<K extends Key, V> implements Iterable<[K, V]> {

    private _keys: K[] = [];
    private _values: V[] = [];
    private _hashes: number[] = [];

    // Sparse index table for O(1) lookup (stores index + 1, 0 means empty)
    private _indices: Uint32Array;

    private _bucketCount = 16;
    private _mask = 15;

    constructor() {
        this._indices = new Uint32Array(16);
    }

    get size() { return this._keys.length; }

    /** Creates a shallow copy of this map. */
    clone(): HashMap<K, V> {
        const copy = new HashMap<K, V>();
        copy.ensureCapacity(this.size);
        for (let i = 0; i < this._keys.length; i++) {
            copy.set(this._keys[i], this._values[i]);
        }
        return copy;
    }

    ensureCapacity(capacity: number) {
        if (capacity * 1.33 > this._bucketCount) {
            let target = this._bucketCount;
            while (target * 0.75 < capacity) target *= 2;

            this._bucketCount = target;
            this._mask = this._bucketCount - 1;
            this.rebuildIndices();
        }
    }

    /** Rebuilds the index table from the dense arrays. */
    private rebuildIndices() {
        this._indices = new Uint32Array(this._bucketCount);
        for (let i = 0; i < this._hashes.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    private resize() {
        this.ensureCapacity(this._keys.length + 1);
    }

    /**
     * Returns the dense-array position of `key`, or -1.
     * Also reports the slot in `_indices` where the search stopped.
     */
    private locate(key: K, h: number): { ptr: number; slot: number } {
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return { ptr: -1, slot: idx };

            const ptr = entry - 1;
            if (this._hashes[ptr] === h && areEqual(this._keys[ptr], key)) return { ptr, slot: idx };

            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Associates the specified value with the specified key.
     * Existing keys keep their position in iteration order.
     * @complexity Amortized O(1).
     */
    set(key: K, value: V): void {
        if (this._keys.length >= this._bucketCount * 0.75) this.resize();

        const h = getHashCode(key);
        const { ptr, slot } = this.locate(key, h);
        if (ptr >= 0) {
            this._values[ptr] = value;
            return;
        }
        this._hashes.push(h);
        this._keys.push(key);
        this._values.push(value);
        this._indices[slot] = this._keys.length;
    }

    get(key: K): V | undefined {
        const { ptr } = this.locate(key, getHashCode(key));
        return ptr >= 0 ? this._values[ptr] : undefined;
    }

    has(key: K): boolean {
        return this.locate(key, getHashCode(key)).ptr >= 0;
    }

    /**
     * Removes a key-value pair.
     * The dense arrays are spliced and the index table rebuilt, so iteration
     * order of the remaining entries is unchanged.
     * @complexity O(N)
     */
    delete(key: K): boolean {
        if (this.size === 0) return false;

        const { ptr } = this.locate(key, getHashCode(key));
        if (ptr < 0) return false;

        this._keys.splice(ptr, 1);
        this._values.splice(ptr, 1);
        this._hashes.splice(ptr, 1);
        this.rebuildIndices();
        return true;
    }

    /**
     * Keeps only the entries accepted by `keep`, compacting in one pass.
     * @returns The number of removed entries.
     * @complexity O(N)
     */
    retain(keep: (key: K, value: V) => boolean): number {
        let write = 0;
        for (let read = 0; read < this._keys.length; read++) {
            if (!keep(this._keys[read], this._values[read])) continue;
            this._keys[write] = this._keys[read];
            this._values[write] = this._values[read];
            this._hashes[write] = this._hashes[read];
            write++;
        }
        const removed = this._keys.length - write;
        if (removed > 0) {
            this._keys.length = write;
            this._values.length = write;
            this._hashes.length = write;
            this.rebuildIndices();
        }
        return removed;
    }

    keys(): K[] { return this._keys.slice(); }
    values(): V[] { return this._values.slice(); }

    *[Symbol.iterator](): Iterator<[K, V]> {
        for (let i = 0; i < this._keys.length; i++) yield [this._keys[i], this._values[i]];
    }

    toString() { return `HashMap{${this.size}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// 5. PUBLIC EXPORTS
// ============================================================================

export {
    HashMap,
    Tuple,
    compare,
    compareForeign,
    getHashCode
};
export type { Key, Primitive, Structural };
