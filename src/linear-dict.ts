/**
 * @module linear-dict
 * @description
 * Linear combination of abstract vectors with complex coefficients.
 *
 * Keys represent the vectors, values their coefficients. Keys are opaque:
 * the only relation between them that is ever used is equality (plus a total
 * order for display). In particular keys may be linearly dependent; nothing
 * is reduced or merged.
 *
 * Contract: **Zero-Elision**. After any public operation no stored
 * coefficient is exactly `0+0j`. Coefficients that are merely small survive
 * until an explicit `clean(atol)`.
 */

import { Complex } from './complex';
import type { Scalar } from './complex';
import { DEFAULT_APPROX_ATOL, DEFAULT_CLEAN_ATOL, DEFAULT_FORMAT_SPEC } from './config';
import { formatNumber, isFormattedZero, parseFormatSpec } from './format';
import type { FormatSpec } from './format';
import { HashMap, compare } from './hash';
import type { Key } from './hash';

// ============================================================================
// 1. TYPES
// ============================================================================

/** Terms accepted by the constructor and `update`: pairs, a Map, or another LinearDict. */
type Terms<K extends Key> = Iterable<readonly [K, Scalar]>;

/** Returned by comparisons whose operand is not a LinearDict. */
const NOT_COMPARABLE = Symbol('NOT_COMPARABLE');
type NotComparable = typeof NOT_COMPARABLE;

/** `true`/`false`, or `NOT_COMPARABLE` for an operand of another type. */
type Comparison = boolean | NotComparable;

// ============================================================================
// 2. COEFFICIENT RENDERING
// ============================================================================

function formatCoefficient(spec: FormatSpec, coefficient: Complex): string {
    const realStr = formatNumber(coefficient.re, spec);
    const imagStr = formatNumber(coefficient.im, spec);
    const realZero = isFormattedZero(realStr);
    const imagZero = isFormattedZero(imagStr);

    if (realZero && imagZero) return '';
    if (imagZero) return realStr;
    if (realZero) return `${imagStr}j`;
    if (realStr[0] === '-' && imagStr[0] === '-') {
        return `-(${realStr.slice(1)}+${imagStr.slice(1)}j)`;
    }
    if (imagStr[0] === '+' || imagStr[0] === '-') return `(${realStr}${imagStr}j)`;
    return `(${realStr}+${imagStr}j)`;
}

function formatTerm<K extends Key>(spec: FormatSpec, vector: K, coefficient: Complex): string {
    const coefficientStr = formatCoefficient(spec, coefficient);
    if (!coefficientStr) return '';
    const result = `${coefficientStr}*${String(vector)}`;
    if (result[0] === '+' || result[0] === '-') return result;
    return `+${result}`;
}

// ============================================================================
// 3. LINEAR DICT
// ============================================================================

/**
 * A sparse linear combination `c1*v1 + c2*v2 + ...`.
 *
 * Wraps a `HashMap` rather than extending one: every write goes through
 * `set` or an explicit `clean(0)` so the Zero-Elision contract holds.
 *
 * Two different ways to combine terms exist and must not be confused:
 * - construction and `update` **overwrite** (last write wins),
 * - `iadd` / `add` **sum** coefficients of shared keys.
 *
 * @template K The vector type.
 */
class LinearDict<K extends Key> implements Iterable<[K, Complex]> {

    private _terms: HashMap<K, Complex> = new HashMap<K, Complex>();

    /**
     * Initializes the combination from a collection of terms.
     * Repeated keys overwrite each other; they are NOT summed.
     */
    constructor(terms: Terms<K> = []) {
        this.update(terms);
    }

    /** String-keyed convenience constructor: `LinearDict.fromRecord({ X: 1, Z: -1 })`. */
    static fromRecord(record: Readonly<Record<string, Scalar>>): LinearDict<string> {
        return new LinearDict<string>(Object.entries(record));
    }

    /** Assigns the same coefficient (normalized to `Complex`) to every vector. */
    static fromKeys<K extends Key>(vectors: Iterable<K>, coefficient: Scalar = 0): LinearDict<K> {
        const c = Complex.from(coefficient);
        const terms: [K, Complex][] = [];
        for (const v of vectors) terms.push([v, c]);
        return new LinearDict<K>(terms);
    }

    /** Left scalar multiplication, `scalar * dict`. */
    static scale<K extends Key>(scalar: Scalar, dict: LinearDict<K>): LinearDict<K> {
        return dict.mul(scalar);
    }

    // ------------------------------------------------------------------------
    // Lookup & Membership
    // ------------------------------------------------------------------------

    /**
     * Returns the coefficient of `vector`, or `fallback` if it is absent or
     * exactly zero.
     */
    get(vector: K): Complex;
    get<D>(vector: K, fallback: D): Complex | D;
    get<D>(vector: K, fallback?: D): Complex | D {
        const c = this._terms.get(vector);
        if (c === undefined || c.isZero) return fallback === undefined ? Complex.ZERO : fallback;
        return c;
    }

    /** Subscript read. Missing vectors read as zero. */
    at(vector: K): Complex {
        return this._terms.get(vector) ?? Complex.ZERO;
    }

    /** Subscript write. Setting a coefficient to zero removes the term. */
    set(vector: K, coefficient: Scalar): void {
        const c = Complex.from(coefficient);
        if (!c.isZero) {
            this._terms.set(vector, c);
            return;
        }
        this._terms.delete(vector);
    }

    delete(vector: K): boolean {
        return this._terms.delete(vector);
    }

    /** True iff `vector` has a nonzero coefficient. */
    has(vector: K): boolean {
        const c = this._terms.get(vector);
        return c !== undefined && !c.isZero;
    }

    // ------------------------------------------------------------------------
    // Bulk Update & Cleanup
    // ------------------------------------------------------------------------

    /** Overwrites terms from `terms` (last write wins), then drops exact zeros. */
    update(terms: Terms<K>): this {
        for (const [vector, coefficient] of terms) {
            this._terms.set(vector, Complex.from(coefficient));
        }
        return this.clean(0);
    }

    /** Removes terms with coefficients of absolute value `atol` or less. */
    clean(atol: number = DEFAULT_CLEAN_ATOL): this {
        this._terms.retain((_, c) => !(c.abs() <= atol));
        return this;
    }

    copy(): LinearDict<K> {
        const result = new LinearDict<K>();
        result._terms = this._terms.clone();
        return result;
    }

    // ------------------------------------------------------------------------
    // Enumeration (over an exact-zero-cleaned snapshot)
    // ------------------------------------------------------------------------

    private snapshot(): HashMap<K, Complex> {
        const snap = this._terms.clone();
        snap.retain((_, c) => !c.isZero);
        return snap;
    }

    keys(): K[] { return this.snapshot().keys(); }
    values(): Complex[] { return this.snapshot().values(); }
    entries(): [K, Complex][] { return [...this.snapshot()]; }

    [Symbol.iterator](): Iterator<[K, Complex]> {
        return this.snapshot()[Symbol.iterator]();
    }

    /** Number of terms with a nonzero coefficient. */
    get size(): number {
        let n = 0;
        for (const [, c] of this._terms) {
            if (!c.isZero) n++;
        }
        return n;
    }

    /** True iff every coefficient is zero (the combination is falsy). */
    isEmpty(): boolean {
        for (const [, c] of this._terms) {
            if (!c.isZero) return false;
        }
        return true;
    }

    // ------------------------------------------------------------------------
    // Arithmetic
    // ------------------------------------------------------------------------

    /** In-place vector addition. Shared vectors have their coefficients summed. */
    iadd(other: LinearDict<K>): this {
        for (const [vector, otherCoefficient] of other) {
            this._terms.set(vector, this.at(vector).add(otherCoefficient));
        }
        return this.clean(0);
    }

    add(other: LinearDict<K>): LinearDict<K> {
        return this.copy().iadd(other);
    }

    isub(other: LinearDict<K>): this {
        for (const [vector, otherCoefficient] of other) {
            this._terms.set(vector, this.at(vector).sub(otherCoefficient));
        }
        return this.clean(0);
    }

    sub(other: LinearDict<K>): LinearDict<K> {
        return this.copy().isub(other);
    }

    neg(): LinearDict<K> {
        const terms: [K, Complex][] = [];
        for (const [v, c] of this) terms.push([v, c.neg()]);
        return new LinearDict<K>(terms);
    }

    /** In-place scalar multiplication. Multiplying by zero empties the combination. */
    imul(scalar: Scalar): this {
        const a = Complex.from(scalar);
        for (const [v, c] of this) this._terms.set(v, c.mul(a));
        return this.clean(0);
    }

    mul(scalar: Scalar): LinearDict<K> {
        return this.copy().imul(scalar);
    }

    /** @throws {ZeroDivisionError} when `scalar` is zero. */
    idiv(scalar: Scalar): this {
        return this.imul(Complex.ONE.div(scalar));
    }

    /** `this * (1 / scalar)`. @throws {ZeroDivisionError} when `scalar` is zero. */
    div(scalar: Scalar): LinearDict<K> {
        return this.mul(Complex.ONE.div(scalar));
    }

    // ------------------------------------------------------------------------
    // Equality
    // ------------------------------------------------------------------------

    /** Vectors present in either combination, each once. */
    private unionKeys(other: LinearDict<K>): K[] {
        const all = this.keys();
        for (const v of other.keys()) {
            if (!this.has(v)) all.push(v);
        }
        return all;
    }

    /**
     * Checks whether two linear combinations are exactly equal.
     * Presence or absence of zero terms does not affect the outcome.
     * Sensitive to floating point error; see `approxEq`.
     */
    eq(other: unknown): Comparison {
        if (!(other instanceof LinearDict)) return NOT_COMPARABLE;
        const that: LinearDict<K> = other;
        return this.unionKeys(that).every(v => this.at(v).equals(that.at(v)));
    }

    ne(other: unknown): Comparison {
        const result = this.eq(other);
        return result === NOT_COMPARABLE ? result : !result;
    }

    equals(other: unknown): boolean {
        return this.eq(other) === true;
    }

    /** True iff `|this[v] - other[v]| < atol` for every vector of either side. */
    approxEq(other: unknown, atol: number = DEFAULT_APPROX_ATOL): Comparison {
        if (!(other instanceof LinearDict)) return NOT_COMPARABLE;
        const that: LinearDict<K> = other;
        return this.unionKeys(that).every(v => this.at(v).sub(that.at(v)).abs() < atol);
    }

    isClose(other: unknown, atol: number = DEFAULT_APPROX_ATOL): boolean {
        return this.approxEq(other, atol) === true;
    }

    // ------------------------------------------------------------------------
    // Rendering
    // ------------------------------------------------------------------------

    /**
     * Renders the combination as `c1*v1+c2*v2...` with vectors in sorted order.
     * Terms whose coefficient rounds to zero under `spec` are omitted.
     */
    format(spec: string = DEFAULT_FORMAT_SPEC): string {
        const parsed = parseFormatSpec(spec);
        const sorted = this.keys().sort(compare);
        const s = sorted.map(v => formatTerm(parsed, v, this.at(v))).join('');
        if (!s) return formatNumber(0, parsed, true);
        return s[0] === '+' ? s.slice(1) : s;
    }

    toString(): string {
        return this.format(DEFAULT_FORMAT_SPEC);
    }

    inspect(): string {
        const body = this.entries()
            .map(([v, c]) => `${typeof v === 'string' ? `'${v}'` : String(v)}: ${c.toString()}`)
            .join(', ');
        return `LinearDict({${body}})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.inspect(); }
}

export { LinearDict, NOT_COMPARABLE };
export type { Comparison, NotComparable, Terms };
