import { describe, it } from 'node:test';
import { expect } from 'chai';
import { HashMap, Tuple, compare, compareForeign, getHashCode } from '../src/hash';
import type { Structural } from '../src/hash';

/** A structural key whose hash collides with `new Tuple(text)`. */
class Label implements Structural {
    readonly hashCode: number;
    constructor(readonly text: string) { this.hashCode = new Tuple(text).hashCode; }
    equals(other: unknown): boolean { return other instanceof Label && other.text === this.text; }
    compare(other: Structural): number {
        if (other instanceof Label) return this.text < other.text ? -1 : this.text > other.text ? 1 : 0;
        return compareForeign(this, other);
    }
    toString(): string { return this.text; }
}

// ============================================================================
// 1. VALUE SEMANTICS OF KEYS
// ============================================================================
describe('Key value semantics', () => {
    it('hashes strings by value', () => {
        const str1 = 'hello';
        const str2 = 'hel' + 'lo';
        expect(getHashCode(str1)).to.equal(getHashCode(str2));
    });

    it('treats tuples with equal elements as equal', () => {
        const a = new Tuple('q', 0);
        const b = new Tuple('q', 0);
        expect(a).to.not.equal(b);
        expect(a.equals(b)).to.equal(true);
        expect(a.hashCode).to.equal(b.hashCode);
        expect(a.equals(new Tuple('q', 1))).to.equal(false);
        expect(a.equals('(q, 0)')).to.equal(false);
    });

    it('renders tuples as parenthesized lists', () => {
        expect(new Tuple('q', 0).toString()).to.equal('(q, 0)');
        expect(new Tuple(new Tuple(1, 2), 'x').toString()).to.equal('((1, 2), x)');
    });
});

// ============================================================================
// 2. TOTAL ORDER
// ============================================================================
describe('compare', () => {
    it('orders numbers before strings before objects', () => {
        expect(compare(10, 'a')).to.be.lessThan(0);
        expect(compare('a', new Tuple(1))).to.be.lessThan(0);
        expect(compare(new Tuple(1), 3)).to.be.greaterThan(0);
    });

    it('orders primitives naturally', () => {
        expect(compare(2, 10)).to.be.lessThan(0);
        expect(compare('B', 'A')).to.be.greaterThan(0);
        expect(compare('A', 'A')).to.equal(0);
    });

    it('orders tuples lexicographically, shorter prefix first', () => {
        expect(compare(new Tuple(1, 2), new Tuple(1, 3))).to.be.lessThan(0);
        expect(compare(new Tuple(1), new Tuple(1, 0))).to.be.lessThan(0);
        expect(compare(new Tuple('q', 1), new Tuple('q', 1))).to.equal(0);
    });

    it('sorts a mixed key list deterministically', () => {
        const sorted = ['b', 3, new Tuple(0), 'a', 1].sort(compare).map(String);
        expect(sorted).to.deep.equal(['1', '3', 'a', 'b', '(0)']);
    });

    it('orders structural keys of different classes even when hashes collide', () => {
        const label = new Label('x');
        const tuple = new Tuple('x');
        expect(label.hashCode).to.equal(tuple.hashCode);
        expect(compare(tuple, label)).to.be.greaterThan(0);
        expect(compare(label, tuple)).to.be.lessThan(0);
        expect([tuple, label].sort(compare).map(String)).to.deep.equal(['x', '(x)']);
        expect([label, tuple].sort(compare).map(String)).to.deep.equal(['x', '(x)']);
    });
});

// ============================================================================
// 3. HASH MAP
// ============================================================================
describe('HashMap', () => {
    it('looks up structural keys with fresh instances', () => {
        const delta = new HashMap<Tuple<[number, string]>, number>();
        delta.set(new Tuple(0, 'a'), 1);
        delta.set(new Tuple(0, 'b'), 2);

        expect(delta.size).to.equal(2);
        expect(delta.get(new Tuple(0, 'a'))).to.equal(1);
        expect(delta.get(new Tuple(0, 'b'))).to.equal(2);
        expect(delta.get(new Tuple(0, 'c'))).to.equal(undefined);
    });

    it('overwrites existing keys in place', () => {
        const m = new HashMap<string, number>();
        m.set('a', 1);
        m.set('b', 2);
        m.set('a', 3);
        expect(m.keys()).to.deep.equal(['a', 'b']);
        expect(m.values()).to.deep.equal([3, 2]);
    });

    it('keeps insertion order on delete', () => {
        const m = new HashMap<string, number>();
        m.set('a', 1);
        m.set('b', 2);
        m.set('c', 3);

        expect(m.delete('a')).to.equal(true);
        expect(m.delete('zz')).to.equal(false);
        expect(m.keys()).to.deep.equal(['b', 'c']);
        expect([...m]).to.deep.equal([['b', 2], ['c', 3]]);
        expect(m.get('c')).to.equal(3);
        m.set('a', 4);
        expect(m.keys()).to.deep.equal(['b', 'c', 'a']);
    });

    it('retains matching entries in order', () => {
        const m = new HashMap<number, number>();
        for (let i = 0; i < 10; i++) m.set(i, i);

        expect(m.retain((k) => k % 3 === 0)).to.equal(6);
        expect(m.keys()).to.deep.equal([0, 3, 6, 9]);
        expect(m.get(6)).to.equal(6);
        expect(m.has(1)).to.equal(false);
        expect(m.retain(() => true)).to.equal(0);
    });

    it('survives growth and interleaved deletion', () => {
        const m = new HashMap<number, number>();
        for (let i = 0; i < 1000; i++) m.set(i, i * 2);
        for (let i = 0; i < 1000; i += 2) m.delete(i);

        expect(m.size).to.equal(500);
        expect(m.get(999)).to.equal(1998);
        expect(m.get(2)).to.equal(undefined);
        expect(m.has(1)).to.equal(true);
        expect(m.has(0)).to.equal(false);
        for (let i = 1; i < 1000; i += 2) {
            expect(m.get(i)).to.equal(i * 2);
        }
    });

    it('clones independently', () => {
        const m = new HashMap<string, number>();
        m.set('x', 1);
        const copy = m.clone();
        copy.set('x', 5);
        copy.set('y', 6);

        expect(m.get('x')).to.equal(1);
        expect(m.size).to.equal(1);
        expect(copy.size).to.equal(2);
    });

    it('distinguishes fractional number keys', () => {
        const m = new HashMap<number, string>();
        m.set(0.5, 'half');
        m.set(0.25, 'quarter');
        expect(m.get(0.5)).to.equal('half');
        expect(m.get(0.25)).to.equal('quarter');
        expect(m.get(0)).to.equal(undefined);
    });
});
