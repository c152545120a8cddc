import { describe, it } from 'node:test';
import { expect } from 'chai';
import { Complex } from '../src/complex';
import { ZeroDivisionError } from '../src/errors';

describe('Complex', () => {
    it('normalizes real scalars', () => {
        const c = Complex.from(2);
        expect(c.re).to.equal(2);
        expect(c.im).to.equal(0);
        expect(Complex.from(c)).to.equal(c);
    });

    it('adds, subtracts and multiplies', () => {
        const a = new Complex(1, 2);
        const b = new Complex(3, -1);
        expect(a.add(b).equals(new Complex(4, 1))).to.equal(true);
        expect(a.sub(b).equals(new Complex(-2, 3))).to.equal(true);
        expect(a.mul(b).equals(new Complex(5, 5))).to.equal(true);
        expect(a.mul(2).equals(new Complex(2, 4))).to.equal(true);
        expect(a.neg().equals(new Complex(-1, -2))).to.equal(true);
    });

    it('divides', () => {
        const q = new Complex(5, 5).div(new Complex(3, -1));
        expect(q.re).to.be.closeTo(1, 1e-12);
        expect(q.im).to.be.closeTo(2, 1e-12);

        const r = new Complex(1, 1).div(new Complex(0, 2));
        expect(r.re).to.be.closeTo(0.5, 1e-12);
        expect(r.im).to.be.closeTo(-0.5, 1e-12);

        expect(new Complex(6, -4).div(2).equals(new Complex(3, -2))).to.equal(true);
    });

    it('throws on division by zero', () => {
        expect(() => Complex.ONE.div(0)).to.throw(ZeroDivisionError, 'complex division by zero');
        expect(() => Complex.ONE.div(Complex.ZERO)).to.throw(ZeroDivisionError);
    });

    it('computes the modulus', () => {
        expect(new Complex(3, 4).abs()).to.equal(5);
        expect(new Complex(-2).abs()).to.equal(2);
    });

    it('compares exactly, including against real numbers', () => {
        expect(new Complex(2, 0).equals(2)).to.equal(true);
        expect(new Complex(2, 1).equals(2)).to.equal(false);
        expect(new Complex(0, -0).isZero).to.equal(true);
        expect(new Complex(0, 1e-300).isZero).to.equal(false);
        expect(new Complex(1, 2).equals('(1+2j)')).to.equal(false);
    });

    it('renders like a literal', () => {
        expect(new Complex(1, 2).toString()).to.equal('(1+2j)');
        expect(new Complex(0, 2).toString()).to.equal('2j');
        expect(new Complex(1, -0).toString()).to.equal('(1-0j)');
        expect(new Complex(-1.5, 0).toString()).to.equal('(-1.5+0j)');
        expect(new Complex(0.25, -3).toString()).to.equal('(0.25-3j)');
    });
});
