/**
 * @module linear-dict/complex
 * Immutable double-precision complex numbers used as coefficients.
 */

import { ZeroDivisionError } from './errors';
import { reprNumber } from './format';

/** Anything accepted where a coefficient is expected. */
export type Scalar = number | Complex;

export class Complex {
    static readonly ZERO = new Complex(0, 0);
    static readonly ONE = new Complex(1, 0);

    readonly re: number;
    readonly im: number;

    constructor(re: number, im = 0) {
        this.re = re;
        this.im = im;
        Object.freeze(this);
    }

    /** Normalizes a real or complex scalar to `Complex`. */
    static from(value: Scalar): Complex {
        return value instanceof Complex ? value : new Complex(value, 0);
    }

    get isZero(): boolean { return this.re === 0 && this.im === 0; }

    add(other: Scalar): Complex {
        const o = Complex.from(other);
        return new Complex(this.re + o.re, this.im + o.im);
    }

    sub(other: Scalar): Complex {
        const o = Complex.from(other);
        return new Complex(this.re - o.re, this.im - o.im);
    }

    mul(other: Scalar): Complex {
        const o = Complex.from(other);
        return new Complex(
            this.re * o.re - this.im * o.im,
            this.re * o.im + this.im * o.re
        );
    }

    /**
     * Divides by `other` using Smith's algorithm.
     * @throws {ZeroDivisionError} when `other` is exactly zero.
     */
    div(other: Scalar): Complex {
        const o = Complex.from(other);
        if (o.isZero) throw new ZeroDivisionError();

        if (Math.abs(o.re) >= Math.abs(o.im)) {
            const ratio = o.im / o.re;
            const denom = o.re + o.im * ratio;
            return new Complex(
                (this.re + this.im * ratio) / denom,
                (this.im - this.re * ratio) / denom
            );
        }
        const ratio = o.re / o.im;
        const denom = o.re * ratio + o.im;
        return new Complex(
            (this.re * ratio + this.im) / denom,
            (this.im * ratio - this.re) / denom
        );
    }

    neg(): Complex { return new Complex(-this.re, -this.im); }

    abs(): number { return Math.hypot(this.re, this.im); }

    /** Exact component-wise equality; real numbers compare as `x+0j`. */
    equals(other: unknown): boolean {
        if (typeof other === 'number') return this.re === other && this.im === 0;
        if (!(other instanceof Complex)) return false;
        return this.re === other.re && this.im === other.im;
    }

    /** `(1+2j)`, `(1-0j)`, or `2j` when the real part is `+0`. */
    toString(): string {
        if (this.re === 0 && !Object.is(this.re, -0)) return `${reprNumber(this.im)}j`;
        const negativeIm = this.im < 0 || Object.is(this.im, -0);
        return `(${reprNumber(this.re)}${negativeIm ? '-' : '+'}${reprNumber(Math.abs(this.im))}j)`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
