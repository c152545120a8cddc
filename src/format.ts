/**
 * @module linear-dict/format
 * @description
 * Numeric format specifications of the shape `[sign][0][width][.precision][type]`,
 * applied independently to the real and imaginary parts of coefficients.
 *
 * | type      | output                                               |
 * |-----------|------------------------------------------------------|
 * | `f` `F`   | fixed point, `precision` decimals (default 6)        |
 * | `e` `E`   | exponent notation, at least two exponent digits      |
 * | `g` `G`   | `precision` significant digits, trailing zeros cut   |
 * | `%`       | fixed point of `value * 100`, followed by `%`        |
 * | *(none)*  | shortest round-trip text (`1.0`, `0.1`, `1e+16`)     |
 */

import { DEFAULT_PRECISION } from './config';
import { FormatSpecError } from './errors';

// ============================================================================
// 1. SPEC PARSING
// ============================================================================

type SignMode = '+' | '-' | ' ';
type FormatType = '' | 'f' | 'F' | 'e' | 'E' | 'g' | 'G' | '%';

interface FormatSpec {
    readonly sign: SignMode;
    readonly zeroPad: boolean;
    readonly width: number;
    readonly precision: number | undefined;
    readonly type: FormatType;
}

const SPEC_PATTERN = /^([+\- ])?(0)?(\d+)?(?:\.(\d+))?([fFeEgG%])?$/;

function isSignMode(s: string): s is SignMode {
    return s === '+' || s === '-' || s === ' ';
}

function isFormatType(s: string): s is FormatType {
    return s === '' || 'fFeEgG%'.includes(s);
}

function parseFormatSpec(spec: string): FormatSpec {
    const m = SPEC_PATTERN.exec(spec);
    if (!m) throw new FormatSpecError(spec, 'expected [sign][0][width][.precision][type]');

    const [, sign = '-', zero, width, precision, type = ''] = m;
    if (!isSignMode(sign) || !isFormatType(type)) {
        throw new FormatSpecError(spec, 'unsupported sign or type');
    }
    const parsedPrecision = precision === undefined ? undefined : Number(precision);
    if (parsedPrecision !== undefined && parsedPrecision > 100) {
        throw new FormatSpecError(spec, 'precision too large');
    }
    return {
        sign,
        zeroPad: zero !== undefined,
        width: width === undefined ? 0 : Number(width),
        precision: parsedPrecision,
        type
    };
}

// ============================================================================
// 2. DIGIT GENERATION (magnitudes only, sign handled by the caller)
// ============================================================================

/** Pads the exponent of a JS exponential string to two digits: `1e+0` -> `1e+00`. */
function padExponent(text: string): string {
    return text.replace(/e([+-])(\d)$/, (_, sign: string, digit: string) => `e${sign}0${digit}`);
}

function stripTrailingZeros(text: string): string {
    if (!text.includes('.')) return text;
    return text.replace(/\.?0+$/, '');
}

const bits = new DataView(new ArrayBuffer(8));

/** Splits a finite, non-negative double into `mantissa * 2 ** exponent` exactly. */
function decompose(abs: number): { mantissa: bigint; exponent: number } {
    bits.setFloat64(0, abs);
    const hi = bits.getUint32(0);
    const lo = bits.getUint32(4);
    const biased = (hi >>> 20) & 0x7ff;
    const fraction = (BigInt(hi & 0xfffff) << 32n) | BigInt(lo);

    if (biased === 0) return { mantissa: fraction, exponent: -1074 };
    return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * `abs * 10 ** power` rounded to an integer, computed on the exact binary
 * value. Exact halves round to even.
 */
function roundScaled(abs: number, power: number): bigint {
    const { mantissa, exponent } = decompose(abs);
    let num = mantissa;
    let den = 1n;
    if (exponent >= 0) num <<= BigInt(exponent);
    else den <<= BigInt(-exponent);
    if (power >= 0) num *= 10n ** BigInt(power);
    else den *= 10n ** BigInt(-power);

    const q = num / den;
    const twice = (num % den) * 2n;
    if (twice > den || (twice === den && q % 2n === 1n)) return q + 1n;
    return q;
}

/** Fixed point with `decimals` digits after the point. Never switches to exponent form. */
function fixedMagnitude(abs: number, decimals: number): string {
    const digits = roundScaled(abs, decimals).toString().padStart(decimals + 1, '0');
    if (decimals === 0) return digits;
    return `${digits.slice(0, -decimals)}.${digits.slice(-decimals)}`;
}

/** `d.ddd e±XX` with `decimals` digits after the point. */
function exponentialMagnitude(abs: number, decimals: number): string {
    let exp = abs === 0 ? 0 : Number(abs.toExponential(decimals).split('e')[1]);
    let digits = roundScaled(abs, decimals - exp).toString();
    if (digits.length > decimals + 1) {
        exp += 1;
        digits = roundScaled(abs, decimals - exp).toString();
    }
    digits = digits.padStart(decimals + 1, '0');

    const mantissa = decimals === 0 ? digits : `${digits[0]}.${digits.slice(1)}`;
    return `${mantissa}e${exp < 0 ? '-' : '+'}${String(Math.abs(exp)).padStart(2, '0')}`;
}

/** Shortest text that reads back to the same double. */
function reprMagnitude(abs: number): string {
    const [mantissa, expText] = abs.toExponential().split('e');
    const exp = Number(expText);
    const digits = mantissa.replace('.', '');

    if (exp < -4 || exp >= 16) {
        return padExponent(`${mantissa}e${exp < 0 ? '-' : '+'}${Math.abs(exp)}`);
    }
    if (exp < 0) {
        return `0.${'0'.repeat(-exp - 1)}${digits}`;
    }
    const intPart = digits.slice(0, exp + 1).padEnd(exp + 1, '0');
    const fracPart = digits.slice(exp + 1);
    return `${intPart}.${fracPart || '0'}`;
}

/**
 * `precision` significant digits, trailing zeros cut.
 * With `keepPoint` (empty type with a precision) fixed output keeps at least
 * one fractional digit and exponent form starts one digit earlier.
 */
function generalMagnitude(abs: number, precision: number, keepPoint = false): string {
    const p = precision === 0 ? 1 : precision;
    const [mantissa, expText] = exponentialMagnitude(abs, p - 1).split('e');
    const exp = Number(expText);
    const limit = keepPoint ? p - 1 : p;

    if (exp >= -4 && exp < limit) {
        const fixed = stripTrailingZeros(fixedMagnitude(abs, p - 1 - exp));
        return keepPoint && !fixed.includes('.') ? `${fixed}.0` : fixed;
    }
    return `${stripTrailingZeros(mantissa)}e${expText}`;
}

function formatMagnitude(abs: number, spec: FormatSpec, integer: boolean): string {
    if (Number.isNaN(abs)) return 'nan';
    if (!Number.isFinite(abs)) return 'inf';

    const precision = spec.precision ?? DEFAULT_PRECISION;
    switch (spec.type) {
        case 'f':
        case 'F':
            return fixedMagnitude(abs, precision);
        case 'e':
        case 'E':
            return exponentialMagnitude(abs, precision);
        case 'g':
        case 'G':
            return generalMagnitude(abs, precision);
        case '%':
            return `${fixedMagnitude(abs * 100, precision)}%`;
        case '':
            if (spec.precision !== undefined) return generalMagnitude(abs, spec.precision, true);
            return integer ? String(abs) : reprMagnitude(abs);
    }
}

// ============================================================================
// 3. PUBLIC API
// ============================================================================

/**
 * Formats a number under a format specification.
 * @param integer Treat `value` as an integer literal: with an empty type it
 * prints without a decimal point (`0` rather than `0.0`).
 */
function formatNumber(value: number, spec: string | FormatSpec, integer = false): string {
    const parsed = typeof spec === 'string' ? parseFormatSpec(spec) : spec;

    const negative = value < 0 || Object.is(value, -0);
    let body = formatMagnitude(Math.abs(value), parsed, integer);
    if (parsed.type === 'F' || parsed.type === 'E' || parsed.type === 'G') body = body.toUpperCase();

    const sign = negative ? '-' : (parsed.sign === '-' ? '' : parsed.sign);
    const fill = parsed.width - sign.length - body.length;
    if (fill <= 0) return sign + body;
    return parsed.zeroPad
        ? sign + '0'.repeat(fill) + body
        : ' '.repeat(fill) + sign + body;
}

/** Shortest round-trip text of a number, integral values without `.0`. */
function reprNumber(value: number): string {
    const text = formatNumber(value, '');
    return text.endsWith('.0') ? text.slice(0, -2) : text;
}

/** Reads formatted output back; `true` when it denotes zero. */
function isFormattedZero(text: string): boolean {
    return Number(text.replace('%', '')) === 0;
}

export {
    formatNumber,
    parseFormatSpec,
    reprNumber,
    isFormattedZero
};
export type { FormatSpec, FormatType, SignMode };
