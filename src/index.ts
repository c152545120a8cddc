/**
 * @module linear-dict
 * Sparse linear combinations of opaque vectors with complex coefficients.
 */

export { LinearDict, NOT_COMPARABLE } from './linear-dict';
export type { Comparison, NotComparable, Terms } from './linear-dict';
export { Complex } from './complex';
export type { Scalar } from './complex';
export { HashMap, Tuple, compare, compareForeign, getHashCode } from './hash';
export type { Key, Primitive, Structural } from './hash';
export { formatNumber, parseFormatSpec } from './format';
export type { FormatSpec } from './format';
export { LinearDictError, ZeroDivisionError, FormatSpecError } from './errors';
export {
    DEFAULT_APPROX_ATOL,
    DEFAULT_CLEAN_ATOL,
    DEFAULT_FORMAT_SPEC
} from './config';
