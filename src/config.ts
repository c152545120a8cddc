/** Format specification used by `LinearDict.toString()`. */
export const DEFAULT_FORMAT_SPEC = '.3f';

/** Default magnitude below which `clean()` drops a coefficient. */
export const DEFAULT_CLEAN_ATOL = 1e-9;

/** Default tolerance of `approxEq()` / `isClose()`. */
export const DEFAULT_APPROX_ATOL = 1e-8;

/** Precision of `f`, `e`, `g` and `%` when the spec gives none. */
export const DEFAULT_PRECISION = 6;
