/**
 * Base class of every error thrown by the library.
 */
export class LinearDictError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Complex (or real) division by a zero divisor. */
export class ZeroDivisionError extends LinearDictError {
    constructor(message = 'complex division by zero') {
        super(message);
    }
}

/** A numeric format specification that cannot be parsed. */
export class FormatSpecError extends LinearDictError {
    readonly spec: string;

    constructor(spec: string, reason: string) {
        super(`InvalidFormat: '${spec}' (${reason})`);
        this.spec = spec;
    }
}
