/**
 * Error taxonomy for eDNE parsing.
 *
 * Every failure raised while turning a source line into a record extends
 * {@link ParseError} and carries the 1-based line number of the offending
 * line (and the field name, where one applies), so an operator can go
 * straight to the bad row in the source file.
 *
 * @module errors
 */

/**
 * Discriminant carried by every {@link ParseError}.
 */
export type ParseErrorKind =
    | "encoding"
    | "field-count"
    | "empty-field"
    | "invalid-number"
    | "invalid-value"
    | "parse-failed";

/**
 * Base class for all eDNE parse failures.
 */
export abstract class ParseError extends Error {
    /** Discriminant for narrowing without `instanceof` */
    abstract readonly kind: ParseErrorKind;

    /** 1-based line number of the failing line, when known */
    readonly lineNumber: number | undefined;

    /**
     * @param message - Human-readable error description.
     * @param lineNumber - Line the error refers to.
     */
    protected constructor(message: string, lineNumber?: number) {
        super(message);
        this.name = new.target.name;
        this.lineNumber = lineNumber;
    }
}

/**
 * The byte sequence could not be decoded.
 *
 * The ISO-8859-1 decoder is total, so nothing in the core raises this today;
 * callers that plug in other decoders report through it.
 */
export class EncodingError extends ParseError {
    readonly kind = "encoding" as const;

    /** Decoder-supplied description of the failure */
    readonly detail: string;

    constructor(detail: string) {
        super(`encoding error: ${detail}`);
        this.detail = detail;
    }
}

/**
 * A line split into a number of fields other than its record kind expects.
 */
export class FieldCountError extends ParseError {
    readonly kind = "field-count" as const;

    /** Field count fixed by the record kind */
    readonly expected: number;
    /** Field count observed on the line */
    readonly got: number;

    constructor(expected: number, got: number, lineNumber: number) {
        super(
            `line ${lineNumber}: expected ${expected} fields, got ${got}`,
            lineNumber,
        );
        this.expected = expected;
        this.got = got;
    }
}

/**
 * A required field was empty after trimming.
 */
export class EmptyFieldError extends ParseError {
    readonly kind = "empty-field" as const;

    /** Source column name, e.g. `LOC_NU` */
    readonly fieldName: string;

    constructor(fieldName: string, lineNumber: number) {
        super(`line ${lineNumber}: field '${fieldName}' is empty`, lineNumber);
        this.fieldName = fieldName;
    }
}

/**
 * A numeric field did not hold an unsigned 32-bit integer.
 */
export class InvalidNumberError extends ParseError {
    readonly kind = "invalid-number" as const;

    readonly fieldName: string;
    /** Raw field text as it appeared on the line */
    readonly value: string;

    constructor(fieldName: string, value: string, lineNumber: number) {
        super(
            `line ${lineNumber}: field '${fieldName}' has invalid number: '${value}'`,
            lineNumber,
        );
        this.fieldName = fieldName;
        this.value = value;
    }
}

/**
 * A field's text failed its domain grammar (identifier, UF, code letter).
 */
export class InvalidValueError extends ParseError {
    readonly kind = "invalid-value" as const;

    readonly fieldName: string;
    readonly value: string;
    /** Message of the domain error that rejected the value */
    readonly reason: string;

    constructor(
        fieldName: string,
        value: string,
        reason: string,
        lineNumber: number,
    ) {
        super(
            `line ${lineNumber}: field '${fieldName}' has invalid value '${value}': ${reason}`,
            lineNumber,
        );
        this.fieldName = fieldName;
        this.value = value;
        this.reason = reason;
    }
}

/**
 * Parser-internal failure not covered by the other kinds.
 */
export class ParseFailedError extends ParseError {
    readonly kind = "parse-failed" as const;

    readonly detail: string;

    constructor(detail: string, lineNumber: number) {
        super(`line ${lineNumber}: ${detail}`, lineNumber);
        this.detail = detail;
    }
}
