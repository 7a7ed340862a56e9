import { EmptyFieldError, FieldCountError, InvalidNumberError } from "./errors";

/**
 * Field separator used by every eDNE source file.
 */
export const FIELD_SEPARATOR = "@";

/**
 * Largest value an eDNE numeric column may hold (unsigned 32-bit).
 */
export const MAX_U32 = 0xffff_ffff;

/**
 * Unsigned decimal integer text, optionally signed with `+`.
 */
const UNSIGNED_DECIMAL = /^\+?\d+$/;

/**
 * Decodes ISO-8859-1 bytes into a string.
 *
 * Every byte maps to the code point of the same value, so the output has one
 * character per input byte and decoding cannot fail. Node's `latin1` codec is
 * used rather than `TextDecoder("latin1")`, which the WHATWG encoding standard
 * aliases to Windows-1252 and which remaps 0x80-0x9F.
 *
 * @param bytes - Raw file content.
 * @returns The decoded text.
 */
export const decodeLatin1 = (bytes: Uint8Array): string => {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
        "latin1",
    );
};

/**
 * Parses trimmed text as an unsigned 32-bit integer.
 *
 * @param text - Text to parse.
 * @returns The integer, or `undefined` when the text is not one.
 */
export const parseU32 = (text: string): number | undefined => {
    const trimmed = text.trim();
    if (!UNSIGNED_DECIMAL.test(trimmed)) return undefined;

    const value = Number(trimmed);
    return value <= MAX_U32 ? value : undefined;
};

/**
 * Generic reader for eDNE text files.
 *
 * Handles what all eDNE files share:
 * - ISO-8859-1 encoding
 * - one record per line
 * - fields separated by `@`, with an optional trailing separator
 *
 * Record-specific layouts live in the record kind descriptors.
 */
export class EdneParser {
    /** Decoded file content */
    readonly content: string;

    private constructor(content: string) {
        this.content = content;
    }

    /**
     * Creates a parser over ISO-8859-1 encoded bytes.
     *
     * @param bytes - Raw file content.
     */
    static fromLatin1(bytes: Uint8Array): EdneParser {
        return new EdneParser(decodeLatin1(bytes));
    }

    /**
     * Creates a parser over already-decoded text.
     *
     * @param content - File content.
     */
    static fromText(content: string): EdneParser {
        return new EdneParser(content);
    }

    /**
     * Iterates over the non-blank lines of the content.
     *
     * Line numbers are 1-based and count the skipped blank lines too, so they
     * always point at the physical line in the source file. Each call starts a
     * new pass over the content.
     *
     * @returns `[lineNumber, line]` pairs.
     */
    *lines(): Generator<[number, string], void, undefined> {
        const { content } = this;
        let start = 0;
        let lineNumber = 0;

        while (start < content.length) {
            // Find the end of the line
            let end = content.indexOf("\n", start);
            if (end === -1) end = content.length;

            // Count the line even when it turns out blank
            lineNumber++;
            let line = content.slice(start, end);
            if (line.endsWith("\r")) line = line.slice(0, -1);
            start = end + 1;

            // Skip blank lines
            if (line.trim() === "") continue;
            yield [lineNumber, line];
        }
    }

    /**
     * Splits a line into its fields.
     *
     * Empty fields are kept as empty strings; a trailing separator produces a
     * trailing empty field.
     *
     * @param line - Line to split.
     * @returns The fields, in order.
     */
    static splitFields(line: string): string[] {
        return line.split(FIELD_SEPARATOR);
    }

    /**
     * Splits a line and checks its field count.
     *
     * @param line - Line to split.
     * @param expected - Field count the record kind requires.
     * @param lineNumber - Line number for error reporting.
     * @returns The fields, in order.
     * @throws {FieldCountError} When the count differs from `expected`.
     */
    static splitFieldsChecked(
        line: string,
        expected: number,
        lineNumber: number,
    ): string[] {
        const fields = EdneParser.splitFields(line);
        if (fields.length !== expected) {
            throw new FieldCountError(expected, fields.length, lineNumber);
        }
        return fields;
    }

    /**
     * Returns a required field, untrimmed.
     *
     * @param field - Raw field text.
     * @param fieldName - Source column name, for error reporting.
     * @param lineNumber - Line number for error reporting.
     * @throws {EmptyFieldError} When the field is blank.
     */
    static requiredField(
        field: string,
        fieldName: string,
        lineNumber: number,
    ): string {
        if (field.trim() === "") {
            throw new EmptyFieldError(fieldName, lineNumber);
        }
        return field;
    }

    /**
     * Returns an optional field, untrimmed, or `undefined` when it is blank.
     *
     * @param field - Raw field text.
     */
    static optionalField(field: string): string | undefined {
        return field.trim() === "" ? undefined : field;
    }

    /**
     * Parses a required numeric field.
     *
     * @param field - Raw field text.
     * @param fieldName - Source column name, for error reporting.
     * @param lineNumber - Line number for error reporting.
     * @throws {InvalidNumberError} When the field is not an unsigned 32-bit integer.
     */
    static parseNumber(
        field: string,
        fieldName: string,
        lineNumber: number,
    ): number {
        const value = parseU32(field);
        if (value === undefined) {
            throw new InvalidNumberError(fieldName, field, lineNumber);
        }
        return value;
    }

    /**
     * Parses an optional numeric field.
     *
     * @param field - Raw field text.
     * @param fieldName - Source column name, for error reporting.
     * @param lineNumber - Line number for error reporting.
     * @returns The number, or `undefined` for a blank field.
     * @throws {InvalidNumberError} When the field is present but not a number.
     */
    static parseOptionalNumber(
        field: string,
        fieldName: string,
        lineNumber: number,
    ): number | undefined {
        if (field.trim() === "") return undefined;
        return EdneParser.parseNumber(field, fieldName, lineNumber);
    }
}
