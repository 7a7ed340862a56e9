import { EdneParser } from "./base";
import { InvalidValueError } from "./errors";

/**
 * Reads the fields of one split line, reporting failures against its line
 * number.
 *
 * Record kinds read fields through this class only, so every failure carries
 * the line number and the source column name.
 */
export class FieldReader {
    private readonly fields: readonly string[];

    /** 1-based line the fields come from */
    readonly lineNumber: number;

    constructor(fields: readonly string[], lineNumber: number) {
        this.fields = fields;
        this.lineNumber = lineNumber;
    }

    /** Field count of the line */
    get length(): number {
        return this.fields.length;
    }

    private raw(index: number): string {
        return this.fields[index] ?? "";
    }

    /**
     * Required text field, untrimmed.
     *
     * @throws {EmptyFieldError} When the field is blank.
     */
    required(index: number, fieldName: string): string {
        return EdneParser.requiredField(
            this.raw(index),
            fieldName,
            this.lineNumber,
        );
    }

    /**
     * Optional text field, untrimmed, or `undefined` when blank.
     */
    optional(index: number): string | undefined {
        return EdneParser.optionalField(this.raw(index));
    }

    /**
     * Required field run through a domain parser (identifier, UF, code).
     *
     * A blank field fails as empty before the domain parser sees it; an error
     * thrown by the domain parser is reported as an invalid value carrying the
     * raw field and the domain error's message.
     *
     * @throws {EmptyFieldError} When the field is blank.
     * @throws {InvalidValueError} When the domain parser rejects the field.
     */
    value<T>(index: number, fieldName: string, parse: (text: string) => T): T {
        const field = this.required(index, fieldName);
        return this.convert(field, fieldName, parse);
    }

    /**
     * Optional field run through a domain parser.
     *
     * @returns The parsed value, or `undefined` for a blank field.
     * @throws {InvalidValueError} When the field is present and rejected.
     */
    optionalValue<T>(
        index: number,
        fieldName: string,
        parse: (text: string) => T,
    ): T | undefined {
        const field = this.optional(index);
        if (field === undefined) return undefined;
        return this.convert(field, fieldName, parse);
    }

    private convert<T>(
        field: string,
        fieldName: string,
        parse: (text: string) => T,
    ): T {
        try {
            return parse(field);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new InvalidValueError(
                fieldName,
                field,
                reason,
                this.lineNumber,
            );
        }
    }
}

/**
 * Layout of one eDNE record kind.
 */
export interface RecordKind<Id, Rec> {
    /** Display name, e.g. `locality` */
    readonly name: string;
    /** Exact number of `@`-separated fields per line */
    readonly fieldCount: number;
    /** Builds a record from a line's fields, in field order */
    build(fields: FieldReader): Rec;
    /** Key the record is stored under in its collection */
    idOf(record: Rec): Id;
}

/**
 * Parses one source line into a record of the given kind.
 *
 * Pure and reentrant: the result depends only on the arguments.
 *
 * @param kind - Record kind descriptor.
 * @param line - Line text, without its line terminator.
 * @param lineNumber - 1-based line number, for error reporting.
 * @returns The record.
 * @throws {ParseError} On the first field that fails.
 */
export const parseRecordLine = <Id, Rec>(
    kind: RecordKind<Id, Rec>,
    line: string,
    lineNumber: number,
): Rec => {
    const fields = EdneParser.splitFieldsChecked(
        line,
        kind.fieldCount,
        lineNumber,
    );
    return kind.build(new FieldReader(fields, lineNumber));
};
