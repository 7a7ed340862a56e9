/**
 * Raised when an enumeration code is not one of its known values.
 */
export class InvalidCodeError extends Error {
    /** Enumeration label, e.g. `locality type` */
    readonly enumeration: string;
    /** Rejected code, trimmed and case-folded where the enumeration folds case */
    readonly code: string;

    constructor(enumeration: string, code: string) {
        super(`invalid ${enumeration} code: '${code}'`);
        this.name = "InvalidCodeError";
        this.enumeration = enumeration;
        this.code = code;
    }
}

/**
 * Upper-cases ASCII letters only; other characters are left as they are.
 *
 * `toUpperCase` would map letters such as `ı` or `ſ` onto ASCII codes.
 */
export const toAsciiUpperCase = (text: string): string =>
    text.replace(/[a-z]/g, (letter) => letter.toUpperCase());

/**
 * Builds a parser for a string enum whose member values are the source codes.
 *
 * @param enumeration - Label used in error messages.
 * @param values - Enum object, e.g. `LocalityType`.
 * @param foldCase - Upper-case ASCII letters before matching (letter codes only).
 * @returns A function parsing trimmed text into an enum member.
 */
export const codeParser = <Code extends string>(
    enumeration: string,
    values: Record<string, Code>,
    foldCase: boolean,
): ((text: string) => Code) => {
    const known: readonly Code[] = Object.values(values);
    const isCode = (code: string): code is Code =>
        known.some((value) => value === code);

    return (text: string): Code => {
        const trimmed = text.trim();
        const code = foldCase ? toAsciiUpperCase(trimmed) : trimmed;
        if (!isCode(code)) throw new InvalidCodeError(enumeration, code);
        return code;
    };
};
