import { toAsciiUpperCase } from "./codes";

/**
 * Brazilian federative units (UFE_SG) and their full names.
 *
 * Declaration order is the canonical order used when grouping and sorting
 * by state.
 */
export const UF_NAMES = {
    AC: "Acre",
    AL: "Alagoas",
    AP: "Amapá",
    AM: "Amazonas",
    BA: "Bahia",
    CE: "Ceará",
    DF: "Distrito Federal",
    ES: "Espírito Santo",
    GO: "Goiás",
    MA: "Maranhão",
    MT: "Mato Grosso",
    MS: "Mato Grosso do Sul",
    MG: "Minas Gerais",
    PA: "Pará",
    PB: "Paraíba",
    PR: "Paraná",
    PE: "Pernambuco",
    PI: "Piauí",
    RJ: "Rio de Janeiro",
    RN: "Rio Grande do Norte",
    RS: "Rio Grande do Sul",
    RO: "Rondônia",
    RR: "Roraima",
    SC: "Santa Catarina",
    SP: "São Paulo",
    SE: "Sergipe",
    TO: "Tocantins",
} as const;

/**
 * Two-letter state code.
 */
export type Uf = keyof typeof UF_NAMES;

/**
 * All 27 state codes, in canonical order.
 */
export const UFS: readonly Uf[] = [
    "AC", "AL", "AP", "AM", "BA", "CE", "DF", "ES", "GO",
    "MA", "MT", "MS", "MG", "PA", "PB", "PR", "PE", "PI",
    "RJ", "RN", "RS", "RO", "RR", "SC", "SP", "SE", "TO",
];

/**
 * Raised when a UF code cannot be parsed.
 */
export class UfParseError extends Error {
    readonly reason: "empty" | "wrong-length" | "invalid-code";
    /** Trimmed length, set for `wrong-length` */
    readonly length: number | undefined;
    /** Upper-cased code, set for `invalid-code` */
    readonly code: string | undefined;

    private constructor(
        message: string,
        reason: UfParseError["reason"],
        details: { length?: number; code?: string } = {},
    ) {
        super(message);
        this.name = "UfParseError";
        this.reason = reason;
        this.length = details.length;
        this.code = details.code;
    }

    static empty(): UfParseError {
        return new UfParseError("UF code is empty", "empty");
    }

    static wrongLength(length: number): UfParseError {
        return new UfParseError(
            `UF code must have length 2, got ${length}`,
            "wrong-length",
            { length },
        );
    }

    static invalidCode(code: string): UfParseError {
        return new UfParseError(`invalid UF code: ${code}`, "invalid-code", {
            code,
        });
    }
}

/**
 * Checks whether a string is one of the 27 state codes (exact case).
 */
export const isUf = (code: string): code is Uf =>
    Object.prototype.hasOwnProperty.call(UF_NAMES, code);

/**
 * Parses a state code, ignoring surrounding whitespace and the case of ASCII letters.
 *
 * @param text - Code to parse, e.g. `"sp"`.
 * @returns The state code.
 * @throws {UfParseError} When the text is blank, not two characters long, or not a known code.
 */
export const parseUf = (text: string): Uf => {
    const trimmed = text.trim();
    if (trimmed === "") throw UfParseError.empty();

    const length = [...trimmed].length;
    if (length !== 2) throw UfParseError.wrongLength(length);

    const code = toAsciiUpperCase(trimmed);
    if (!isUf(code)) throw UfParseError.invalidCode(code);

    return code;
};

/**
 * Full name of a state, e.g. `SP` → "São Paulo".
 */
export const ufFullName = (uf: Uf): string => UF_NAMES[uf];

/**
 * Orders state codes by their canonical position.
 */
export const compareUf = (a: Uf, b: Uf): number =>
    UFS.indexOf(a) - UFS.indexOf(b);
