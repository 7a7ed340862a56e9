import { codeParser } from "./codes";
import type { LocalityId } from "./identifiers";
import type { Uf } from "./uf";

/**
 * Coding level of a locality (LOC_IN_SIT).
 */
export enum LocalitySituation {
    /** Not coded at street level; the locality has a single general CEP */
    NotCoded = "0",
    /** Coded at street level */
    Coded = "1",
    /** District or village inside a locality coded at street level */
    DistrictOrVillage = "2",
    /** Street-level coding in progress */
    CodingInProgress = "3",
}

/**
 * Kind of locality (LOC_IN_TIPO_LOC).
 */
export enum LocalityType {
    District = "D",
    Municipality = "M",
    Village = "P",
}

/**
 * Parses a situation digit. Digits are matched as-is.
 *
 * @throws {InvalidCodeError} For anything but `0`-`3`.
 */
export const parseLocalitySituation = codeParser(
    "locality situation",
    LocalitySituation,
    false,
);

/**
 * Parses a locality type letter, case-insensitively.
 *
 * @throws {InvalidCodeError} For anything but `D`, `M` or `P`.
 */
export const parseLocalityType = codeParser("locality type", LocalityType, true);

/**
 * Municipality, district or village (LOG_LOCALIDADE).
 */
export interface Locality {
    readonly id: LocalityId;
    readonly uf: Uf;
    readonly name: string;
    /** General CEP, present when the locality is not coded at street level */
    readonly cep: string | undefined;
    readonly situation: LocalitySituation;
    readonly type: LocalityType;
    /** Locality this one is subordinate to (LOC_NU_SUB) */
    readonly subordinateTo: LocalityId | undefined;
    readonly abbreviatedName: string | undefined;
    /** IBGE municipality code (MUN_NU) */
    readonly ibgeCode: string | undefined;
}
