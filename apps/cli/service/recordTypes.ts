import {
    Addresses,
    BigUsers,
    Cpcs,
    Localities,
    Neighborhoods,
    OperationalUnits,
} from "@repo/edne-core";

/**
 * Record kinds the CLI can parse.
 */
export type RecordTypeName =
    | "locality"
    | "neighborhood"
    | "address"
    | "big-user"
    | "operational-unit"
    | "cpc";

/**
 * Names accepted on the command line for each record kind.
 */
const RECORD_TYPE_ALIASES: ReadonlyMap<string, RecordTypeName> = new Map<
    string,
    RecordTypeName
>([
    ["locality", "locality"],
    ["localidade", "locality"],
    ["neighborhood", "neighborhood"],
    ["neighbourhood", "neighborhood"],
    ["bairro", "neighborhood"],
    ["cpc", "cpc"],
    ["biguser", "big-user"],
    ["big-user", "big-user"],
    ["grande-usuario", "big-user"],
    ["grandeusuario", "big-user"],
    ["opunit", "operational-unit"],
    ["operational-unit", "operational-unit"],
    ["unidade-operacional", "operational-unit"],
    ["unidadeoperacional", "operational-unit"],
    ["address", "address"],
    ["logradouro", "address"],
    ["street", "address"],
]);

/**
 * Resolves a record type name or alias, case-insensitively.
 *
 * @param name - Name given on the command line.
 * @returns The record kind, or `undefined` for an unknown name.
 */
export const resolveRecordType = (name: string): RecordTypeName | undefined =>
    RECORD_TYPE_ALIASES.get(name.toLowerCase());

/**
 * A parsed source file, tagged with its record kind.
 */
export type ParsedSource =
    | { type: "locality"; collection: Localities }
    | { type: "neighborhood"; collection: Neighborhoods }
    | { type: "address"; collection: Addresses }
    | { type: "big-user"; collection: BigUsers }
    | { type: "operational-unit"; collection: OperationalUnits }
    | { type: "cpc"; collection: Cpcs };

/**
 * Parses ISO-8859-1 file contents as the given record kind.
 *
 * @param type - Record kind of the file.
 * @param bytes - Raw file contents.
 * @returns The parsed collection.
 * @throws {ParseError} On the first line that fails to parse.
 */
export const parseSource = (
    type: RecordTypeName,
    bytes: Uint8Array,
): ParsedSource => {
    switch (type) {
        case "locality":
            return { type, collection: Localities.fromLatin1(bytes) };
        case "neighborhood":
            return { type, collection: Neighborhoods.fromLatin1(bytes) };
        case "address":
            return { type, collection: Addresses.fromLatin1(bytes) };
        case "big-user":
            return { type, collection: BigUsers.fromLatin1(bytes) };
        case "operational-unit":
            return { type, collection: OperationalUnits.fromLatin1(bytes) };
        case "cpc":
            return { type, collection: Cpcs.fromLatin1(bytes) };
    }
};

/**
 * Plural noun for record counts, e.g. "12 localities".
 */
export const RECORD_TYPE_PLURALS: Readonly<Record<RecordTypeName, string>> = {
    locality: "localities",
    neighborhood: "neighborhoods",
    address: "streets",
    "big-user": "big users",
    "operational-unit": "operational units",
    cpc: "CPCs",
};
