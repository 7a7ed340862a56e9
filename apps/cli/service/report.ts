/**
 * Report builders for the CLI commands.
 *
 * Everything here is pure: commands decide how and whether to print the
 * returned lines.
 *
 * @module report
 */

import {
    type Address,
    type BigUser,
    CEP_KIND_LABELS,
    type CepInfo,
    type CepLookup,
    type Cpc,
    displayStreet,
    type Locality,
    LocalitySituation,
    LocalityType,
    type LocalityId,
    type Neighborhood,
    type OperationalUnit,
    PostBoxIndicator,
    type Uf,
    UFS,
    ufFullName,
} from "@repo/edne-core";
import { type ParsedSource, RECORD_TYPE_PLURALS } from "./recordTypes";

// ---------------------------------------------------------------------------------
// Report Types
// ---------------------------------------------------------------------------------

/**
 * First records of one state, sorted by id.
 */
export interface StateSample {
    uf: Uf;
    /** Records of the state */
    count: number;
    /** Description lines of the listed records */
    lines: string[];
    /** Records of the state left out of `lines` */
    remaining: number;
}

export interface SummaryTable {
    title: string;
    values: Record<string, string | number>;
}

/**
 * Everything the `parse` command prints about one file.
 */
export interface ParseReport {
    /** Plural noun for the records, e.g. "localities" */
    label: string;
    total: number;
    states: StateSample[];
    summary: SummaryTable[];
}

// ---------------------------------------------------------------------------------
// Record Descriptions
// ---------------------------------------------------------------------------------

const LOCALITY_TYPE_LABELS: Record<LocalityType, string> = {
    [LocalityType.District]: "District",
    [LocalityType.Municipality]: "Municipality",
    [LocalityType.Village]: "Village",
};

const LOCALITY_SITUATION_LABELS: Record<LocalitySituation, string> = {
    [LocalitySituation.NotCoded]: "Not coded",
    [LocalitySituation.Coded]: "Coded at street level",
    [LocalitySituation.DistrictOrVillage]: "District or village",
    [LocalitySituation.CodingInProgress]: "Coding in progress",
};

export const describeLocality = (locality: Locality): string[] => {
    let line = `[${locality.id}] ${locality.name}`;
    if (locality.cep !== undefined) line += ` (CEP: ${locality.cep})`;
    line += ` - ${LOCALITY_TYPE_LABELS[locality.type]}`;
    if (locality.abbreviatedName !== undefined) {
        line += ` [${locality.abbreviatedName}]`;
    }
    return [line];
};

export const describeNeighborhood = (neighborhood: Neighborhood): string[] => {
    let line = `[${neighborhood.id}] ${neighborhood.name} (Locality: ${neighborhood.localityId})`;
    if (neighborhood.abbreviatedName !== undefined) {
        line += ` [${neighborhood.abbreviatedName}]`;
    }
    return [line];
};

export const describeAddress = (address: Address): string[] => {
    let line = `[${address.id}] ${displayStreet(address)} (CEP: ${address.cep})`;
    if (address.complement !== undefined) line += ` - ${address.complement}`;
    return [line];
};

/**
 * Describes a big user or operational unit, with its CEP and references on
 * indented lines.
 */
const describeAddressee = (addressee: BigUser | OperationalUnit): string[] => {
    const references =
        addressee.streetId === undefined
            ? `Locality: ${addressee.localityId}`
            : `Locality: ${addressee.localityId}, Street: ${addressee.streetId}`;
    return [
        `[${addressee.id}] ${addressee.name}`,
        `    Address: ${addressee.address}`,
        `    CEP: ${addressee.cep} (${references})`,
    ];
};

export const describeBigUser = (bigUser: BigUser): string[] =>
    describeAddressee(bigUser);

export const describeOperationalUnit = (unit: OperationalUnit): string[] => {
    const lines = describeAddressee(unit);
    if (unit.postBoxIndicator === PostBoxIndicator.Yes) {
        lines.push("    Post boxes available");
    }
    return lines;
};

export const describeCpc = (cpc: Cpc): string[] => [
    `[${cpc.id}] ${cpc.name}`,
    `    Address: ${cpc.address}`,
    `    CEP: ${cpc.cep} (Locality: ${cpc.localityId})`,
];

// ---------------------------------------------------------------------------------
// Parse Report
// ---------------------------------------------------------------------------------

/**
 * Groups records by state, in UF order, listing the first records of each.
 *
 * @param records - Records to group.
 * @param describe - Lines describing one record.
 * @param sampleSize - Records listed per state.
 * @returns One sample per state that has records.
 */
export const sampleByState = <Rec extends { readonly uf: Uf; readonly id: number }>(
    records: Iterable<Rec>,
    describe: (record: Rec) => string[],
    sampleSize: number,
): StateSample[] => {
    const groups = new Map<Uf, Rec[]>();
    for (const record of records) {
        const group = groups.get(record.uf);
        if (group) group.push(record);
        else groups.set(record.uf, [record]);
    }

    return UFS.flatMap((uf): StateSample[] => {
        const group = groups.get(uf);
        if (group === undefined) return [];

        const listed = [...group].sort((a, b) => a.id - b.id).slice(0, sampleSize);
        return [
            {
                uf,
                count: group.length,
                lines: listed.flatMap((record) => describe(record)),
                remaining: group.length - listed.length,
            },
        ];
    });
};

const countWhere = <Rec>(
    records: Iterable<Rec>,
    predicate: (record: Rec) => boolean,
): number => {
    let count = 0;
    for (const record of records) if (predicate(record)) count++;
    return count;
};

/**
 * Totals and per-locality spread of records that belong to a locality.
 */
const localityStatistics = (
    records: Iterable<{ readonly localityId: LocalityId }>,
    label: string,
): Record<string, string | number> => {
    const perLocality = new Map<LocalityId, number>();
    let total = 0;
    for (const record of records) {
        perLocality.set(
            record.localityId,
            (perLocality.get(record.localityId) ?? 0) + 1,
        );
        total++;
    }

    const average = perLocality.size === 0 ? 0 : total / perLocality.size;
    return {
        [`Total ${label}`]: total,
        [`Localities with ${label}`]: perLocality.size,
        [`Average ${label} per locality`]: average.toFixed(2),
    };
};

const localitySummary = (localities: Iterable<Locality>): SummaryTable[] => {
    const byType: Record<string, number> = {};
    for (const type of Object.values(LocalityType)) {
        byType[LOCALITY_TYPE_LABELS[type]] = countWhere(
            localities,
            (locality) => locality.type === type,
        );
    }

    const bySituation: Record<string, number> = {};
    for (const situation of Object.values(LocalitySituation)) {
        bySituation[LOCALITY_SITUATION_LABELS[situation]] = countWhere(
            localities,
            (locality) => locality.situation === situation,
        );
    }

    return [
        { title: "By type", values: byType },
        { title: "By situation", values: bySituation },
    ];
};

/**
 * Builds the `parse` command report for a parsed file.
 *
 * @param source - Parsed file.
 * @param sampleSize - Records listed per state.
 * @returns The report.
 */
export const buildParseReport = (
    source: ParsedSource,
    sampleSize: number,
): ParseReport => {
    const label = RECORD_TYPE_PLURALS[source.type];
    const base = { label, total: source.collection.size };

    switch (source.type) {
        case "locality": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(records, describeLocality, sampleSize),
                summary: localitySummary(records),
            };
        }
        case "neighborhood": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(records, describeNeighborhood, sampleSize),
                summary: [
                    {
                        title: "Statistics",
                        values: localityStatistics(records, label),
                    },
                ],
            };
        }
        case "address": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(records, describeAddress, sampleSize),
                summary: [
                    {
                        title: "Statistics",
                        values: {
                            ...localityStatistics(records, label),
                            "Spanning two neighborhoods": countWhere(
                                records,
                                (address) =>
                                    address.neighborhoodIdEnd !== undefined,
                            ),
                        },
                    },
                ],
            };
        }
        case "big-user": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(records, describeBigUser, sampleSize),
                summary: [
                    {
                        title: "Statistics",
                        values: {
                            ...localityStatistics(records, label),
                            "With street reference": countWhere(
                                records,
                                (bigUser) => bigUser.streetId !== undefined,
                            ),
                        },
                    },
                ],
            };
        }
        case "operational-unit": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(
                    records,
                    describeOperationalUnit,
                    sampleSize,
                ),
                summary: [
                    {
                        title: "Statistics",
                        values: {
                            ...localityStatistics(records, label),
                            "With post boxes": countWhere(
                                records,
                                (unit) =>
                                    unit.postBoxIndicator ===
                                    PostBoxIndicator.Yes,
                            ),
                        },
                    },
                ],
            };
        }
        case "cpc": {
            const records = [...source.collection];
            return {
                ...base,
                states: sampleByState(records, describeCpc, sampleSize),
                summary: [
                    {
                        title: "Statistics",
                        values: localityStatistics(records, label),
                    },
                ],
            };
        }
    }
};

// ---------------------------------------------------------------------------------
// Index Reports
// ---------------------------------------------------------------------------------

/**
 * One line per state with entries, in UF order, e.g. `SP:     1234 CEPs`.
 */
export const formatStateCounts = (lookup: CepLookup): string[] =>
    lookup
        .countByState()
        .map(([uf, count]) => `${uf}: ${String(count).padStart(8)} CEPs`);

/**
 * Labelled fields of an index entry; absent and empty fields are left out.
 */
export const describeCepInfo = (info: CepInfo): Record<string, string> => {
    const fields: Record<string, string> = {
        CEP: info.cep,
        UF: `${info.uf} (${ufFullName(info.uf)})`,
        Locality: info.locality,
    };
    if (info.neighborhood !== undefined) fields.Neighborhood = info.neighborhood;
    if (info.address !== "") fields.Address = info.address;
    if (info.complement !== undefined) fields.Complement = info.complement;
    fields.Type = CEP_KIND_LABELS[info.kind];
    return fields;
};
