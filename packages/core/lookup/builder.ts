import debug from "debug";
import type { CepInfo, CepKind } from "./cep-info";
import { CepLookup } from "./cep-lookup";
import { displayStreet } from "../models/address";
import type { Address } from "../models/address";
import type { BigUser } from "../models/big-user";
import type { Cpc } from "../models/cpc";
import type {
    AddressId,
    BigUserId,
    CpcId,
    LocalityId,
    NeighborhoodId,
    OperationalUnitId,
} from "../models/identifiers";
import type { Locality } from "../models/locality";
import type { Neighborhood } from "../models/neighborhood";
import type { OperationalUnit } from "../models/operational-unit";
import type { EdneCollection } from "../parser/collection";

// ---------------------------------------------------------------------------------
// Debug Loggers
// ---------------------------------------------------------------------------------

/** Logger for index construction */
const logger = debug("edne:lookup");

// ---------------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------------

/**
 * The six record maps the merge reads from.
 */
export interface EdneSnapshot {
    readonly localities: ReadonlyMap<LocalityId, Locality>;
    readonly neighborhoods: ReadonlyMap<NeighborhoodId, Neighborhood>;
    readonly addresses: ReadonlyMap<AddressId, Address>;
    readonly bigUsers: ReadonlyMap<BigUserId, BigUser>;
    readonly operationalUnits: ReadonlyMap<OperationalUnitId, OperationalUnit>;
    readonly cpcs: ReadonlyMap<CpcId, Cpc>;
}

type Stage = (snapshot: EdneSnapshot, emit: (info: CepInfo) => void) => void;

const localityName = (snapshot: EdneSnapshot, id: LocalityId): string =>
    snapshot.localities.get(id)?.name ?? "";

const neighborhoodName = (
    snapshot: EdneSnapshot,
    id: NeighborhoodId,
): string | undefined => snapshot.neighborhoods.get(id)?.name;

// ---------------------------------------------------------------------------------
// Merge Stages
// ---------------------------------------------------------------------------------

/**
 * Localities with a general CEP. A subordinate locality shows its parent's
 * name as neighborhood; the parent chain is followed one level only.
 */
const uncodedLocalities: Stage = (snapshot, emit) => {
    for (const locality of snapshot.localities.values()) {
        // Coded localities have no general CEP
        if (locality.cep === undefined) continue;

        const parent =
            locality.subordinateTo === undefined
                ? undefined
                : snapshot.localities.get(locality.subordinateTo);

        emit({
            cep: locality.cep,
            uf: locality.uf,
            locality: locality.name,
            neighborhood: parent?.name,
            address: "",
            complement: undefined,
            kind: "uncoded-locality",
        });
    }
};

const streets: Stage = (snapshot, emit) => {
    for (const address of snapshot.addresses.values()) {
        emit({
            cep: address.cep,
            uf: address.uf,
            locality: localityName(snapshot, address.localityId),
            neighborhood: neighborhoodName(snapshot, address.neighborhoodIdStart),
            address: displayStreet(address),
            complement: address.complement,
            kind: "street",
        });
    }
};

/**
 * Big users and operational units share one entry shape: their own address
 * text, and their name as complement.
 */
const addressees =
    (
        select: (
            snapshot: EdneSnapshot,
        ) => Iterable<BigUser | OperationalUnit>,
        kind: CepKind,
    ): Stage =>
    (snapshot, emit) => {
        for (const addressee of select(snapshot)) {
            emit({
                cep: addressee.cep,
                uf: addressee.uf,
                locality: localityName(snapshot, addressee.localityId),
                neighborhood: neighborhoodName(
                    snapshot,
                    addressee.neighborhoodId,
                ),
                address: addressee.address,
                complement: addressee.name,
                kind,
            });
        }
    };

const cpcs: Stage = (snapshot, emit) => {
    for (const cpc of snapshot.cpcs.values()) {
        emit({
            cep: cpc.cep,
            uf: cpc.uf,
            locality: localityName(snapshot, cpc.localityId),
            neighborhood: undefined,
            address: cpc.address,
            complement: cpc.name,
            kind: "cpc",
        });
    }
};

/**
 * Merge stages in precedence order. A later stage overwrites entries of
 * earlier stages for the same CEP.
 */
const STAGES: ReadonlyArray<readonly [string, Stage]> = [
    ["uncoded localities", uncodedLocalities],
    ["streets", streets],
    [
        "big users",
        addressees((snapshot) => snapshot.bigUsers.values(), "big-user"),
    ],
    [
        "operational units",
        addressees(
            (snapshot) => snapshot.operationalUnits.values(),
            "operational-unit",
        ),
    ],
    ["CPCs", cpcs],
];

/**
 * Runs the five merge stages over a snapshot.
 *
 * Within a stage, when two records share a CEP, the one iterated last wins;
 * which one that is depends on the order the records were accumulated.
 *
 * @param snapshot - Records to merge. Not modified.
 * @returns A fresh CEP → entry map.
 */
export const mergeSnapshot = (snapshot: EdneSnapshot): Map<string, CepInfo> => {
    const ceps = new Map<string, CepInfo>();
    const emit = (info: CepInfo): void => {
        ceps.set(info.cep, info);
    };

    // Run the stages in precedence order
    for (const [name, stage] of STAGES) {
        const before = ceps.size;
        stage(snapshot, emit);
        logger(`${name}: ${ceps.size - before} new CEPs, ${ceps.size} total`);
    }

    return ceps;
};

// ---------------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------------

const absorb = <Id, Rec>(
    target: Map<Id, Rec>,
    collection: EdneCollection<Id, Rec>,
): void => {
    for (const [id, record] of collection.entries()) {
        target.set(id, record);
    }
};

/**
 * Accumulates eDNE collections and merges them into a {@link CepLookup}.
 *
 * Collections may be added in any order and any number of times, e.g. one
 * street collection per UF file. A record replaces an earlier record of the
 * same kind with the same id.
 *
 * @example
 * const builder = new CepLookupBuilder();
 * builder.addLocalities(Localities.fromLatin1(localityBytes));
 * builder.addAddresses(Addresses.fromLatin1(spStreetBytes));
 * const lookup = builder.build();
 * lookup.lookup("01310100");
 */
export class CepLookupBuilder {
    private localities = new Map<LocalityId, Locality>();
    private neighborhoods = new Map<NeighborhoodId, Neighborhood>();
    private addresses = new Map<AddressId, Address>();
    private bigUsers = new Map<BigUserId, BigUser>();
    private operationalUnits = new Map<OperationalUnitId, OperationalUnit>();
    private cpcs = new Map<CpcId, Cpc>();

    addLocalities(collection: EdneCollection<LocalityId, Locality>): void {
        absorb(this.localities, collection);
    }

    addNeighborhoods(
        collection: EdneCollection<NeighborhoodId, Neighborhood>,
    ): void {
        absorb(this.neighborhoods, collection);
    }

    addAddresses(collection: EdneCollection<AddressId, Address>): void {
        absorb(this.addresses, collection);
    }

    addBigUsers(collection: EdneCollection<BigUserId, BigUser>): void {
        absorb(this.bigUsers, collection);
    }

    addOperationalUnits(
        collection: EdneCollection<OperationalUnitId, OperationalUnit>,
    ): void {
        absorb(this.operationalUnits, collection);
    }

    addCpcs(collection: EdneCollection<CpcId, Cpc>): void {
        absorb(this.cpcs, collection);
    }

    /**
     * Merges everything accumulated so far into a new lookup.
     *
     * The builder hands its records to the merge and is empty afterwards.
     * Never throws: the records were validated when they were parsed.
     */
    build(): CepLookup {
        // Take the accumulated records
        const snapshot: EdneSnapshot = {
            localities: this.localities,
            neighborhoods: this.neighborhoods,
            addresses: this.addresses,
            bigUsers: this.bigUsers,
            operationalUnits: this.operationalUnits,
            cpcs: this.cpcs,
        };
        // Start over empty
        this.localities = new Map();
        this.neighborhoods = new Map();
        this.addresses = new Map();
        this.bigUsers = new Map();
        this.operationalUnits = new Map();
        this.cpcs = new Map();

        logger(
            `merging ${snapshot.localities.size} localities, ${snapshot.neighborhoods.size} neighborhoods, ${snapshot.addresses.size} streets, ${snapshot.bigUsers.size} big users, ${snapshot.operationalUnits.size} operational units, ${snapshot.cpcs.size} CPCs`,
        );
        return new CepLookup(mergeSnapshot(snapshot));
    }
}
