import type { Uf } from "../models/uf";

/**
 * Record kind an index entry was produced from, in merge-stage order.
 */
export type CepKind =
    | "uncoded-locality"
    | "street"
    | "big-user"
    | "operational-unit"
    | "cpc";

/**
 * Display labels for each {@link CepKind}.
 */
export const CEP_KIND_LABELS: Readonly<Record<CepKind, string>> = {
    "uncoded-locality": "Uncoded Locality (General CEP)",
    street: "Street/Address",
    "big-user": "Big User",
    "operational-unit": "Operational Unit",
    cpc: "Community Postal Box (CPC)",
};

/**
 * Denormalized index entry for one CEP.
 */
export interface CepInfo {
    /** Key of the entry, carried as it appears in the source */
    readonly cep: string;
    readonly uf: Uf;
    /** Locality name, `""` when the locality id did not resolve */
    readonly locality: string;
    readonly neighborhood: string | undefined;
    /** Street or addressee text, `""` for locality-wide CEPs */
    readonly address: string;
    /** Street complement, or the name of the big user, unit or CPC */
    readonly complement: string | undefined;
    readonly kind: CepKind;
}
