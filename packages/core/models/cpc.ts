import type { CpcId, LocalityId } from "./identifiers";
import type { Uf } from "./uf";

/**
 * Community postal box serving an area without home delivery (LOG_CPC).
 */
export interface Cpc {
    readonly id: CpcId;
    readonly uf: Uf;
    readonly localityId: LocalityId;
    readonly name: string;
    readonly address: string;
    readonly cep: string;
}
