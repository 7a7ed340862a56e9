import type { LocalityId, NeighborhoodId } from "./identifiers";
import type { Uf } from "./uf";

/**
 * Named subdivision of a locality (LOG_BAIRRO).
 */
export interface Neighborhood {
    readonly id: NeighborhoodId;
    readonly uf: Uf;
    readonly localityId: LocalityId;
    readonly name: string;
    readonly abbreviatedName: string | undefined;
}
