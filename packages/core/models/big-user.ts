import type {
    BigUserId,
    LocalityId,
    NeighborhoodId,
    StreetId,
} from "./identifiers";
import type { Uf } from "./uf";

/**
 * High-volume addressee with its own CEP (LOG_GRANDE_USUARIO).
 */
export interface BigUser {
    readonly id: BigUserId;
    readonly uf: Uf;
    readonly localityId: LocalityId;
    readonly neighborhoodId: NeighborhoodId;
    /** Absent when the locality is not coded at street level */
    readonly streetId: StreetId | undefined;
    readonly name: string;
    readonly address: string;
    readonly cep: string;
    readonly abbreviatedName: string | undefined;
}
