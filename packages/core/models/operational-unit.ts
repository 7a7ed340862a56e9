import { codeParser } from "./codes";
import type {
    LocalityId,
    NeighborhoodId,
    OperationalUnitId,
    StreetId,
} from "./identifiers";
import type { Uf } from "./uf";

/**
 * Whether an operational unit offers post boxes (UOP_IN_CP).
 */
export enum PostBoxIndicator {
    Yes = "S",
    No = "N",
}

/**
 * @throws {InvalidCodeError} For anything but `S` or `N`.
 */
export const parsePostBoxIndicator = codeParser(
    "post box indicator",
    PostBoxIndicator,
    true,
);

/**
 * Post office, franchise or distribution center (LOG_UNID_OPER).
 */
export interface OperationalUnit {
    readonly id: OperationalUnitId;
    readonly uf: Uf;
    readonly localityId: LocalityId;
    readonly neighborhoodId: NeighborhoodId;
    readonly streetId: StreetId | undefined;
    readonly name: string;
    readonly address: string;
    readonly cep: string;
    readonly postBoxIndicator: PostBoxIndicator;
    readonly abbreviatedName: string | undefined;
}
