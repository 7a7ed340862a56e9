import { codeParser } from "./codes";
import type { LocalityId, NeighborhoodId, StreetId } from "./identifiers";
import type { Uf } from "./uf";

/**
 * Whether the street type is shown in front of the street name (LOG_STA_TLO).
 */
export enum StreetTypeIndicator {
    Yes = "S",
    No = "N",
}

/**
 * @throws {InvalidCodeError} For anything but `S` or `N`.
 */
export const parseStreetTypeIndicator = codeParser(
    "street type indicator",
    StreetTypeIndicator,
    true,
);

/**
 * Street, avenue or similar inside a coded locality (LOG_LOGRADOURO_XX).
 */
export interface Address {
    readonly id: StreetId;
    readonly uf: Uf;
    readonly localityId: LocalityId;
    readonly neighborhoodIdStart: NeighborhoodId;
    /** Set when the street runs into a second neighborhood */
    readonly neighborhoodIdEnd: NeighborhoodId | undefined;
    readonly name: string;
    readonly complement: string | undefined;
    readonly cep: string;
    /** Street type label, e.g. "Rua", "Avenida" (TLO_TX) */
    readonly streetType: string;
    readonly streetTypeIndicator: StreetTypeIndicator | undefined;
    readonly abbreviatedName: string | undefined;
}

/**
 * Text shown for a street: type and name joined when the indicator says so.
 *
 * @example
 * displayStreet({ streetType: "Rua", name: "Nelson Mesquita", streetTypeIndicator: StreetTypeIndicator.Yes })
 * // "Rua Nelson Mesquita"
 */
export const displayStreet = (
    address: Pick<Address, "streetType" | "name" | "streetTypeIndicator">,
): string =>
    address.streetTypeIndicator === StreetTypeIndicator.Yes
        ? `${address.streetType} ${address.name}`
        : address.name;
