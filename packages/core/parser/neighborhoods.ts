import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import { LocalityId, NeighborhoodId } from "../models/identifiers";
import type { Neighborhood } from "../models/neighborhood";
import { parseUf } from "../models/uf";

/**
 * LOG_BAIRRO layout, 5 fields:
 *
 * `BAI_NU @ UFE_SG @ LOC_NU @ BAI_NO @ BAI_NO_ABREV?`
 */
export const NEIGHBORHOOD_KIND: RecordKind<NeighborhoodId, Neighborhood> = {
    name: "neighborhood",
    fieldCount: 5,
    idOf: (neighborhood) => neighborhood.id,
    build: (fields) => ({
        id: fields.value(0, "BAI_NU", NeighborhoodId.parse),
        uf: fields.value(1, "UFE_SG", parseUf),
        localityId: fields.value(2, "LOC_NU", LocalityId.parse),
        name: fields.required(3, "BAI_NO"),
        abbreviatedName: fields.optional(4),
    }),
};

/**
 * Neighborhoods keyed by BAI_NU.
 */
export class Neighborhoods extends EdneCollection<NeighborhoodId, Neighborhood> {
    constructor() {
        super(NEIGHBORHOOD_KIND);
    }

    static fromLatin1(bytes: Uint8Array): Neighborhoods {
        return new Neighborhoods().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): Neighborhoods {
        return new Neighborhoods().load(EdneParser.fromText(content));
    }
}
