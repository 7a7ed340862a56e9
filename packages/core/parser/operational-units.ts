import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import {
    LocalityId,
    NeighborhoodId,
    OperationalUnitId,
    StreetId,
} from "../models/identifiers";
import {
    type OperationalUnit,
    parsePostBoxIndicator,
} from "../models/operational-unit";
import { parseUf } from "../models/uf";

/**
 * LOG_UNID_OPER layout, 10 fields:
 *
 * `UOP_NU @ UFE_SG @ LOC_NU @ BAI_NU @ LOG_NU? @ UOP_NO @ UOP_ENDERECO @ CEP @ UOP_IN_CP @ UOP_NO_ABREV?`
 */
export const OPERATIONAL_UNIT_KIND: RecordKind<
    OperationalUnitId,
    OperationalUnit
> = {
    name: "operational unit",
    fieldCount: 10,
    idOf: (unit) => unit.id,
    build: (fields) => ({
        id: fields.value(0, "UOP_NU", OperationalUnitId.parse),
        uf: fields.value(1, "UFE_SG", parseUf),
        localityId: fields.value(2, "LOC_NU", LocalityId.parse),
        neighborhoodId: fields.value(3, "BAI_NU", NeighborhoodId.parse),
        streetId: fields.optionalValue(4, "LOG_NU", StreetId.parse),
        name: fields.required(5, "UOP_NO"),
        address: fields.required(6, "UOP_ENDERECO"),
        cep: fields.required(7, "CEP"),
        postBoxIndicator: fields.value(8, "UOP_IN_CP", parsePostBoxIndicator),
        abbreviatedName: fields.optional(9),
    }),
};

/**
 * Operational units keyed by UOP_NU.
 */
export class OperationalUnits extends EdneCollection<
    OperationalUnitId,
    OperationalUnit
> {
    constructor() {
        super(OPERATIONAL_UNIT_KIND);
    }

    static fromLatin1(bytes: Uint8Array): OperationalUnits {
        return new OperationalUnits().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): OperationalUnits {
        return new OperationalUnits().load(EdneParser.fromText(content));
    }
}
