import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import { type Address, parseStreetTypeIndicator } from "../models/address";
import { LocalityId, NeighborhoodId, StreetId } from "../models/identifiers";
import { parseUf } from "../models/uf";

/**
 * LOG_LOGRADOURO_XX layout, 11 fields:
 *
 * `LOG_NU @ UFE_SG @ LOC_NU @ BAI_NU_INI @ BAI_NU_FIM? @ LOG_NO @ LOG_COMPLEMENTO? @ CEP @ TLO_TX @ LOG_STA_TLO? @ LOG_NO_ABREV?`
 *
 * The directory ships one such file per UF.
 */
export const ADDRESS_KIND: RecordKind<StreetId, Address> = {
    name: "address",
    fieldCount: 11,
    idOf: (address) => address.id,
    build: (fields) => ({
        id: fields.value(0, "LOG_NU", StreetId.parse),
        uf: fields.value(1, "UFE_SG", parseUf),
        localityId: fields.value(2, "LOC_NU", LocalityId.parse),
        neighborhoodIdStart: fields.value(3, "BAI_NU_INI", NeighborhoodId.parse),
        neighborhoodIdEnd: fields.optionalValue(
            4,
            "BAI_NU_FIM",
            NeighborhoodId.parse,
        ),
        name: fields.required(5, "LOG_NO"),
        complement: fields.optional(6),
        cep: fields.required(7, "CEP"),
        streetType: fields.required(8, "TLO_TX"),
        streetTypeIndicator: fields.optionalValue(
            9,
            "LOG_STA_TLO",
            parseStreetTypeIndicator,
        ),
        abbreviatedName: fields.optional(10),
    }),
};

/**
 * Streets keyed by LOG_NU.
 */
export class Addresses extends EdneCollection<StreetId, Address> {
    constructor() {
        super(ADDRESS_KIND);
    }

    static fromLatin1(bytes: Uint8Array): Addresses {
        return new Addresses().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): Addresses {
        return new Addresses().load(EdneParser.fromText(content));
    }
}
