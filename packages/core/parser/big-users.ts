import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import type { BigUser } from "../models/big-user";
import {
    BigUserId,
    LocalityId,
    NeighborhoodId,
    StreetId,
} from "../models/identifiers";
import { parseUf } from "../models/uf";

/**
 * LOG_GRANDE_USUARIO layout, 9 fields:
 *
 * `GRU_NU @ UFE_SG @ LOC_NU @ BAI_NU @ LOG_NU? @ GRU_NO @ GRU_ENDERECO @ CEP @ GRU_NO_ABREV?`
 */
export const BIG_USER_KIND: RecordKind<BigUserId, BigUser> = {
    name: "big user",
    fieldCount: 9,
    idOf: (bigUser) => bigUser.id,
    build: (fields) => ({
        id: fields.value(0, "GRU_NU", BigUserId.parse),
        uf: fields.value(1, "UFE_SG", parseUf),
        localityId: fields.value(2, "LOC_NU", LocalityId.parse),
        neighborhoodId: fields.value(3, "BAI_NU", NeighborhoodId.parse),
        streetId: fields.optionalValue(4, "LOG_NU", StreetId.parse),
        name: fields.required(5, "GRU_NO"),
        address: fields.required(6, "GRU_ENDERECO"),
        cep: fields.required(7, "CEP"),
        abbreviatedName: fields.optional(8),
    }),
};

/**
 * Big users keyed by GRU_NU.
 */
export class BigUsers extends EdneCollection<BigUserId, BigUser> {
    constructor() {
        super(BIG_USER_KIND);
    }

    static fromLatin1(bytes: Uint8Array): BigUsers {
        return new BigUsers().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): BigUsers {
        return new BigUsers().load(EdneParser.fromText(content));
    }
}
