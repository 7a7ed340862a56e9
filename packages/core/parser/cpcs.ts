import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import type { Cpc } from "../models/cpc";
import { CpcId, LocalityId } from "../models/identifiers";
import { parseUf } from "../models/uf";

/**
 * LOG_CPC layout, 6 fields:
 *
 * `CPC_NU @ UFE_SG @ LOC_NU @ CPC_NO @ CPC_ENDERECO @ CEP`
 */
export const CPC_KIND: RecordKind<CpcId, Cpc> = {
    name: "CPC",
    fieldCount: 6,
    idOf: (cpc) => cpc.id,
    build: (fields) => ({
        id: fields.value(0, "CPC_NU", CpcId.parse),
        uf: fields.value(1, "UFE_SG", parseUf),
        localityId: fields.value(2, "LOC_NU", LocalityId.parse),
        name: fields.required(3, "CPC_NO"),
        address: fields.required(4, "CPC_ENDERECO"),
        cep: fields.required(5, "CEP"),
    }),
};

/**
 * Community postal boxes keyed by CPC_NU.
 */
export class Cpcs extends EdneCollection<CpcId, Cpc> {
    constructor() {
        super(CPC_KIND);
    }

    static fromLatin1(bytes: Uint8Array): Cpcs {
        return new Cpcs().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): Cpcs {
        return new Cpcs().load(EdneParser.fromText(content));
    }
}
