import { EdneParser } from "./base";
import { EdneCollection } from "./collection";
import type { RecordKind } from "./record-kind";
import { LocalityId } from "../models/identifiers";
import {
    type Locality,
    parseLocalitySituation,
    parseLocalityType,
} from "../models/locality";
import { parseUf } from "../models/uf";

/**
 * LOG_LOCALIDADE layout, 9 fields:
 *
 * `LOC_NU @ UFE_SG @ LOC_NO @ CEP? @ LOC_IN_SIT @ LOC_IN_TIPO_LOC @ LOC_NU_SUB? @ LOC_NO_ABREV? @ MUN_NU?`
 */
export const LOCALITY_KIND: RecordKind<LocalityId, Locality> = {
    name: "locality",
    fieldCount: 9,
    idOf: (locality) => locality.id,
    build: (fields) => {
        const id = fields.value(0, "LOC_NU", LocalityId.parse);
        const uf = fields.value(1, "UFE_SG", parseUf);
        const name = fields.required(2, "LOC_NO");
        const situation = fields.value(4, "LOC_IN_SIT", parseLocalitySituation);
        const type = fields.value(5, "LOC_IN_TIPO_LOC", parseLocalityType);

        return {
            id,
            uf,
            name,
            cep: fields.optional(3),
            situation,
            type,
            subordinateTo: fields.optionalValue(
                6,
                "LOC_NU_SUB",
                LocalityId.parse,
            ),
            abbreviatedName: fields.optional(7),
            ibgeCode: fields.optional(8),
        };
    },
};

/**
 * Localities keyed by LOC_NU.
 *
 * @example
 * const localities = Localities.fromLatin1(fs.readFileSync("LOG_LOCALIDADE.TXT"));
 * localities.get(LocalityId.fromNumber(16))?.name; // "Rio Branco"
 */
export class Localities extends EdneCollection<LocalityId, Locality> {
    constructor() {
        super(LOCALITY_KIND);
    }

    static fromLatin1(bytes: Uint8Array): Localities {
        return new Localities().load(EdneParser.fromLatin1(bytes));
    }

    static fromText(content: string): Localities {
        return new Localities().load(EdneParser.fromText(content));
    }
}
