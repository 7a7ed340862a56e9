import {
    Addresses,
    CepLookupBuilder,
    Localities,
    Neighborhoods,
    OperationalUnits,
} from "@repo/edne-core";
import { describe, expect, it } from "vitest";
import { parseSource, resolveRecordType } from "../service/recordTypes";
import {
    buildParseReport,
    describeCepInfo,
    describeLocality,
    describeOperationalUnit,
    formatStateCounts,
    sampleByState,
} from "../service/report";

const LOCALITIES = [
    "16@AC@Rio Branco@@1@M@@Rio Branco@1200401",
    "10@AC@Sede Exemplo@69900000@0@M@@Sede Ex@",
    "900@AC@Povoado Teste@69939810@0@P@16@Pov Teste@",
    "901@AC@Vila Neta@69939820@0@P@900@@",
    "902@AC@Vila Solta@69939830@0@P@999@@",
].join("\n");

const OPERATIONAL_UNIT =
    "800@AC@16@100@@AC Rio Branco@Rua Epaminondas Jácome, 447@69900000@S@AC R Branco";

describe("resolveRecordType", () => {
    it("accepts aliases in any case", () => {
        expect(resolveRecordType("Localidade")).toBe("locality");
        expect(resolveRecordType("bairro")).toBe("neighborhood");
        expect(resolveRecordType("GRANDE-USUARIO")).toBe("big-user");
        expect(resolveRecordType("opunit")).toBe("operational-unit");
        expect(resolveRecordType("logradouro")).toBe("address");
        expect(resolveRecordType("cpc")).toBe("cpc");
    });

    it("rejects unknown names", () => {
        expect(resolveRecordType("estado")).toBeUndefined();
    });
});

describe("record descriptions", () => {
    it("describes localities on one line", () => {
        const localities = Localities.fromText(LOCALITIES);
        const [rioBranco, , village] = [...localities];

        expect(rioBranco && describeLocality(rioBranco)).toEqual([
            "[16] Rio Branco - Municipality [Rio Branco]",
        ]);
        expect(village && describeLocality(village)).toEqual([
            "[900] Povoado Teste (CEP: 69939810) - Village [Pov Teste]",
        ]);
    });

    it("describes operational units with their references", () => {
        const [unit] = [...OperationalUnits.fromText(OPERATIONAL_UNIT)];

        expect(unit && describeOperationalUnit(unit)).toEqual([
            "[800] AC Rio Branco",
            "    Address: Rua Epaminondas Jácome, 447",
            "    CEP: 69900000 (Locality: 16)",
            "    Post boxes available",
        ]);
    });
});

describe("sampleByState", () => {
    it("lists the lowest ids of each state", () => {
        const samples = sampleByState(
            Localities.fromText(LOCALITIES),
            describeLocality,
            2,
        );

        expect(samples).toEqual([
            {
                uf: "AC",
                count: 5,
                lines: [
                    "[10] Sede Exemplo (CEP: 69900000) - Municipality [Sede Ex]",
                    "[16] Rio Branco - Municipality [Rio Branco]",
                ],
                remaining: 3,
            },
        ]);
    });

    it("orders states by UF order", () => {
        const addresses = Addresses.fromText(
            [
                "1@SP@20@300@@Augusta@@01305000@Rua@S@",
                "2@AC@16@100@@Flores@@69900400@Rua@N@",
            ].join("\n"),
        );
        const samples = sampleByState(addresses, () => [], 10);

        expect(samples.map((sample) => sample.uf)).toEqual(["AC", "SP"]);
        expect(samples.map((sample) => sample.remaining)).toEqual([0, 0]);
    });
});

describe("buildParseReport", () => {
    it("summarizes localities by type and situation", () => {
        const source = parseSource(
            "locality",
            Buffer.from(LOCALITIES, "latin1"),
        );
        const report = buildParseReport(source, 10);

        expect(report.label).toBe("localities");
        expect(report.total).toBe(5);
        expect(report.states).toHaveLength(1);
        expect(report.summary).toEqual([
            {
                title: "By type",
                values: { District: 0, Municipality: 2, Village: 3 },
            },
            {
                title: "By situation",
                values: {
                    "Not coded": 4,
                    "Coded at street level": 1,
                    "District or village": 0,
                    "Coding in progress": 0,
                },
            },
        ]);
    });

    it("reports how neighborhoods spread over localities", () => {
        const source = parseSource(
            "neighborhood",
            Buffer.from("100@AC@16@Centro@Ctr\n101@AC@16@Bosque@", "latin1"),
        );

        expect(buildParseReport(source, 10).summary).toEqual([
            {
                title: "Statistics",
                values: {
                    "Total neighborhoods": 2,
                    "Localities with neighborhoods": 1,
                    "Average neighborhoods per locality": "2.00",
                },
            },
        ]);
    });
});

describe("index reports", () => {
    const buildLookup = () => {
        const builder = new CepLookupBuilder();
        builder.addLocalities(Localities.fromText(LOCALITIES));
        builder.addNeighborhoods(Neighborhoods.fromText("100@AC@16@Centro@Ctr"));
        builder.addOperationalUnits(OperationalUnits.fromText(OPERATIONAL_UNIT));
        builder.addAddresses(
            Addresses.fromText("1@SP@20@300@@Augusta@@01305000@Rua@S@"),
        );
        return builder.build();
    };

    it("counts CEPs per state", () => {
        expect(formatStateCounts(buildLookup())).toEqual([
            "AC:        4 CEPs",
            "SP:        1 CEPs",
        ]);
    });

    it("lists every present field of an entry", () => {
        const info = buildLookup().lookup("69900000");

        expect(info && describeCepInfo(info)).toEqual({
            CEP: "69900000",
            UF: "AC (Acre)",
            Locality: "Rio Branco",
            Neighborhood: "Centro",
            Address: "Rua Epaminondas Jácome, 447",
            Complement: "AC Rio Branco",
            Type: "Operational Unit",
        });
    });

    it("leaves out absent fields", () => {
        const info = buildLookup().lookup("69939830");
        const fields = info && describeCepInfo(info);

        expect(fields).toEqual({
            CEP: "69939830",
            UF: "AC (Acre)",
            Locality: "Vila Solta",
            Type: "Uncoded Locality (General CEP)",
        });
        expect(Object.keys(fields ?? {})).toEqual([
            "CEP",
            "UF",
            "Locality",
            "Type",
        ]);
    });
});
