import { describe, expect, it } from "vitest";
import { CepLookupBuilder, mergeSnapshot } from "../lookup/builder";
import type { CepInfo } from "../lookup/cep-info";
import { CepLookup } from "../lookup/cep-lookup";
import { Addresses } from "../parser/addresses";
import { BigUsers } from "../parser/big-users";
import { Cpcs } from "../parser/cpcs";
import { Localities } from "../parser/localities";
import { Neighborhoods } from "../parser/neighborhoods";
import { OperationalUnits } from "../parser/operational-units";
import {
    ADDRESSES,
    BIG_USERS,
    CPCS,
    LOCALITIES,
    NEIGHBORHOODS,
    OPERATIONAL_UNITS,
} from "./fixtures";

const buildAll = (): CepLookup => {
    const builder = new CepLookupBuilder();
    builder.addLocalities(Localities.fromText(LOCALITIES));
    builder.addNeighborhoods(Neighborhoods.fromText(NEIGHBORHOODS));
    builder.addAddresses(Addresses.fromText(ADDRESSES));
    builder.addBigUsers(BigUsers.fromText(BIG_USERS));
    builder.addOperationalUnits(OperationalUnits.fromText(OPERATIONAL_UNITS));
    builder.addCpcs(Cpcs.fromText(CPCS));
    return builder.build();
};

const byCep = (a: CepInfo, b: CepInfo): number => a.cep.localeCompare(b.cep);

describe("CepLookupBuilder", () => {
    it("merges every record kind into one index", () => {
        const lookup = buildAll();

        expect(lookup.size).toBe(9);
        expect(lookup.isEmpty()).toBe(false);
        expect(lookup.has("69928970")).toBe(true);
        expect(lookup.has("69900001")).toBe(false);
    });

    it("lets an operational unit override a locality's general CEP", () => {
        const lookup = buildAll();

        expect(lookup.lookup("69900000")).toEqual({
            cep: "69900000",
            uf: "AC",
            locality: "Rio Branco",
            neighborhood: "Centro",
            address: "Rua Epaminondas Jácome, 447",
            complement: "AC Rio Branco",
            kind: "operational-unit",
        });
    });

    it("joins the street type and name when the indicator says so", () => {
        const lookup = buildAll();

        expect(lookup.lookup("69900100")).toEqual({
            cep: "69900100",
            uf: "AC",
            locality: "Rio Branco",
            neighborhood: "Centro",
            address: "Rua Nelson Mesquita",
            complement: undefined,
            kind: "street",
        });
        expect(lookup.lookup("69900200")?.address).toBe("Ceará");
        expect(lookup.lookup("69900200")?.complement).toBe(
            "- até 500 - lado par",
        );
    });

    it("tolerates references to missing localities and neighborhoods", () => {
        const entry = buildAll().lookup("69900300");

        expect(entry?.locality).toBe("");
        expect(entry?.neighborhood).toBeUndefined();
        expect(entry?.address).toBe("Travessa Sem Cadastro");
    });

    it("shows the parent locality as neighborhood, one level deep", () => {
        const lookup = buildAll();

        expect(lookup.lookup("69939810")).toEqual({
            cep: "69939810",
            uf: "AC",
            locality: "Povoado Teste",
            neighborhood: "Rio Branco",
            address: "",
            complement: undefined,
            kind: "uncoded-locality",
        });
        expect(lookup.lookup("69939820")?.neighborhood).toBe("Povoado Teste");
        expect(lookup.lookup("69939830")?.neighborhood).toBeUndefined();
    });

    it("carries big users and CPCs with their names as complement", () => {
        const lookup = buildAll();

        expect(lookup.lookup("69900901")).toMatchObject({
            address: "Rua Nelson Mesquita, 10",
            complement: "Hospital Exemplo",
            kind: "big-user",
        });
        expect(lookup.lookup("69928970")).toEqual({
            cep: "69928970",
            uf: "AC",
            locality: "Rio Branco",
            neighborhood: undefined,
            address: "Ramal Um, km 4",
            complement: "CPC Ramal Um",
            kind: "cpc",
        });
    });

    it("applies the stages in precedence order", () => {
        const cep = "69999999";
        const localities = () =>
            Localities.fromText(`50@AC@Loc Geral@${cep}@0@M@@@`);
        const streets = () =>
            Addresses.fromText(`6000@AC@50@100@@Das Flores@@${cep}@Rua@S@`);
        const bigUsers = () =>
            BigUsers.fromText(`7000@AC@50@100@@Empresa Um@Rua das Flores, 1@${cep}@`);
        const units = () =>
            OperationalUnits.fromText(
                `8000@AC@50@100@@Agência Um@Rua das Flores, 2@${cep}@N@`,
            );
        const cpcs = () =>
            Cpcs.fromText(`3000@AC@50@CPC Um@Rua das Flores, 3@${cep}`);

        const kindAfter = (fill: (builder: CepLookupBuilder) => void) => {
            const builder = new CepLookupBuilder();
            fill(builder);
            return builder.build().lookup(cep)?.kind;
        };

        expect(kindAfter((b) => b.addLocalities(localities()))).toBe(
            "uncoded-locality",
        );
        expect(
            kindAfter((b) => {
                b.addAddresses(streets());
                b.addLocalities(localities());
            }),
        ).toBe("street");
        expect(
            kindAfter((b) => {
                b.addBigUsers(bigUsers());
                b.addAddresses(streets());
            }),
        ).toBe("big-user");
        expect(
            kindAfter((b) => {
                b.addOperationalUnits(units());
                b.addBigUsers(bigUsers());
                b.addLocalities(localities());
            }),
        ).toBe("operational-unit");
        expect(
            kindAfter((b) => {
                b.addCpcs(cpcs());
                b.addOperationalUnits(units());
                b.addBigUsers(bigUsers());
                b.addAddresses(streets());
                b.addLocalities(localities());
            }),
        ).toBe("cpc");
    });

    it("gives the same index whatever order collections are added in", () => {
        const reversed = new CepLookupBuilder();
        reversed.addCpcs(Cpcs.fromText(CPCS));
        reversed.addOperationalUnits(OperationalUnits.fromText(OPERATIONAL_UNITS));
        reversed.addBigUsers(BigUsers.fromText(BIG_USERS));
        reversed.addAddresses(Addresses.fromText(ADDRESSES));
        reversed.addNeighborhoods(Neighborhoods.fromText(NEIGHBORHOODS));
        reversed.addLocalities(Localities.fromText(LOCALITIES));

        expect([...reversed.build().values()].sort(byCep)).toEqual(
            [...buildAll().values()].sort(byCep),
        );
    });

    it("accumulates several collections of the same kind", () => {
        const builder = new CepLookupBuilder();
        builder.addAddresses(Addresses.fromText(ADDRESSES));
        builder.addAddresses(
            Addresses.fromText("9000@SP@20@300@@Augusta@@01305000@Rua@S@"),
        );

        const lookup = builder.build();
        expect(lookup.size).toBe(4);
        expect(lookup.lookup("01305000")?.uf).toBe("SP");
        expect(lookup.lookup("01305000")?.address).toBe("Rua Augusta");
    });

    it("is empty after building", () => {
        const builder = new CepLookupBuilder();
        builder.addLocalities(Localities.fromText(LOCALITIES));

        expect(builder.build().size).toBe(4);
        expect(builder.build().isEmpty()).toBe(true);
    });
});

describe("CepLookup", () => {
    it("filters by state", () => {
        const lookup = buildAll();

        expect(lookup.byState("AC")).toHaveLength(9);
        expect(lookup.byState("SP")).toEqual([]);
        expect(lookup.countByState()).toEqual([["AC", 9]]);
    });

    it("filters by exact locality name", () => {
        const lookup = buildAll();

        expect(
            lookup
                .byLocalityName("Rio Branco")
                .map((info) => info.cep)
                .sort(),
        ).toEqual(["69900000", "69900100", "69900200", "69900901", "69928970"]);
        expect(lookup.byLocalityName("rio branco")).toEqual([]);
    });

    it("counts states in UF order", () => {
        const builder = new CepLookupBuilder();
        builder.addAddresses(
            Addresses.fromText(
                [
                    "1@SP@20@300@@Augusta@@01305000@Rua@S@",
                    "2@AC@16@100@@Flores@@69900400@Rua@S@",
                    "3@SP@20@300@@Paulista@@01310100@Avenida@S@",
                ].join("\n"),
            ),
        );

        expect(builder.build().countByState()).toEqual([
            ["AC", 1],
            ["SP", 2],
        ]);
    });

    it("starts empty", () => {
        const lookup = new CepLookup();
        expect(lookup.size).toBe(0);
        expect(lookup.lookup("69900000")).toBeUndefined();
    });
});

describe("mergeSnapshot", () => {
    it("does not modify the snapshot it reads", () => {
        const localities = Localities.fromText(LOCALITIES);
        const snapshot = {
            localities: new Map(localities.entries()),
            neighborhoods: new Map(),
            addresses: new Map(),
            bigUsers: new Map(),
            operationalUnits: new Map(),
            cpcs: new Map(),
        };

        const ceps = mergeSnapshot(snapshot);
        expect(ceps.size).toBe(4);
        expect(snapshot.localities.size).toBe(5);
    });
});
