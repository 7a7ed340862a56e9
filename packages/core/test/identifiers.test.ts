import { describe, expect, it } from "vitest";
import {
    AddressId,
    BigUserId,
    CpcId,
    IdentifierError,
    LocalityId,
    NeighborhoodId,
    OperationalUnitId,
    StreetId,
} from "../models/identifiers";

const FACTORIES = [
    LocalityId,
    NeighborhoodId,
    StreetId,
    BigUserId,
    OperationalUnitId,
    CpcId,
] as const;

describe("identifiers", () => {
    it.each(FACTORIES)("$entity rejects zero text", (factory) => {
        expect(() => factory.parse("0")).toThrow(
            `${factory.entity} ID cannot be zero`,
        );
        expect(() => factory.parse("0")).toThrow(IdentifierError);
    });

    it("parses trimmed decimal text", () => {
        expect(LocalityId.parse(" 16 ")).toBe(16);
        expect(String(LocalityId.parse("0042"))).toBe("42");
    });

    it("rejects non-numeric text", () => {
        expect(() => NeighborhoodId.parse("12a")).toThrow(
            "invalid neighborhood ID format: '12a'",
        );
    });

    it("reports the reason", () => {
        try {
            CpcId.fromNumber(0);
        } catch (error) {
            expect(error).toBeInstanceOf(IdentifierError);
            if (error instanceof IdentifierError) {
                expect(error.reason).toBe("zero");
                expect(error.entity).toBe("CPC");
            }
        }
        expect.assertions(3);
    });

    it("rejects numbers outside the unsigned 32-bit range", () => {
        expect(() => BigUserId.fromNumber(2 ** 32)).toThrow(
            "invalid big user ID format: '4294967296'",
        );
        expect(() => BigUserId.fromNumber(1.5)).toThrow(IdentifierError);
    });

    it("treats addresses and streets as one family", () => {
        expect(AddressId).toBe(StreetId);
        expect(AddressId.parse("1")).toBe(StreetId.fromNumber(1));
    });
});
