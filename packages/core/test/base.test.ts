import { describe, expect, it } from "vitest";
import { decodeLatin1, EdneParser, parseU32 } from "../parser/base";
import {
    EmptyFieldError,
    EncodingError,
    FieldCountError,
    InvalidNumberError,
    ParseError,
    ParseFailedError,
} from "../parser/errors";

describe("decodeLatin1", () => {
    it("maps every byte to the code point of the same value", () => {
        const bytes = Uint8Array.from([0x53, 0xe3, 0x6f, 0x80, 0x9f, 0xff]);
        const text = decodeLatin1(bytes);

        expect(text.length).toBe(6);
        expect([...text].map((c) => c.charCodeAt(0))).toEqual([
            0x53, 0xe3, 0x6f, 0x80, 0x9f, 0xff,
        ]);
    });

    it("decodes accented names", () => {
        const bytes = Uint8Array.from([0x53, 0xe3, 0x6f, 0x20, 0x50, 0x61, 0x75, 0x6c, 0x6f]);
        expect(decodeLatin1(bytes)).toBe("São Paulo");
    });

    it("respects the view offset of a subarray", () => {
        const bytes = Uint8Array.from([0x41, 0x42, 0x43, 0x44]).subarray(1, 3);
        expect(decodeLatin1(bytes)).toBe("BC");
    });
});

describe("EdneParser.lines", () => {
    it("skips blank lines but keeps their line numbers", () => {
        const parser = EdneParser.fromText("first\n\n   \nsecond\r\nthird\n");
        expect([...parser.lines()]).toEqual([
            [1, "first"],
            [4, "second"],
            [5, "third"],
        ]);
    });

    it("can be iterated more than once", () => {
        const parser = EdneParser.fromText("a\nb");
        expect([...parser.lines()]).toEqual([...parser.lines()]);
        expect([...parser.lines()]).toHaveLength(2);
    });

    it("yields nothing for empty content", () => {
        expect([...EdneParser.fromText("").lines()]).toEqual([]);
    });
});

describe("EdneParser field helpers", () => {
    it("keeps a trailing empty field", () => {
        expect(EdneParser.splitFields("a@b@")).toEqual(["a", "b", ""]);
    });

    it("keeps consecutive separators as empty fields", () => {
        expect(EdneParser.splitFields("a@@b")).toEqual(["a", "", "b"]);
    });

    it("checks the field count", () => {
        expect(EdneParser.splitFieldsChecked("a@b@c", 3, 1)).toEqual([
            "a",
            "b",
            "c",
        ]);

        let error: unknown;
        try {
            EdneParser.splitFieldsChecked("a@b", 3, 7);
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(FieldCountError);
        expect(error).toMatchObject({ expected: 3, got: 2, lineNumber: 7 });
        expect(String(error)).toBe(
            "FieldCountError: line 7: expected 3 fields, got 2",
        );
    });

    it("returns required fields untrimmed", () => {
        expect(EdneParser.requiredField(" Centro ", "BAI_NO", 1)).toBe(
            " Centro ",
        );
    });

    it("rejects blank required fields", () => {
        expect(() => EdneParser.requiredField("  ", "BAI_NO", 3)).toThrow(
            new EmptyFieldError("BAI_NO", 3),
        );
        expect(() => EdneParser.requiredField("  ", "BAI_NO", 3)).toThrow(
            "line 3: field 'BAI_NO' is empty",
        );
    });

    it("maps blank optional fields to undefined", () => {
        expect(EdneParser.optionalField("")).toBeUndefined();
        expect(EdneParser.optionalField(" ")).toBeUndefined();
        expect(EdneParser.optionalField(" x")).toBe(" x");
    });

    it("parses numbers", () => {
        expect(EdneParser.parseNumber(" 42 ", "LOC_NU", 1)).toBe(42);
        expect(EdneParser.parseOptionalNumber("", "LOC_NU_SUB", 1)).toBeUndefined();
        expect(EdneParser.parseOptionalNumber("8", "LOC_NU_SUB", 1)).toBe(8);
    });

    it("rejects invalid numbers with the raw field", () => {
        expect(() => EdneParser.parseNumber("12a", "LOC_NU", 9)).toThrow(
            "line 9: field 'LOC_NU' has invalid number: '12a'",
        );
        expect(() => EdneParser.parseNumber("", "LOC_NU", 9)).toThrow(
            InvalidNumberError,
        );
        expect(() =>
            EdneParser.parseOptionalNumber("-1", "LOC_NU_SUB", 2),
        ).toThrow(InvalidNumberError);
    });
});

describe("parseU32", () => {
    it("accepts the unsigned 32-bit range", () => {
        expect(parseU32("0")).toBe(0);
        expect(parseU32("+7")).toBe(7);
        expect(parseU32("4294967295")).toBe(4294967295);
    });

    it("rejects everything else", () => {
        expect(parseU32("4294967296")).toBeUndefined();
        expect(parseU32("-1")).toBeUndefined();
        expect(parseU32("1.5")).toBeUndefined();
        expect(parseU32("")).toBeUndefined();
    });
});

describe("parse errors without a field", () => {
    it("formats encoding failures without a line number", () => {
        const error = new EncodingError("unexpected byte 0x81");

        expect(error).toBeInstanceOf(ParseError);
        expect(error.message).toBe("encoding error: unexpected byte 0x81");
        expect(error).toMatchObject({
            kind: "encoding",
            name: "EncodingError",
            detail: "unexpected byte 0x81",
            lineNumber: undefined,
        });
    });

    it("formats other failures with their line number", () => {
        const error = new ParseFailedError("record cut short", 12);

        expect(error).toBeInstanceOf(ParseError);
        expect(String(error)).toBe("ParseFailedError: line 12: record cut short");
        expect(error).toMatchObject({
            kind: "parse-failed",
            detail: "record cut short",
            lineNumber: 12,
        });
    });
});
