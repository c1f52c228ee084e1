import {
    camelotWheelDistance,
    formatCamelotKey,
    isPresentNumber,
    isStructuralElement,
    normalizePercentage,
    normalizeStyleString,
    parseCamelotKey,
} from "../index";

describe("track analysis contract", () => {
    it("parses well-formed Camelot keys case-insensitively", () => {
        expect(parseCamelotKey("8A")).toEqual({ number: 8, letter: "A" });
        expect(parseCamelotKey(" 12b ")).toEqual({ number: 12, letter: "B" });
        expect(formatCamelotKey({ number: 1, letter: "B" })).toBe("1B");
    });

    it("rejects malformed Camelot keys", () => {
        expect(parseCamelotKey("13A")).toBeNull();
        expect(parseCamelotKey("0B")).toBeNull();
        expect(parseCamelotKey("8C")).toBeNull();
        expect(parseCamelotKey("")).toBeNull();
        expect(parseCamelotKey(null)).toBeNull();
    });

    it("measures wheel distance across the 12/1 boundary", () => {
        expect(
            camelotWheelDistance(
                { number: 12, letter: "A" },
                { number: 1, letter: "A" },
            ),
        ).toBe(1);
        expect(
            camelotWheelDistance(
                { number: 8, letter: "A" },
                { number: 2, letter: "A" },
            ),
        ).toBe(6);
    });

    it("normalizes percentages from strings and numbers", () => {
        expect(normalizePercentage("85%")).toBeCloseTo(0.85);
        expect(normalizePercentage(85)).toBeCloseTo(0.85);
        expect(normalizePercentage(0.4)).toBe(0.4);
        expect(normalizePercentage("0.4")).toBe(0.4);
        expect(normalizePercentage("-")).toBeUndefined();
        expect(normalizePercentage(0)).toBeUndefined();
        expect(normalizePercentage("n/a")).toBeUndefined();
    });

    it("clamps percentages outside 0-100", () => {
        expect(normalizePercentage("250%")).toBe(1);
        expect(normalizePercentage(340)).toBe(1);
        expect(normalizePercentage("-20%")).toBe(0);
        expect(normalizePercentage(-0.5)).toBe(0);
    });

    it("normalizes style strings and drops placeholders", () => {
        expect(normalizeStyleString("  Deep House ")).toBe("deep house");
        expect(normalizeStyleString("-")).toBeUndefined();
        expect(normalizeStyleString("   ")).toBeUndefined();
        expect(normalizeStyleString(42)).toBeUndefined();
    });

    it("treats zero and non-finite numbers as absent", () => {
        expect(isPresentNumber(0)).toBe(false);
        expect(isPresentNumber(Number.NaN)).toBe(false);
        expect(isPresentNumber(null)).toBe(false);
        expect(isPresentNumber(124.5)).toBe(true);
    });

    it("recognizes structural element tags", () => {
        expect(isStructuralElement("buildup")).toBe(true);
        expect(isStructuralElement("hook")).toBe(false);
    });
});
