import { describe, test, expect } from "vitest";
import {
    dedent,
    expandTabs,
    indentedBlock,
    normalizeRefLabel,
    parseListLine,
    parseRefDefLine,
    skipBlankLines,
    toLines,
} from "@/parser-helpers";

describe("toLines", () => {
    test("normalizes all line break styles", () => {
        expect(toLines("x\r\ny\rz")).toEqual(["x", "y", "z"]);
    });

    test("expands tabs to the next tab stop", () => {
        expect(toLines("a\tb")).toEqual(["a       b"]);
        expect(toLines("\tb", 4)).toEqual(["    b"]);
    });
});

describe("expandTabs", () => {
    test("counts columns from the start of the line", () => {
        expect(expandTabs("abc\td", 4)).toBe("abc d");
        expect(expandTabs("abcd\te", 4)).toBe("abcd    e");
    });
});

describe("dedent", () => {
    test("removes the common indentation and trailing blank lines", () => {
        expect(dedent(["  a", "    b", "", ""])).toEqual(["a", "  b"]);
    });

    test("keeps blank lines in between as empty strings", () => {
        expect(dedent(["   a", "  ", "   b"])).toEqual(["a", "", "b"]);
    });
});

describe("indentedBlock", () => {
    test("takes indented lines and the blank lines between them", () => {
        const lines = ["a", "  b", "", "  c", "", "d"];
        const block = indentedBlock(lines, 0, { minIndent: 1 });
        expect(block.lines).toEqual(["a", "  b", "", "  c"]);
        expect(block.end).toBe(4);
        expect(block.minIndent).toBe(0);
    });

    test("stops at a blank line when asked to", () => {
        const lines = ["  a", "  b", "", "  c"];
        const block = indentedBlock(lines, 0, { minIndent: 2, endsOnBlankLine: true });
        expect(block.lines).toEqual(["  a", "  b"]);
        expect(block.minIndent).toBe(2);
    });
});

describe("skipBlankLines", () => {
    test("returns the index of the next non-blank line", () => {
        expect(skipBlankLines(["", "  ", "x"], 0)).toBe(2);
        expect(skipBlankLines(["", ""], 0)).toBe(2);
    });
});

describe("parseListLine", () => {
    test("parses bullet list items with *, +, -", () => {
        expect(parseListLine("* Item 1")).toEqual({ ordered: false, start: 1, bulletChar: "*", content: "Item 1" });
        expect(parseListLine("+ Item 2")).toEqual({ ordered: false, start: 1, bulletChar: "+", content: "Item 2" });
        expect(parseListLine("- Item 3")).toEqual({ ordered: false, start: 1, bulletChar: "-", content: "Item 3" });
    });

    test("parses ordered list items with . and ) delimiters", () => {
        expect(parseListLine("1. Item 1")).toEqual({ ordered: true, start: 1, delimiter: ".", content: "Item 1" });
        expect(parseListLine("2) Item 2")).toEqual({ ordered: true, start: 2, delimiter: ")", content: "Item 2" });
    });

    test("handles leading spaces correctly (up to 3)", () => {
        expect(parseListLine("  * Item")).toEqual({ ordered: false, start: 1, bulletChar: "*", content: "Item" });
        expect(parseListLine("    * Item")).toBeNull();
    });

    test("rejects more than 9 digits", () => {
        expect(parseListLine("123456789. Large")).toEqual({ ordered: true, start: 123456789, delimiter: ".", content: "Large" });
        expect(parseListLine("1234567890. Too many digits")).toBeNull();
    });

    test("handles empty list item content", () => {
        expect(parseListLine("* ")).toEqual({ ordered: false, start: 1, bulletChar: "*", content: "" });
        expect(parseListLine("1.")).toEqual({ ordered: true, start: 1, delimiter: ".", content: "" });
    });

    test("returns null for lines that are not list items", () => {
        expect(parseListLine("This is just a regular line.")).toBeNull();
        expect(parseListLine("  *Not* a list item.")).toBeNull();
        expect(parseListLine("12a. Not a valid ordered list item.")).toBeNull();
        expect(parseListLine("1.2. Starts decimal")).toBeNull();
    });
});

describe("parseRefDefLine", () => {
    test("parses a definition with an angle-bracket URL", () => {
        expect(parseRefDefLine('[ref]: <https://example.com> "Title"')).toEqual({
            label: "ref",
            url: "https://example.com",
            title: "Title",
        });
    });

    test("parses a bare URL with any title delimiter", () => {
        expect(parseRefDefLine("[ref]: https://example.com 'Title'")).toEqual({
            label: "ref",
            url: "https://example.com",
            title: "Title",
        });
        expect(parseRefDefLine("[ref]: https://example.com (Title)")).toEqual({
            label: "ref",
            url: "https://example.com",
            title: "Title",
        });
    });

    test("leaves the title out when there is none", () => {
        expect(parseRefDefLine("   [ref]: https://example.com")).toEqual({
            label: "ref",
            url: "https://example.com",
            title: undefined,
        });
    });

    test("returns null for indented or ordinary lines", () => {
        expect(parseRefDefLine("    [ref]: https://example.com")).toBeNull();
        expect(parseRefDefLine("This is not a [ref] definition")).toBeNull();
    });
});

describe("normalizeRefLabel", () => {
    test("lowercases, trims and collapses whitespace", () => {
        expect(normalizeRefLabel("  My   Ref\nLabel ")).toBe("my ref label");
    });
});
