import { describe, test, expect, vi } from "vitest";
import fc from "fast-check";
import type { Span } from "@/ast";
import { emphasized, text } from "@/builders";
import {
    DelimiterSearch,
    isInlineWhitespace,
    mergeAdjacentText,
    parseSpans,
    type SpanParsers,
} from "@/inline-parser";
import { styles } from "@/options";
import { parseRstSpans } from "@/rst/inline-parser";
import { parseMarkdownSpans } from "@/markdown/inline-parser";
import { flattenText } from "@/traversal";

const starEmphasis: SpanParsers = new Map([
    [
        "*",
        (source: string, start: number) => {
            const end = source.indexOf("*", start);
            if (end === -1) return undefined;
            return { span: emphasized(source.slice(start, end)), end: end + 1 };
        },
    ],
]);

// writes recognized emphasis back with its delimiters
const rebuild = (spans: readonly Span[]) =>
    spans.map((span) => (span.type === "emphasized" ? `*${flattenText(span.content)}*` : flattenText([span]))).join("");

describe("parseSpans", () => {
    test("splits text around recognized spans", () => {
        expect(parseSpans("a *b* c", starEmphasis)).toEqual([text("a "), emphasized("b"), text(" c")]);
    });

    test("keeps a trigger character whose parser fails as text", () => {
        expect(parseSpans("a *b", starEmphasis)).toEqual([text("a *b")]);
    });

    test("returns no spans for empty input", () => {
        expect(parseSpans("", starEmphasis)).toEqual([]);
    });

    test("input without triggers becomes a single text node", () => {
        fc.assert(
            fc.property(fc.string(), (source) => {
                const clean = source.replace(/\*/g, "");
                expect(parseSpans(clean, starEmphasis)).toEqual(clean ? [text(clean)] : []);
            }),
        );
    });

    test("spans and their delimiters rebuild the input", () => {
        const source = fc.array(fc.constantFrom("*", "a", " ", "\n"), { maxLength: 40 }).map((chars) => chars.join(""));
        fc.assert(
            fc.property(source, (input) => {
                expect(rebuild(parseSpans(input, starEmphasis))).toBe(input);
            }),
        );
    });

    test("never throws on arbitrary input", () => {
        fc.assert(
            fc.property(fc.string(), (source) => {
                expect(Array.isArray(parseRstSpans(source))).toBe(true);
                expect(Array.isArray(parseMarkdownSpans(source))).toBe(true);
            }),
        );
    });
});

describe("DelimiterSearch", () => {
    test("a search that found nothing is not repeated from a later position", () => {
        const search = new DelimiterSearch();
        const scan = vi.fn((_from: number): number | undefined => undefined);
        expect(search.find("*", "a *b *c", 2, scan)).toBeUndefined();
        expect(search.find("*", "a *b *c", 5, scan)).toBeUndefined();
        expect(scan).toHaveBeenCalledTimes(1);
    });

    test("searches again from an earlier position or in other input", () => {
        const search = new DelimiterSearch();
        const scan = vi.fn((_from: number): number | undefined => undefined);
        search.find("*", "a *b *c", 5, scan);
        search.find("*", "a *b *c", 2, scan);
        search.find("*", "other *", 6, scan);
        search.find("**", "a *b *c", 5, scan);
        expect(scan).toHaveBeenCalledTimes(4);
    });

    test("found positions are always searched again", () => {
        const search = new DelimiterSearch();
        const scan = vi.fn((_from: number): number | undefined => 4);
        expect(search.find("*", "a *b* c", 2, scan)).toBe(4);
        expect(search.find("*", "a *b* c", 2, scan)).toBe(4);
        expect(scan).toHaveBeenCalledTimes(2);
    });
});

describe("unclosed markup", () => {
    const repeated = (unit: string) => unit.repeat(20000);

    test.each(["*x ", "**x ", "`x ", "``x ", "|x ", "_`x "])("reStructuredText %j repeated stays text quickly", (unit) => {
        const source = repeated(unit);
        const started = performance.now();
        expect(parseRstSpans(source)).toEqual([text(source)]);
        expect(performance.now() - started).toBeLessThan(1000);
    });

    test.each(["*x ", "**x ", "_x "])("Markdown %j repeated stays text quickly", (unit) => {
        const source = repeated(unit);
        const started = performance.now();
        expect(parseMarkdownSpans(source)).toEqual([text(source)]);
        expect(performance.now() - started).toBeLessThan(1000);
    });
});

describe("mergeAdjacentText", () => {
    test("joins plain text and keeps styled text apart", () => {
        const merged = mergeAdjacentText([text("a"), text("b"), text("c", styles("s")), text("d")]);
        expect(merged).toEqual([text("ab"), text("c", styles("s")), text("d")]);
    });
});

describe("isInlineWhitespace", () => {
    test("treats the ends of the input as whitespace", () => {
        expect(isInlineWhitespace("")).toBe(true);
        expect(isInlineWhitespace(undefined)).toBe(true);
        expect(isInlineWhitespace("\t")).toBe(true);
        expect(isInlineWhitespace("x")).toBe(false);
    });
});
