import { describe, test, expect } from "vitest";
import fc from "fast-check";
import { isLinkTarget, type Document, type RawDocument } from "@/ast";
import { parseMarkdownDocument } from "@/markdown/block-parser";
import { optionsOf } from "@/options";
import { rewrite } from "@/rewrite";
import { parseRstDocument } from "@/rst/block-parser";
import { collect, findTemporaries } from "@/traversal";

const RST_FRAGMENTS = [
    "Title\n=====",
    "Sub\n---",
    "Some *emphasis*, **strong** and ``code``.",
    "See Python_ and `docs <http://docs.org>`_.",
    ".. _Python: http://python.org",
    "- a\n- b",
    "1. one\n2. two",
    "Note [#]_ and [*]_ and [2]_.",
    ".. [#] Auto note.",
    ".. [*] Symbol note.",
    ".. [2] Numbered note.",
    "|name| here",
    ".. |name| replace:: *value*",
    ":strong:`x` and `default`",
    "term\n   definition",
    "Code::\n\n    literal",
    ".. image:: a.png",
    "`anon`__\n\n__ http://a.org",
    "| line one\n| line two",
    "=== ===\na   b\n=== ===",
    "   quoted\n\n   -- Someone",
    ".. _same:",
    "Same\n====",
    "See [Same]_ and same_.",
    ".. [Same] A citation.",
    "Footnote\n--------",
    ".. _footnote-1:",
];

const MARKDOWN_FRAGMENTS = [
    "# Title",
    "Sub\n---",
    "Some *emphasis*, __strong__ and `code`.",
    "A [link][ref] and [missing][] and ![img][ref].",
    '[ref]: http://ref.org "Ref"',
    "- a\n- b",
    "1. one\n2. two",
    "> quoted\n> text",
    "```js\nlet x\n```",
    "    indented",
    "***",
    "<http://auto.org> and a\\\nbreak",
];

const document = (fragments: readonly string[]) =>
    fc.array(fc.constantFrom(...fragments), { maxLength: 8 }).map((parts) => parts.join("\n\n"));

const resolved = (raw: RawDocument) => rewrite(raw);

// every link points at an id some header or link target still carries
const expectLinksResolve = (doc: Document) => {
    const targets = new Set(
        collect(doc, (element) => (isLinkTarget(element) || element.type === "header" ? optionsOf(element).id : undefined)),
    );
    const links = collect(doc, (element) => {
        if (element.type === "footnote_link" || element.type === "citation_link") return element.id;
        return element.type === "internal_link" ? element.url.slice(1) : undefined;
    });
    for (const link of links) expect(targets.has(link)).toBe(true);
};

describe("rewritten documents", () => {
    test("reStructuredText leaves no temporaries and no duplicate ids", () => {
        fc.assert(
            fc.property(document(RST_FRAGMENTS), (source) => {
                const doc = resolved(parseRstDocument(source));
                expect(findTemporaries(doc)).toEqual([]);
                const ids = collect(doc, (element) => optionsOf(element).id);
                expect(new Set(ids).size).toBe(ids.length);
                expectLinksResolve(doc);
            }),
        );
    });

    test("Markdown leaves no temporaries and no duplicate ids", () => {
        fc.assert(
            fc.property(document(MARKDOWN_FRAGMENTS), (source) => {
                const doc = resolved(parseMarkdownDocument(source));
                expect(findTemporaries(doc)).toEqual([]);
                const ids = collect(doc, (element) => optionsOf(element).id);
                expect(new Set(ids).size).toBe(ids.length);
                expectLinksResolve(doc);
            }),
        );
    });

    test("block parsing never throws on arbitrary text", () => {
        fc.assert(
            fc.property(fc.string({ maxLength: 200 }), (source) => {
                expect(() => rewrite(parseRstDocument(source))).not.toThrow();
                expect(() => rewrite(parseMarkdownDocument(source))).not.toThrow();
            }),
        );
    });
});
