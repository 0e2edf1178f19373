import { describe, test, expect } from "vitest";
import {
    bulletList,
    bulletListItem,
    emphasized,
    enumList,
    enumListItem,
    externalLinkDefinition,
    header,
    linkReference,
    literalBlock,
    paragraph,
    quotedBlock,
    rule,
    spanSequence,
    text,
} from "@/builders";
import { styles } from "@/options";
import { blockPhase, isThematicBreak, parseAtxHeading, parseMarkdownDocument } from "@/markdown/block-parser";

const blocks = (source: string) => parseMarkdownDocument(source).document.content;

describe("blockPhase", () => {
    test("returns an empty document for empty input", () => {
        expect(blockPhase("").children).toEqual([]);
    });

    test("records its decisions in the trace", () => {
        const messages: string[] = [];
        blockPhase("> quote", (message) => messages.push(message));
        expect(messages).toContain("New blockquote opened");
    });
});

describe("parseAtxHeading", () => {
    test("strips the closing sequence", () => {
        expect(parseAtxHeading("## Title ##")).toEqual({ type: "heading", level: 2, raw: "Title" });
    });

    test("needs a space after the hashes and at most six of them", () => {
        expect(parseAtxHeading("#Title")).toBeNull();
        expect(parseAtxHeading("####### Title")).toBeNull();
    });
});

describe("isThematicBreak", () => {
    test("accepts three or more markers with spaces", () => {
        expect(isThematicBreak("***")).toBe(true);
        expect(isThematicBreak(" - - -")).toBe(true);
        expect(isThematicBreak("--")).toBe(false);
        expect(isThematicBreak("    ***")).toBe(false);
    });
});

describe("parseMarkdownDocument", () => {
    test("headings and paragraphs", () => {
        expect(blocks("# Title\n\nHello *world*.")).toEqual([
            header(1, "Title"),
            paragraph([text("Hello "), emphasized("world"), text(".")]),
        ]);
    });

    test("setext headings", () => {
        expect(blocks("Title\n=====\n\nSub\n---")).toEqual([header(1, "Title"), header(2, "Sub")]);
    });

    test("thematic breaks", () => {
        expect(blocks("a\n\n***\n\nb")).toEqual([paragraph("a"), rule(), paragraph("b")]);
    });

    test("block quotes with lazy continuation", () => {
        expect(blocks("> quote\n> more\nlazy")).toEqual([quotedBlock([paragraph("quote\nmore\nlazy")])]);
    });

    test("fenced code keeps its language as a style", () => {
        expect(blocks("```ts\nconst x = 1\n\nx++\n```")).toEqual([literalBlock("const x = 1\n\nx++", styles("ts"))]);
    });

    test("indented code ends at the first unindented line", () => {
        expect(blocks("    code\n\nafter")).toEqual([literalBlock("code"), paragraph("after")]);
    });

    test("tight lists hold span sequences", () => {
        const format = { bullet: "-" };
        expect(blocks("- a\n- b\n")).toEqual([
            bulletList(
                [bulletListItem([spanSequence([text("a")])], format), bulletListItem([spanSequence([text("b")])], format)],
                format,
            ),
        ]);
    });

    test("loose lists hold paragraphs", () => {
        const format = { bullet: "-" };
        expect(blocks("- a\n\n- b\n")).toEqual([
            bulletList([bulletListItem([paragraph("a")], format), bulletListItem([paragraph("b")], format)], format),
        ]);
    });

    test("ordered lists keep their start number and delimiter", () => {
        const format = { enumType: "arabic" as const, prefix: "", suffix: ")" };
        expect(blocks("3) a\n4) b")).toEqual([
            enumList(
                [enumListItem([spanSequence([text("a")])], format, 3), enumListItem([spanSequence([text("b")])], format, 4)],
                format,
                3,
            ),
        ]);
    });

    test("a different bullet starts a new list", () => {
        const result = blocks("- a\n+ b");
        expect(result.map((block) => block.type)).toEqual(["bullet_list", "bullet_list"]);
    });

    test("reference definitions become link definitions", () => {
        expect(blocks('See [docs][d].\n\n[d]: http://x.org "T"')).toEqual([
            paragraph([text("See "), linkReference("docs", "d", "[docs][d]"), text(".")]),
            externalLinkDefinition("d", "http://x.org", "T"),
        ]);
    });

    test("labels are matched case-insensitively", () => {
        expect(blocks("[Docs]\n\n[DOCS]: /docs")).toEqual([
            paragraph([linkReference("Docs", "docs", "[Docs]")]),
            externalLinkDefinition("docs", "/docs"),
        ]);
    });

    test("the dialect brings no rewrite rules of its own", () => {
        expect(parseMarkdownDocument("x").rewriteRules).toEqual([]);
    });
});
