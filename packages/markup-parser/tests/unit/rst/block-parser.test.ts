import { describe, test, expect } from "vitest";
import {
    bulletList,
    bulletListItem,
    cell,
    column,
    comment,
    customizedTextRole,
    decoratedHeader,
    definitionList,
    definitionListItem,
    doctestBlock,
    enumList,
    enumListItem,
    externalLinkDefinition,
    footnoteDefinition,
    image,
    invalidBlock,
    line,
    lineBlock,
    linkAlias,
    literalBlock,
    paragraph,
    quotedBlock,
    row,
    rule,
    table,
    text,
} from "@/builders";
import { id } from "@/options";
import { parseRstDocument, romanToNumber } from "@/rst/block-parser";

const blocks = (source: string) => parseRstDocument(source).document.content;

describe("paragraphs and literal blocks", () => {
    test("splits paragraphs on blank lines", () => {
        expect(blocks("First line\nsecond line\n\nNext")).toEqual([
            paragraph("First line\nsecond line"),
            paragraph("Next"),
        ]);
    });

    test("a paragraph ending in :: introduces a literal block", () => {
        expect(blocks("Example::\n\n    code line\n")).toEqual([paragraph("Example"), literalBlock("code line")]);
    });

    test("a separated marker drops the preceding space", () => {
        expect(blocks("Paragraph: ::\n\n    x = 1\n      y = 2\n")).toEqual([
            paragraph("Paragraph:"),
            literalBlock("x = 1\n  y = 2"),
        ]);
    });

    test("a lone marker leaves no paragraph", () => {
        expect(blocks("::\n\n    code\n")).toEqual([literalBlock("code")]);
    });
});

describe("headers and transitions", () => {
    test("underlined headers carry an id derived from their text", () => {
        expect(blocks("Title\n=====\n\nText.\n")).toEqual([
            decoratedHeader({ char: "=", overline: false }, "Title", id("title")),
            paragraph("Text."),
        ]);
    });

    test("overline and underline make a different decoration", () => {
        expect(blocks("=======\n My Doc\n=======\n")).toEqual([
            decoratedHeader({ char: "=", overline: true }, "My Doc", id("my-doc")),
        ]);
    });

    test("a line of punctuation between blank lines is a transition", () => {
        expect(blocks("Para\n\n----\n\nMore\n")).toEqual([paragraph("Para"), rule(), paragraph("More")]);
    });
});

describe("lists", () => {
    test("bullet list items", () => {
        const format = { bullet: "-" };
        expect(blocks("- one\n- two\n")).toEqual([
            bulletList([bulletListItem([paragraph("one")], format), bulletListItem([paragraph("two")], format)], format),
        ]);
    });

    test("bullet item bodies continue on indented lines", () => {
        const format = { bullet: "*" };
        expect(blocks("* first\n  continued\n\n  second paragraph\n")).toEqual([
            bulletList(
                [bulletListItem([paragraph("first\ncontinued"), paragraph("second paragraph")], format)],
                format,
            ),
        ]);
    });

    test("enumerated lists keep their format and start", () => {
        const format = { enumType: "arabic" as const, prefix: "", suffix: "." };
        expect(blocks("3. c\n4. d\n")).toEqual([
            enumList([enumListItem([paragraph("c")], format, 3), enumListItem([paragraph("d")], format, 4)], format, 3),
        ]);
    });

    test("alphabetic and roman enumerators", () => {
        const [alpha] = blocks("(a) x\n(b) y\n");
        expect(alpha).toMatchObject({
            type: "enum_list",
            format: { enumType: "lower-alpha", prefix: "(", suffix: ")" },
            start: 1,
        });
        const [roman] = blocks("iv. x\nv. y\n");
        expect(roman).toMatchObject({ type: "enum_list", format: { enumType: "lower-roman" }, start: 4 });
    });

    test("an enumerator followed by an unindented line stays a paragraph", () => {
        expect(blocks("A. Smith wrote\nthis book.")).toEqual([paragraph("A. Smith wrote\nthis book.")]);
    });

    test("definition lists", () => {
        expect(blocks("term\n   definition\n")).toEqual([
            definitionList([definitionListItem("term", [paragraph("definition")])]),
        ]);
    });

    test("roman numerals", () => {
        expect(romanToNumber("xiv")).toBe(14);
        expect(romanToNumber("MCMXC")).toBe(1990);
    });
});

describe("quotes, line blocks and doctests", () => {
    test("indented text is a block quote with an optional attribution", () => {
        expect(blocks("Text\n\n    quoted\n\n    -- Author\n")).toEqual([
            paragraph("Text"),
            quotedBlock([paragraph("quoted")], [text("Author")]),
        ]);
    });

    test("line blocks nest by indentation", () => {
        expect(blocks("| one\n|    nested\n| two\n")).toEqual([
            lineBlock([line("one"), lineBlock([line("nested")]), line("two")]),
        ]);
    });

    test("doctest blocks run to the next blank line", () => {
        expect(blocks(">>> 1 + 1\n2\n\nAfter")).toEqual([doctestBlock(">>> 1 + 1\n2"), paragraph("After")]);
    });
});

describe("simple tables", () => {
    test("the first section is the head when there are several", () => {
        const source = ["===  ===  ===", "a    b    c", "===  ===  ===", "1    2    3", "===  ===  ===", ""].join("\n");
        const headCells = ["a", "b", "c"].map((value) => cell("head", [paragraph(value)]));
        const bodyCells = ["1", "2", "3"].map((value) => cell("body", [paragraph(value)]));
        expect(blocks(source)).toEqual([table([row(headCells)], [row(bodyCells)], [column(), column(), column()])]);
    });

    test("an unterminated table is not a table", () => {
        const [first] = blocks("===  ===\na    b\n");
        expect(first.type).not.toBe("table");
    });
});

describe("explicit markup", () => {
    test("hyperlink targets become link definitions", () => {
        expect(blocks(".. _Python Site: http://python.org\n")).toEqual([
            externalLinkDefinition("python-site", "http://python.org"),
        ]);
    });

    test("a target pointing at another name is an alias", () => {
        expect(blocks(".. _docs: manual_\n")).toEqual([linkAlias("docs", "manual")]);
    });

    test("footnotes keep their label kind", () => {
        expect(blocks(".. [#note] Some text.\n")).toEqual([
            footnoteDefinition({ kind: "autonumber-label", label: "note" }, [paragraph("Some text.")]),
        ]);
        expect(blocks(".. [2] Two.\n")).toEqual([footnoteDefinition({ kind: "numeric", number: 2 }, [paragraph("Two.")])]);
    });

    test("image directives read their fields", () => {
        expect(blocks(".. image:: pic.png\n   :alt: A picture\n")).toEqual([paragraph([image("A picture", "pic.png")])]);
    });

    test("role directives define customized roles", () => {
        expect(blocks(".. role:: custom\n")).toEqual([customizedTextRole("custom", "title-reference", ["custom"])]);
        expect(blocks(".. role:: loud(strong)\n   :class: big red\n")).toEqual([
            customizedTextRole("loud", "strong", ["big", "red"]),
        ]);
    });

    test("unknown directives become invalid blocks with the source as fallback", () => {
        expect(blocks(".. foo:: bar\n")).toEqual([invalidBlock("unknown directive: foo", literalBlock(".. foo:: bar"))]);
    });

    test("anything else is a comment", () => {
        expect(blocks(".. just a comment\n")).toEqual([comment("just a comment")]);
    });
});

describe("parseRstDocument", () => {
    test("reports every recognized block to the trace", () => {
        const messages: string[] = [];
        parseRstDocument("Title\n=====\n\nText.\n", { trace: (message) => messages.push(message) });
        expect(messages).toEqual(["underlined header at line 1", "paragraph at line 4"]);
    });

    test("returns the dialect rewrite rules with the document", () => {
        expect(parseRstDocument("Hi").rewriteRules).toHaveLength(1);
    });
});
