import { describe, test, expect } from "vitest";
import { document, header, invalidSpan, paragraph, rule, section, text } from "@/builders";
import { id, styles } from "@/options";
import { prettyPrintRenderer, truncate, typeName } from "@/render/pretty-print";
import { renderToString } from "@/render/render";

const dump = (element: Parameters<typeof renderToString>[0]) => renderToString(element, prettyPrintRenderer);

describe("prettyPrintRenderer", () => {
    test("one element per line, indented with dots", () => {
        expect(dump(document([paragraph("abc")]))).toBe("Document - Blocks: 1\n. Paragraph - Spans: 1\n. . Text - 'abc'");
    });

    test("attributes and options follow the type name", () => {
        expect(dump(header(1, "T", id("t")))).toBe("Header(1,Id(t)) - Spans: 1\n. Text - 'T'");
        expect(dump(text("x", styles("a", "b")))).toBe("Text(Styles(a,b)) - 'x'");
    });

    test("elements without content show only their name", () => {
        expect(dump(rule())).toBe("Rule");
    });

    test("child elements are listed before the content", () => {
        expect(dump(section(header(1, "T"), [paragraph("x")]))).toBe(
            [
                "Section",
                ". Header(1) - Spans: 1",
                ". . Text - 'T'",
                ". Content - Blocks: 1",
                ". . Paragraph - Spans: 1",
                ". . . Text - 'x'",
            ].join("\n"),
        );
    });

    test("invalid spans show their message and fallback", () => {
        expect(dump(invalidSpan("m", "f"))).toBe("InvalidSpan\n. SystemMessage(error) - 'm'\n. Text - 'f'");
    });
});

describe("truncate", () => {
    test("keeps short texts and flattens line breaks", () => {
        expect(truncate("a\nb")).toBe("a|b");
    });

    test("shortens long texts to their beginning and end", () => {
        expect(truncate("a".repeat(30) + "b".repeat(30))).toBe(`${"a".repeat(25)} [...] ${"b".repeat(25)}`);
    });
});

describe("typeName", () => {
    test("turns type tags into names", () => {
        expect(typeName("definition_list_item")).toBe("DefinitionListItem");
    });
});
