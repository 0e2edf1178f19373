import { describe, test, expect } from "vitest";
import type { Element } from "@/ast";
import { paragraph, text } from "@/builders";
import { ConversionError } from "@/errors";
import { createOptions, styles } from "@/options";
import { escapeXml, MarkupWriter, StringSink, type OutputSink, type WriterFormat } from "@/render/writer";

const format: WriterFormat = { indent: "  ", escape: escapeXml, styleAttribute: "class" };

function renderText(element: Element, out: MarkupWriter) {
    if (element.type === "text") out.text(element.content);
    else out.raw(`[${element.type}]`);
}

function createWriter(writerFormat: WriterFormat = format) {
    const sink = new StringSink();
    return { sink, out: new MarkupWriter(sink, writerFormat, renderText) };
}

describe("escapeXml", () => {
    test("escapes markup characters", () => {
        expect(escapeXml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
    });
});

describe("MarkupWriter", () => {
    test("writes the id, then styles, then explicit attributes", () => {
        const { sink, out } = createWriter();
        out.open("a", createOptions({ id: "x", styles: ["s1", "s2"] }), [
            ["href", "u&v"],
            ["title", undefined],
            ["tabindex", 0],
        ]);
        expect(sink.toString()).toBe('<a id="x" class="s1 s2" href="u&amp;v" tabindex="0">');
    });

    test("leaves styles out without a style attribute", () => {
        const { sink, out } = createWriter({ indent: "", escape: (value) => value });
        out.emptyTag("br", styles("x"));
        expect(sink.toString()).toBe("<br/>");
    });

    test("line breaks in text keep the current indentation", () => {
        const { sink, out } = createWriter();
        out.withIndent(() => {
            out.newline().text("a\nb");
        });
        out.newline().text("c");
        expect(sink.toString()).toBe("\n  a\n  b\nc");
    });

    test("preformatted text is escaped but not indented", () => {
        const { sink, out } = createWriter();
        out.withIndent(() => {
            out.preformatted("a <\nb");
        });
        expect(sink.toString()).toBe("a &lt;\nb");
    });

    test("block tags put every child on its own indented line", () => {
        const { sink, out } = createWriter();
        out.blockTag("ul", undefined, [text("one"), text("two")]);
        expect(sink.toString()).toBe("<ul>\n  one\n  two\n</ul>");
    });

    test("inline tags and lines hand children back to the render function", () => {
        const { sink, out } = createWriter();
        out.inlineTag("p", styles("lead"), [text("a"), paragraph("b")]).newline().lines([text("x"), text("y")]);
        expect(sink.toString()).toBe('<p class="lead">a[paragraph]</p>\nx\ny');
    });

    test("failures of the sink become output errors", () => {
        const failing: OutputSink = {
            write() {
                throw new Error("disk full");
            },
        };
        const out = new MarkupWriter(failing, format, renderText);
        expect(() => out.raw("x")).toThrow(ConversionError);
        expect(() => out.raw("x")).toThrow("cannot write to the output sink");
    });

    test("empty chunks are not written", () => {
        const chunks: string[] = [];
        const out = new MarkupWriter({ write: (chunk) => chunks.push(chunk) }, format, renderText);
        out.raw("").text("").raw("a");
        expect(chunks).toEqual(["a"]);
    });
});
