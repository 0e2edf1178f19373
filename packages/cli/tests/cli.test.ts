import { describe, test, expect } from "vitest";
import { readSources, resolveCliOptions, runCli, type CliIO } from "../src/cli";

function createIO(files: Record<string, string>) {
    const written = new Map<string, string>();
    const stdout: string[] = [];
    const stderr: string[] = [];
    const io: CliIO = {
        readFile: async (path) => {
            const content = files[path];
            if (content === undefined) throw new Error(`no such file: ${path}`);
            return content;
        },
        writeFile: async (path, content) => {
            written.set(path, content);
        },
        writeStdout: (text) => {
            stdout.push(text);
        },
        writeStderr: (text) => {
            stderr.push(text);
        },
    };
    return { io, written, stdout, stderr };
}

const run = (io: CliIO, ...args: string[]) => runCli(["node", "docweave", ...args], io);

describe("runCli", () => {
    test("writes to stdout with a trailing newline", async () => {
        const { io, stdout } = createIO({ "a.md": "Hello *world*." });
        expect(await run(io, "a.md")).toBe(0);
        expect(stdout.join("")).toBe("<p>Hello <em>world</em>.</p>\n");
    });

    test("joins several inputs with a blank line", async () => {
        const { io, stdout } = createIO({ "a.rst": "Hello", "b.rst": "World" });
        expect(await run(io, "--to", "ast", "a.rst", "b.rst")).toBe(0);
        expect(stdout.join("")).toBe(
            "Document - Blocks: 2\n. Paragraph - Spans: 1\n. . Text - 'Hello'\n. Paragraph - Spans: 1\n. . Text - 'World'\n",
        );
    });

    test("picks the output format from the output file", async () => {
        const { io, written, stdout } = createIO({ "guide.md": "x" });
        expect(await run(io, "-o", "out.xml", "guide.md")).toBe(0);
        expect(stdout).toEqual([]);
        const output = written.get("out.xml") ?? "";
        expect(output.startsWith("<!DOCTYPE article")).toBe(true);
        expect(output).toContain("  <artheader><title>guide.md</title></artheader>\n  <para>x</para>\n</article>");
    });

    test("conversion errors are reported on stderr", async () => {
        const { io, stderr } = createIO({ "a.txt": "x" });
        expect(await run(io, "--from", "asciidoc", "a.txt")).toBe(1);
        expect(stderr).toEqual(["docweave: asciidoc input needs an external processor\n"]);
    });

    test("missing files are reported on stderr", async () => {
        const { io, stderr } = createIO({});
        expect(await run(io, "missing.md")).toBe(1);
        expect(stderr).toEqual(["docweave: no such file: missing.md\n"]);
    });

    test("invalid choices are usage errors", async () => {
        const { io, stderr, stdout } = createIO({ "a.md": "x" });
        expect(await run(io, "--to", "latex", "a.md")).toBe(1);
        expect(stdout).toEqual([]);
        expect(stderr.join("")).toContain("latex");
    });

    test("prints its version", async () => {
        const { io, stdout } = createIO({});
        expect(await run(io, "--version")).toBe(0);
        expect(stdout.join("")).toBe("0.1.0\n");
    });
});

describe("resolveCliOptions", () => {
    test("derives formats and title from the file names", () => {
        expect(resolveCliOptions(["docs/intro.rst"], { output: "site/intro.html" })).toEqual({
            from: "rst",
            to: "html",
            title: "intro.rst",
        });
    });

    test("explicit options win", () => {
        expect(
            resolveCliOptions(["a.md"], { from: "rst", to: "docbook", title: "Manual", messageLevel: "warning" }),
        ).toEqual({ from: "rst", to: "docbook", title: "Manual", messageLevel: "warning" });
    });
});

describe("readSources", () => {
    test("keeps the order of the files", async () => {
        const { io } = createIO({ a: "1", b: "2" });
        expect(await readSources(["b", "a"], io)).toBe("2\n\n1");
    });
});
