import { describe, test, expect } from "vitest";
import { strong } from "@/builders";
import type { RewriteRule } from "@/ast";
import {
    isMarkupPlugin,
    orderPlugins,
    pluginName,
    pluginRenderOverrides,
    pluginRewriteRules,
    type MarkupPlugin,
} from "@/plugin-system";
import type { RenderOverride } from "@/render/render";

describe("isMarkupPlugin", () => {
    test("accepts objects with well-typed hooks", () => {
        expect(isMarkupPlugin({})).toBe(true);
        expect(isMarkupPlugin({ name: "p", priority: 2, rewriteRules: [], onRender: (output: string) => output })).toBe(true);
    });

    test("rejects everything else", () => {
        expect(isMarkupPlugin(null)).toBe(false);
        expect(isMarkupPlugin("plugin")).toBe(false);
        expect(isMarkupPlugin({ priority: "1" })).toBe(false);
        expect(isMarkupPlugin({ onRender: "x" })).toBe(false);
        expect(isMarkupPlugin({ renderOverrides: {} })).toBe(false);
    });
});

describe("orderPlugins", () => {
    test("sorts by priority and keeps the given order for ties", () => {
        const a: MarkupPlugin = { name: "a" };
        const b: MarkupPlugin = { name: "b", priority: -5 };
        const c: MarkupPlugin = { name: "c" };
        const d: MarkupPlugin = { name: "d", priority: 3 };
        expect(orderPlugins([a, b, c, d]).map(pluginName)).toEqual(["b", "a", "c", "d"]);
    });
});

describe("plugin hooks", () => {
    test("rules and overrides are concatenated in plugin order", () => {
        const first: RewriteRule = () => undefined;
        const second: RewriteRule = () => strong("x");
        const override: RenderOverride = () => false;
        const plugins: MarkupPlugin[] = [{ rewriteRules: [first] }, { rewriteRules: [second], renderOverrides: [override] }];
        expect(pluginRewriteRules(plugins)).toEqual([first, second]);
        expect(pluginRenderOverrides(plugins)).toEqual([override]);
    });

    test("unnamed plugins", () => {
        expect(pluginName({})).toBe("anonymous");
    });
});
