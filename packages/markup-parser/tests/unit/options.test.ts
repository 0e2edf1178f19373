import { describe, test, expect } from "vitest";
import fc from "fast-check";
import { text, paragraph } from "@/builders";
import { createOptions, fallback, id, isEmptyOptions, mergeOptions, NO_OPT, optionsOf, styles, withOptions } from "@/options";

const optionsArb = fc
    .record({
        id: fc.option(fc.constantFrom("x", "y", "z"), { nil: undefined }),
        styles: fc.array(fc.constantFrom("a", "b", "c", "d"), { maxLength: 4 }),
    })
    .map((init) => createOptions(init));

describe("createOptions", () => {
    test("returns the shared empty value when nothing is set", () => {
        expect(createOptions({})).toBe(NO_OPT);
        expect(styles()).toBe(NO_OPT);
    });

    test("removes duplicate styles keeping first-seen order", () => {
        expect(styles("b", "a", "b").styles).toEqual(["b", "a"]);
    });
});

describe("mergeOptions", () => {
    test("right id and fallback win, styles are unioned", () => {
        const left = createOptions({ id: "left", styles: ["a", "b"], fallback: text("l") });
        const right = createOptions({ id: "right", styles: ["b", "c"] });
        const merged = mergeOptions(left, right);
        expect(merged.id).toBe("right");
        expect(merged.styles).toEqual(["a", "b", "c"]);
        expect(merged.fallback).toEqual(text("l"));
    });

    test("keeps the left id when the right one has none", () => {
        expect(mergeOptions(id("a"), styles("s"))).toEqual({ id: "a", styles: ["s"], fallback: undefined });
    });

    test("the empty value is a left and right identity", () => {
        fc.assert(
            fc.property(optionsArb, (options) => {
                expect(mergeOptions(NO_OPT, options)).toBe(options);
                expect(mergeOptions(options, NO_OPT)).toBe(options);
            }),
        );
    });

    test("merging is associative", () => {
        fc.assert(
            fc.property(optionsArb, optionsArb, optionsArb, (a, b, c) => {
                expect(mergeOptions(mergeOptions(a, b), c)).toEqual(mergeOptions(a, mergeOptions(b, c)));
            }),
        );
    });
});

describe("withOptions", () => {
    test("merges into the options an element already has", () => {
        const element = withOptions(paragraph("p", styles("a")), id("p1"));
        expect(optionsOf(element)).toEqual({ id: "p1", styles: ["a"], fallback: undefined });
    });

    test("returns the element itself for the empty value", () => {
        const element = text("t");
        expect(withOptions(element, NO_OPT)).toBe(element);
    });
});

describe("isEmptyOptions", () => {
    test("detects empty values that are not the shared instance", () => {
        expect(isEmptyOptions({ styles: [] })).toBe(true);
        expect(isEmptyOptions(fallback(text("x")))).toBe(false);
    });
});
