import { describe, expect, it } from "vitest";

import type { Group, SectionElement } from "../types.ts";

import { alignSections, effectiveAlignment, effectiveTitle } from "../alignment.ts";

function single(slot: number): Group {
  return { type: "group", buttons: [{ slot, padding: 0, leadingInset: 0, trailingInset: 0 }] };
}

const L = single(0);
const M = single(1);
const T = single(2);
const FLEX = { type: "spacer", spacer: "flexible" } as const;

const leading = { type: "group", section: "leading", group: L } as const;
const middle = { type: "group", section: "middle", group: M } as const;
const trailing = { type: "group", section: "trailing", group: T } as const;

function sections(l: SectionElement[], m: SectionElement[], t: SectionElement[]) {
  return { leading: l, middle: m, trailing: t };
}

describe("alignSections", () => {
  it("centres the middle between two flexible gaps", () => {
    expect(alignSections(sections([L], [M], [T]), "center")).toEqual({
      leading: [leading, FLEX, middle, FLEX],
      trailing: [trailing],
      alignment: "center",
    });
  });

  it("centres the middle with no leading content", () => {
    expect(alignSections(sections([], [M], [T]))).toEqual({
      leading: [FLEX, middle, FLEX],
      trailing: [trailing],
      alignment: "center",
    });
  });

  it("places the middle right after the leading section", () => {
    expect(alignSections(sections([L], [M], [T]), "leading")).toEqual({
      leading: [leading, middle, FLEX],
      trailing: [trailing],
      alignment: "leading",
    });
  });

  it("merges the middle into the trailing section", () => {
    expect(alignSections(sections([L], [M], [T]), "trailing")).toEqual({
      leading: [leading, FLEX],
      trailing: [middle, trailing],
      alignment: "trailing",
    });
  });

  it("falls back to center when the trailing section is empty", () => {
    const input = sections([L], [M], []);
    expect(alignSections(input, "trailing")).toEqual(alignSections(input, "center"));
    expect(alignSections(input, "trailing").alignment).toBe("center");
  });

  it("falls back to center when the leading section is empty", () => {
    const input = sections([], [M], [T]);
    expect(alignSections(input, "leading")).toEqual(alignSections(input, "center"));
  });

  it("collapses to one flexible gap when there is no middle", () => {
    expect(alignSections(sections([L], [], [T]))).toEqual({
      leading: [leading, FLEX],
      trailing: [trailing],
      alignment: "center",
    });
  });

  it("adds no gap when only one side has content", () => {
    expect(alignSections(sections([L], [], []))).toEqual({
      leading: [leading],
      trailing: [],
      alignment: "center",
    });
  });
});

describe("effectiveAlignment", () => {
  it("keeps a requested side only when that side has content", () => {
    expect(effectiveAlignment("leading", true, false)).toBe("leading");
    expect(effectiveAlignment("leading", false, true)).toBe("center");
    expect(effectiveAlignment("trailing", false, true)).toBe("trailing");
    expect(effectiveAlignment("trailing", true, false)).toBe("center");
    expect(effectiveAlignment("center", true, true)).toBe("center");
  });
});

describe("effectiveTitle", () => {
  it("suppresses the title when the middle has buttons", () => {
    expect(effectiveTitle("Inbox", [M])).toBeNull();
  });

  it("keeps the title when the middle is empty or only spacers", () => {
    expect(effectiveTitle("Inbox", [])).toBe("Inbox");
    expect(effectiveTitle("Inbox", [FLEX])).toBe("Inbox");
  });
});
