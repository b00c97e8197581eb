import type {
  AlignedSections,
  BarElement,
  MiddleAlignment,
  SectionElement,
  SectionKind,
  Spacer,
} from "./types.ts";

export interface SectionElements {
  readonly leading: readonly SectionElement[];
  readonly middle: readonly SectionElement[];
  readonly trailing: readonly SectionElement[];
}

const FLEXIBLE: Spacer = { type: "spacer", spacer: "flexible" };

function hasGroups(elements: readonly SectionElement[]): boolean {
  return elements.some((element) => element.type === "group");
}

function place(section: SectionKind, elements: readonly SectionElement[]): BarElement[] {
  return elements.map(
    (element): BarElement =>
      element.type === "group" ? { type: "group", section, group: element } : element,
  );
}

/** Applies the fallback rules: leading/trailing need content on that side. */
export function effectiveAlignment(
  requested: MiddleAlignment,
  hasLeading: boolean,
  hasTrailing: boolean,
): MiddleAlignment {
  if (requested === "leading" && hasLeading) return "leading";
  if (requested === "trailing" && hasTrailing) return "trailing";
  return "center";
}

/**
 * Positions the middle section between the leading and trailing sections.
 *
 * "leading":  [leading, middle, flex] | [trailing]
 * "trailing": [leading, flex] | [middle, trailing]
 * "center":   [leading, flex, middle, flex] | [trailing]
 *
 * With no middle buttons the two centring gaps collapse into a single flexible
 * gap between leading and trailing content.
 */
export function alignSections(
  sections: SectionElements,
  requested: MiddleAlignment = "center",
): AlignedSections {
  const leading = place("leading", sections.leading);
  const middle = place("middle", sections.middle);
  const trailing = place("trailing", sections.trailing);
  const hasLeading = leading.length > 0;
  const hasTrailing = trailing.length > 0;
  const alignment = effectiveAlignment(requested, hasLeading, hasTrailing);

  if (!hasGroups(sections.middle)) {
    return {
      leading: hasLeading && hasTrailing ? [...leading, FLEXIBLE] : leading,
      trailing,
      alignment,
    };
  }

  switch (alignment) {
    case "leading":
      return { leading: [...leading, ...middle, FLEXIBLE], trailing, alignment };
    case "trailing":
      return { leading: [...leading, FLEXIBLE], trailing: [...middle, ...trailing], alignment };
    case "center":
      return { leading: [...leading, FLEXIBLE, ...middle, FLEXIBLE], trailing, alignment };
  }
}

/** Middle items replace the title; the title only renders when there are none. */
export function effectiveTitle(title: string, middle: readonly SectionElement[]): string | null {
  return hasGroups(middle) ? null : title;
}
