/**
 * A colour as the bar components accept it: a packed 0xAARRGGBB number or a
 * `#RGB` / `#RRGGBB` / `#AARRGGBB` hex string.
 */
export type BarColor = number | string;

/** Resolves a colour to the packed ARGB integer sent over the bridge. */
export type ColorResolver = (color: BarColor | undefined) => number | null;

/**
 * Default resolver. Hex strings without alpha are opaque; anything that does
 * not parse resolves to null (and is then not sent).
 */
export const packColor: ColorResolver = (color) => {
  if (color === undefined) return null;
  if (typeof color === "number") {
    if (!Number.isInteger(color)) return null;
    return color >>> 0;
  }

  let cleaned = color.trim();
  if (cleaned.startsWith("#")) cleaned = cleaned.slice(1);
  if (cleaned.length === 3) {
    cleaned = cleaned
      .split("")
      .map((c) => c + c)
      .join("");
  }
  if (cleaned.length === 6) cleaned = `ff${cleaned}`;
  if (cleaned.length !== 8 || !/^[0-9a-f]+$/i.test(cleaned)) return null;
  return parseInt(cleaned, 16) >>> 0;
};
