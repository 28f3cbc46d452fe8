import { Color, TileColor, allColors } from '../types';

// Number of named colors before minted ones take over
export const NUM_NAMED_COLORS = allColors.length;

const MINTED_PREFIX = 'color-';

// Interned colors, so colorAt(i) === colorAt(i) for every index
const colorTable: Color[] = [];

/**
 * Map an index onto the unbounded color space. The first indices are the
 * named palette; every later index gets a `color-<index>` identifier.
 */
export function colorAt(index: number): Color {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Color index must be a non-negative integer, got ${index}`);
  }

  const existing = colorTable[index];
  if (existing) {
    return existing;
  }

  const name = index < NUM_NAMED_COLORS ? allColors[index] : `${MINTED_PREFIX}${index}`;
  const color: Color = Object.freeze({ index, name });
  colorTable[index] = color;
  return color;
}

/**
 * The first `count` colors of the space, in order
 */
export function firstColors(count: number): Color[] {
  return Array.from({ length: count }, (_, i) => colorAt(i));
}

export function colorFromTile(tile: TileColor): Color {
  return colorAt(allColors.indexOf(tile));
}

/**
 * Resolve a palette name (`red`) or a minted name (`color-7`) to its color.
 * Returns null for anything else.
 */
export function parseColor(name: string): Color | null {
  const normalized = name.trim().toLowerCase();
  const namedIndex = allColors.findIndex(tile => tile === normalized);
  if (namedIndex !== -1) {
    return colorAt(namedIndex);
  }

  if (normalized.startsWith(MINTED_PREFIX)) {
    const digits = normalized.slice(MINTED_PREFIX.length);
    if (/^\d+$/.test(digits)) {
      return colorAt(Number(digits));
    }
  }

  return null;
}

export const colorsEqual = (a: Color, b: Color): boolean => a.index === b.index;

export const compareColors = (a: Color, b: Color): number => a.index - b.index;

// Get the TileColor of a named color, or null for minted ones
export const getTileColor = (color: Color): TileColor | null => {
  return color.index < NUM_NAMED_COLORS ? allColors[color.index] : null;
};
