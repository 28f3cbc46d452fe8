import { describe, it, expect } from 'vitest';
import { TileColor } from '../../types';
import {
  NUM_NAMED_COLORS,
  colorAt,
  colorFromTile,
  colorsEqual,
  compareColors,
  firstColors,
  getTileColor,
  parseColor,
} from '../colorUtils';

describe('colorAt', () => {
  it('maps the first indices onto the named palette', () => {
    expect(NUM_NAMED_COLORS).toBe(6);
    expect(colorAt(0)).toEqual({ index: 0, name: 'red' });
    expect(colorAt(5)).toEqual({ index: 5, name: 'orange' });
  });

  it('mints identifiers past the named palette', () => {
    expect(colorAt(6).name).toBe('color-6');
    expect(colorAt(42).name).toBe('color-42');
  });

  it('returns the same object for the same index', () => {
    expect(colorAt(3)).toBe(colorAt(3));
    expect(colorAt(17)).toBe(colorAt(17));
    expect(Object.isFrozen(colorAt(2))).toBe(true);
  });

  it('rejects negative and fractional indices', () => {
    expect(() => colorAt(-1)).toThrow(RangeError);
    expect(() => colorAt(1.5)).toThrow('Color index must be a non-negative integer, got 1.5');
  });
});

describe('firstColors', () => {
  it('returns the prefix of the color space in order', () => {
    expect(firstColors(3).map(color => color.name)).toEqual(['red', 'green', 'blue']);
    expect(firstColors(0)).toEqual([]);
  });
});

describe('parseColor', () => {
  it('resolves palette names regardless of case and padding', () => {
    expect(parseColor(' Blue ')).toBe(colorAt(2));
    expect(parseColor('YELLOW')).toBe(colorAt(3));
  });

  it('resolves minted names', () => {
    expect(parseColor('color-9')).toBe(colorAt(9));
  });

  it('returns null for unknown names', () => {
    expect(parseColor('magenta')).toBeNull();
    expect(parseColor('color-x')).toBeNull();
    expect(parseColor('')).toBeNull();
  });
});

describe('tile helpers', () => {
  it('converts between TileColor and Color', () => {
    expect(colorFromTile(TileColor.Purple)).toBe(colorAt(4));
    expect(getTileColor(colorAt(5))).toBe(TileColor.Orange);
    expect(getTileColor(colorAt(7))).toBeNull();
  });

  it('compares colors by index', () => {
    expect(colorsEqual(colorAt(1), { index: 1, name: 'green' })).toBe(true);
    expect(colorsEqual(colorAt(1), colorAt(2))).toBe(false);
    expect([colorAt(8), colorAt(0), colorAt(3)].sort(compareColors).map(c => c.index)).toEqual([0, 3, 8]);
  });
});
