import { describe, it, expect } from 'vitest';
import {
  centeredTextX,
  formatCount,
  glyphPixels,
  hasGlyph,
  numberPixelsRight,
  textPixels,
  textWidth,
} from './font';

describe('glyphs', () => {
  it('covers digits and capital letters', () => {
    for (const ch of '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ') {
      expect(hasGlyph(ch)).toBe(true);
    }
    expect(hasGlyph('z')).toBe(true);
    expect(hasGlyph('?')).toBe(false);
  });

  it('turns set bits into scaled pixels', () => {
    const pixels = glyphPixels('1', 10, 20, 2);
    // Column bytes 0, 66, 127, 64, 0
    expect(pixels).toHaveLength(10);
    expect(pixels[0]).toEqual({ x: 12, y: 22, w: 2, h: 2 });
    expect(pixels[pixels.length - 1]).toEqual({ x: 16, y: 32, w: 2, h: 2 });
  });

  it('draws lowercase as uppercase', () => {
    expect(glyphPixels('k', 0, 0, 1)).toEqual(glyphPixels('K', 0, 0, 1));
  });

  it('draws nothing for unknown characters', () => {
    expect(glyphPixels('?', 0, 0, 3)).toEqual([]);
  });
});

describe('text layout', () => {
  it('advances six cells per character, blank or not', () => {
    const pixels = textPixels(' 1', 0, 0, 1);
    expect(pixels[0]).toEqual({ x: 7, y: 1, w: 1, h: 1 });
    expect(textWidth('SCORE', 2)).toBe(60);
  });

  it('right-aligns numbers', () => {
    const pixels = numberPixelsRight(1, 100, 0, 1);
    expect(Math.min(...pixels.map((p) => p.x))).toBe(96);
    expect(Math.max(...pixels.map((p) => p.x + p.w))).toBe(99);
  });

  it('centres text in the field', () => {
    expect(centeredTextX('PAUSED', 960, 6)).toBe(372);
  });

  it('formats counts as whole non-negative numbers', () => {
    expect(formatCount(12.9)).toBe('12');
    expect(formatCount(-5)).toBe('0');
    expect(formatCount(Number.NaN)).toBe('0');
  });
});
