import type { Rect } from './types';
import glyphData from './font5x7.json';

// Each glyph is five column bytes; bit n of a column is pixel row n
export const GLYPH_COLUMNS = 5;
export const GLYPH_ROWS = 7;
export const GLYPH_ADVANCE = 6;

const GLYPHS: ReadonlyMap<string, readonly number[]> = new Map(Object.entries(glyphData));

export function hasGlyph(ch: string): boolean {
  return GLYPHS.has(ch.toUpperCase());
}

export function glyphPixels(ch: string, x: number, y: number, scale: number): Rect[] {
  const columns = GLYPHS.get(ch.toUpperCase());
  if (!columns) return [];

  const pixels: Rect[] = [];
  for (let col = 0; col < GLYPH_COLUMNS; col++) {
    const bits = columns[col] ?? 0;
    for (let row = 0; row < GLYPH_ROWS; row++) {
      if ((bits >> row) & 1) {
        pixels.push({ x: x + col * scale, y: y + row * scale, w: scale, h: scale });
      }
    }
  }
  return pixels;
}

// Characters without a glyph still take up a cell
export function textPixels(text: string, x: number, y: number, scale: number): Rect[] {
  const pixels: Rect[] = [];
  let cursor = x;
  for (const ch of text) {
    pixels.push(...glyphPixels(ch, cursor, y, scale));
    cursor += GLYPH_ADVANCE * scale;
  }
  return pixels;
}

export function textWidth(text: string, scale: number): number {
  return text.length * GLYPH_ADVANCE * scale;
}

// HUD numbers never draw negative
export function formatCount(value: number): string {
  if (!Number.isFinite(value) || value < 0) return '0';
  return String(Math.floor(value));
}

export function numberPixelsRight(value: number, rightX: number, y: number, scale: number): Rect[] {
  const text = formatCount(value);
  return textPixels(text, rightX - textWidth(text, scale) + 1, y, scale);
}

export function centeredTextX(text: string, fieldWidth: number, scale: number): number {
  return Math.floor((fieldWidth - textWidth(text, scale)) / 2);
}
