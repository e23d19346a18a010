import type { Brick, BrickCell, BrickLayout, BrickfallConfig, LevelProvider } from './types';

export const BRICK_SYMBOL = '#';
export const SPECIAL_SYMBOL = 'A';

const PALETTE_SIZE = 10;
const SPECIAL_PERIOD = 18;

// How cells outside the text of a level file are filled
export type MissingCellPolicy = 'empty' | 'procedural';

export interface LevelProviderOptions {
  rows: number;
  cols: number;
  texts: ReadonlyMap<number, string>;
  missingCells?: MissingCellPolicy;
}

export type TextFetcher = (url: string) => Promise<string | null>;

function colorIndexFor(row: number, col: number, level: number): number {
  return (row + col + level) % PALETTE_SIZE;
}

function emptyCell(row: number, col: number, level: number): BrickCell {
  return { alive: false, colorIndex: colorIndexFor(row, col, level), special: false };
}

// Pure function of (row, col, level); the fallback layout must be reproducible
export function proceduralCell(row: number, col: number, level: number, cols: number): BrickCell {
  const alive = level <= 1 || (row + col + level) % (1 + Math.floor(level / 2)) !== 0;
  return {
    alive,
    colorIndex: colorIndexFor(row, col, level),
    special: alive && (row * cols + col + 3 * level) % SPECIAL_PERIOD === 0,
  };
}

export function proceduralLayout(level: number, rows: number, cols: number): BrickLayout {
  const layout: BrickLayout = [];
  for (let r = 0; r < rows; r++) {
    const row: BrickCell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(proceduralCell(r, c, level, cols));
    }
    layout.push(row);
  }
  return layout;
}

/**
 * Parse a level file: one text line per brick row, `#` for a brick, `A` for
 * a brick that drops a collectible, anything else empty. Extra rows and
 * columns are ignored.
 */
export function parseLevelText(
  text: string,
  level: number,
  rows: number,
  cols: number,
  missingCells: MissingCellPolicy = 'empty'
): BrickLayout {
  const lines = text.split(/\r?\n/);
  const fill = (r: number, c: number): BrickCell =>
    missingCells === 'procedural' ? proceduralCell(r, c, level, cols) : emptyCell(r, c, level);

  const layout: BrickLayout = [];
  for (let r = 0; r < rows; r++) {
    const line = r < lines.length ? lines[r] : undefined;
    const row: BrickCell[] = [];
    for (let c = 0; c < cols; c++) {
      if (line === undefined || c >= line.length) {
        row.push(fill(r, c));
        continue;
      }
      const ch = line[c];
      const colorIndex = colorIndexFor(r, c, level);
      if (ch === BRICK_SYMBOL) {
        row.push({ alive: true, colorIndex, special: false });
      } else if (ch === SPECIAL_SYMBOL) {
        row.push({ alive: true, colorIndex, special: true });
      } else {
        row.push({ alive: false, colorIndex, special: false });
      }
    }
    layout.push(row);
  }
  return layout;
}

export function countAlive(layout: BrickLayout): number {
  let alive = 0;
  for (const row of layout) {
    for (const cell of row) {
      if (cell.alive) alive++;
    }
  }
  return alive;
}

// File-backed levels, falling back to the procedural layout per level
export function createLevelProvider(options: LevelProviderOptions): LevelProvider {
  const { rows, cols, texts, missingCells = 'empty' } = options;
  return {
    layoutFor(level: number): BrickLayout {
      const text = texts.get(level);
      if (text === undefined) {
        return proceduralLayout(level, rows, cols);
      }
      return parseLevelText(text, level, rows, cols, missingCells);
    },
  };
}

export function levelFileName(level: number): string {
  return `level${level}.txt`;
}

/**
 * Fetch every level file up front so the frame loop never waits on I/O.
 * Missing or failing files are left out of the map.
 */
export async function loadLevelTexts(
  fetchText: TextFetcher,
  baseUrl: string,
  maxLevels: number
): Promise<Map<number, string>> {
  const levels = Array.from({ length: maxLevels }, (_, i) => i + 1);
  const results = await Promise.allSettled(
    levels.map((level) => fetchText(`${baseUrl}${levelFileName(level)}`))
  );

  const texts = new Map<number, string>();
  results.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      if (result.value !== null) texts.set(levels[i], result.value);
    } else {
      console.warn(`Level ${levels[i]} unavailable, using generated layout:`, result.reason);
    }
  });
  return texts;
}

// Browser fetcher: a 404 or an HTML fallback page counts as a missing file
export const fetchLevelText: TextFetcher = async (url) => {
  const res = await fetch(url);
  if (!res.ok) return null;
  const type = res.headers.get('content-type') ?? '';
  if (type.includes('text/html')) return null;
  return res.text();
};

export function brickWidthFor(config: BrickfallConfig): number {
  return Math.floor(config.fieldWidth / config.brickCols);
}

// Lay out a grid of bricks from a layout; rows and cols past the layout stay empty
export function buildBricks(layout: BrickLayout, level: number, config: BrickfallConfig): Brick[] {
  const { brickRows, brickCols, brickHeight, brickPadding, brickTop } = config;
  const brickWidth = brickWidthFor(config);
  const bricks: Brick[] = [];

  for (let r = 0; r < brickRows; r++) {
    for (let c = 0; c < brickCols; c++) {
      const cell = layout[r]?.[c] ?? emptyCell(r, c, level);
      bricks.push({
        rect: {
          x: c * brickWidth + Math.floor(brickPadding / 2),
          y: brickTop + r * (brickHeight + brickPadding),
          w: brickWidth - brickPadding,
          h: brickHeight - brickPadding,
        },
        row: r,
        col: c,
        alive: cell.alive,
        colorIndex: cell.colorIndex,
        special: cell.alive && cell.special,
      });
    }
  }
  return bricks;
}
