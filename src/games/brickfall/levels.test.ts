import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildBricks,
  countAlive,
  createLevelProvider,
  levelFileName,
  loadLevelTexts,
  parseLevelText,
  proceduralCell,
  proceduralLayout,
} from './levels';
import { DEFAULT_CONFIG } from './types';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('proceduralCell', () => {
  it('fills every cell on the first level', () => {
    const layout = proceduralLayout(1, 7, 12);
    expect(countAlive(layout)).toBe(84);
  });

  it('colours by (row + col + level) mod 10', () => {
    expect(proceduralCell(0, 0, 1, 12).colorIndex).toBe(1);
    expect(proceduralCell(3, 9, 5, 12).colorIndex).toBe(7);
  });

  it('leaves a checkerboard on level 2', () => {
    expect(proceduralCell(0, 0, 2, 12).alive).toBe(false);
    expect(proceduralCell(0, 1, 2, 12).alive).toBe(true);
    expect(countAlive(proceduralLayout(2, 7, 12))).toBe(42);
  });

  it('thins one cell in three on level 4', () => {
    // (r + c + 4) % 3 === 0 is empty
    expect(proceduralCell(0, 2, 4, 12).alive).toBe(false);
    expect(proceduralCell(0, 0, 4, 12).alive).toBe(true);
  });

  it('places specials on a fixed stride', () => {
    const layout = proceduralLayout(1, 7, 12);
    const specials: Array<[number, number]> = [];
    layout.forEach((row, r) =>
      row.forEach((cell, c) => {
        if (cell.special) specials.push([r, c]);
      })
    );
    expect(specials).toEqual([
      [1, 3],
      [2, 9],
      [4, 3],
      [5, 9],
    ]);
  });

  it('is reproducible', () => {
    expect(proceduralLayout(6, 7, 12)).toEqual(proceduralLayout(6, 7, 12));
  });
});

describe('parseLevelText', () => {
  it('reads bricks, specials and gaps', () => {
    const layout = parseLevelText('#A.\n##', 1, 2, 4);
    expect(layout[0].map((c) => c.alive)).toEqual([true, true, false, false]);
    expect(layout[0][0]).toEqual({ alive: true, colorIndex: 1, special: false });
    expect(layout[0][1]).toEqual({ alive: true, colorIndex: 2, special: true });
    expect(layout[1].map((c) => c.alive)).toEqual([true, true, false, false]);
  });

  it('treats unknown characters as empty', () => {
    const layout = parseLevelText('x?#', 1, 1, 3);
    expect(layout[0].map((c) => c.alive)).toEqual([false, false, true]);
  });

  it('leaves missing rows empty by default', () => {
    const layout = parseLevelText('##', 1, 3, 2);
    expect(countAlive(layout)).toBe(2);
  });

  it('fills missing cells procedurally when asked', () => {
    const layout = parseLevelText('.', 1, 2, 2, 'procedural');
    expect(layout[0][0].alive).toBe(false);
    expect(layout[0][1]).toEqual(proceduralCell(0, 1, 1, 2));
    expect(layout[1][0]).toEqual(proceduralCell(1, 0, 1, 2));
    expect(countAlive(layout)).toBe(3);
  });

  it('accepts CRLF line endings', () => {
    const layout = parseLevelText('##\r\n#.', 1, 2, 2);
    expect(layout[1].map((c) => c.alive)).toEqual([true, false]);
  });

  it('ignores rows and columns past the grid', () => {
    const layout = parseLevelText('####\n####\n####', 1, 2, 2);
    expect(layout).toHaveLength(2);
    expect(layout[0]).toHaveLength(2);
  });
});

describe('createLevelProvider', () => {
  it('uses file text where present and the generator elsewhere', () => {
    const provider = createLevelProvider({ rows: 2, cols: 2, texts: new Map([[2, '#']]) });
    expect(provider.layoutFor(1)).toEqual(proceduralLayout(1, 2, 2));
    expect(countAlive(provider.layoutFor(2))).toBe(1);
  });
});

describe('loadLevelTexts', () => {
  it('keeps only the files that loaded', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const requested: string[] = [];
    const fetchText = async (url: string): Promise<string | null> => {
      requested.push(url);
      if (url.endsWith(levelFileName(1))) return '##';
      if (url.endsWith(levelFileName(2))) return null;
      throw new Error('network down');
    };

    const texts = await loadLevelTexts(fetchText, 'levels/', 3);

    expect(requested).toEqual(['levels/level1.txt', 'levels/level2.txt', 'levels/level3.txt']);
    expect([...texts.entries()]).toEqual([[1, '##']]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('buildBricks', () => {
  it('lays the grid out from the field width', () => {
    const bricks = buildBricks(proceduralLayout(1, 7, 12), 1, DEFAULT_CONFIG);
    expect(bricks).toHaveLength(84);
    expect(bricks[0].rect).toEqual({ x: 2, y: 80, w: 76, h: 24 });
    // Row-major order
    expect(bricks[14]).toMatchObject({ row: 1, col: 2, rect: { x: 162, y: 112, w: 76, h: 24 } });
  });

  it('leaves cells outside a short layout empty', () => {
    const bricks = buildBricks([[{ alive: true, colorIndex: 0, special: false }]], 1, DEFAULT_CONFIG);
    expect(bricks.filter((b) => b.alive)).toHaveLength(1);
    expect(bricks[1].alive).toBe(false);
  });

  it('drops the special flag on empty cells', () => {
    const bricks = buildBricks([[{ alive: false, colorIndex: 0, special: true }]], 1, DEFAULT_CONFIG);
    expect(bricks[0].special).toBe(false);
  });
});
