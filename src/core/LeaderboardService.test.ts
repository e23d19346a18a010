import { describe, it, expect, beforeEach } from 'vitest';
import { LeaderboardService, LocalLeaderboard } from './LeaderboardService';
import type { KeyValueStore } from './Storage';

class MemoryStore implements KeyValueStore {
  readonly data = new Map<string, unknown>();

  read(key: string): unknown {
    return this.data.get(key);
  }

  write(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  remove(key: string): void {
    this.data.delete(key);
  }
}

describe('LocalLeaderboard', () => {
  let store: MemoryStore;
  let board: LocalLeaderboard;

  beforeEach(() => {
    store = new MemoryStore();
    board = new LocalLeaderboard(store, 5);
  });

  it('loads zeros from an empty store', () => {
    expect(board.load()).toEqual({ best: 0, board: [0, 0, 0, 0, 0] });
  });

  it('records a first score as the best', () => {
    expect(board.record(120)).toEqual({ newBest: true, rank: 1 });
    expect(board.load()).toEqual({ best: 120, board: [120, 0, 0, 0, 0] });
  });

  it('keeps the board sorted highest first', () => {
    board.record(50);
    board.record(200);
    board.record(80);
    expect(board.record(80)).toEqual({ newBest: false, rank: 2 });
    expect(board.load()).toEqual({ best: 200, board: [200, 80, 80, 50, 0] });
  });

  it('drops scores that miss a full board', () => {
    for (const score of [10, 20, 30, 40, 50]) board.record(score);
    expect(board.record(5)).toEqual({ newBest: false, rank: null });
    expect(board.load().board).toEqual([50, 40, 30, 20, 10]);
  });

  it('ignores empty and negative scores', () => {
    expect(board.record(0)).toEqual({ newBest: false, rank: null });
    expect(board.record(-5)).toEqual({ newBest: false, rank: null });
    expect(store.data.size).toBe(0);
  });

  it('reads corrupt entries back as zeros', () => {
    store.write('best.brickfall', 'abc');
    store.write('leaderboard.brickfall', [3, 'x', -1, 7.8, null]);
    expect(board.load()).toEqual({ best: 0, board: [7, 3, 0, 0, 0] });
  });

  it('treats a non-list board as empty', () => {
    store.write('leaderboard.brickfall', { top: 1 });
    expect(board.load().board).toEqual([0, 0, 0, 0, 0]);
  });

  it('saves a best only when it is beaten', () => {
    expect(board.saveBest(90)).toBe(true);
    expect(board.saveBest(40)).toBe(false);
    expect(board.load().best).toBe(90);
  });

  it('sizes the board from its constructor', () => {
    const small = new LocalLeaderboard(store, 3);
    small.record(7);
    expect(small.load().board).toEqual([7, 0, 0]);
  });

  it('clears both entries', () => {
    board.record(60);
    board.clear();
    expect(store.data.size).toBe(0);
  });
});

describe('LeaderboardService without Firebase config', () => {
  it('reports itself unavailable', () => {
    expect(LeaderboardService.isAvailable()).toBe(false);
  });

  it('returns an empty board', async () => {
    await expect(LeaderboardService.fetchTop()).resolves.toEqual([]);
    await expect(LeaderboardService.fetchTopWithRank(10)).resolves.toEqual({
      entries: [],
      rankInTop: null,
    });
  });

  it('skips submissions', async () => {
    await expect(LeaderboardService.submitBest('test-player', 100)).resolves.toBeUndefined();
  });
});
