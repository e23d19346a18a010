import {
  doc,
  getDoc,
  setDoc,
  serverTimestamp,
  collection,
  query,
  orderBy,
  limit,
  getDocs,
  DocumentData,
} from 'firebase/firestore';
import { getFirestoreDb, ensureAnonymousAuth, getFirebaseAuth } from './firebase';
import type { KeyValueStore } from './Storage';

export const GAME_ID = 'brickfall';

const BEST_KEY = `best.${GAME_ID}`;
const BOARD_KEY = `leaderboard.${GAME_ID}`;

export interface LocalScores {
  best: number;
  // Always exactly `size` entries, highest first, zero-padded
  board: number[];
}

export interface RecordResult {
  newBest: boolean;
  // 1-based position on the local board, null when it did not place
  rank: number | null;
}

function isScore(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function normalizeBoard(values: number[], size: number): number[] {
  const board = [...values].sort((a, b) => b - a).slice(0, size);
  while (board.length < size) board.push(0);
  return board;
}

/**
 * Best score and top-N list kept on this device. Missing or corrupt entries
 * read back as zeros.
 */
export class LocalLeaderboard {
  constructor(
    private readonly store: KeyValueStore,
    readonly size: number
  ) {}

  load(): LocalScores {
    const best = this.store.read(BEST_KEY);
    const board = this.store.read(BOARD_KEY);
    const entries = Array.isArray(board)
      ? board.map((v: unknown) => (isScore(v) ? Math.floor(v) : 0))
      : [];
    return {
      best: isScore(best) ? Math.floor(best) : 0,
      board: normalizeBoard(entries, this.size),
    };
  }

  save(scores: LocalScores): void {
    this.store.write(BEST_KEY, scores.best);
    this.store.write(BOARD_KEY, normalizeBoard(scores.board, this.size));
  }

  // Keeps the stored best when the new score does not beat it
  saveBest(score: number): boolean {
    if (!isScore(score)) return false;
    const current = this.load();
    if (score <= current.best) return false;
    this.store.write(BEST_KEY, Math.floor(score));
    return true;
  }

  record(score: number): RecordResult {
    if (!isScore(score) || score <= 0) {
      return { newBest: false, rank: null };
    }
    const value = Math.floor(score);
    const current = this.load();
    const newBest = value > current.best;
    const board = normalizeBoard([...current.board, value], this.size);
    this.save({ best: newBest ? value : current.best, board });

    const index = board.indexOf(value);
    return { newBest, rank: index >= 0 ? index + 1 : null };
  }

  clear(): void {
    this.store.remove(BEST_KEY);
    this.store.remove(BOARD_KEY);
  }
}

export interface LeaderboardEntry {
  uid: string;
  gameId: string;
  playerName: string;
  score: number;
  updatedAt?: unknown;
}

function toEntry(data: DocumentData | undefined): LeaderboardEntry | null {
  if (!data) return null;
  const { uid, gameId, playerName, score, updatedAt } = data;
  if (typeof uid !== 'string' || typeof score !== 'number') return null;
  return {
    uid,
    gameId: typeof gameId === 'string' ? gameId : GAME_ID,
    playerName: typeof playerName === 'string' ? playerName : 'Player',
    score,
    updatedAt,
  };
}

// Global board in Firestore; every call is a no-op without Firebase config
class LeaderboardServiceImpl {
  isAvailable(): boolean {
    return getFirestoreDb() !== null;
  }

  async submitBest(playerName: string, score: number): Promise<void> {
    const firestore = getFirestoreDb();
    const user = await ensureAnonymousAuth();
    if (!firestore || !user) return;

    const ref = doc(firestore, 'leaderboards', GAME_ID, 'bestByUser', user.uid);

    const existing = await getDoc(ref);
    const previous = toEntry(existing.data());
    if (previous && previous.score >= score) {
      return;
    }

    const payload: LeaderboardEntry = {
      uid: user.uid,
      gameId: GAME_ID,
      playerName,
      score,
      updatedAt: serverTimestamp(),
    };

    await setDoc(ref, payload, { merge: true });
  }

  async fetchTop(topN = 50): Promise<LeaderboardEntry[]> {
    const firestore = getFirestoreDb();
    await ensureAnonymousAuth();
    if (!firestore) return [];

    const col = collection(firestore, 'leaderboards', GAME_ID, 'bestByUser');
    const q = query(col, orderBy('score', 'desc'), limit(topN));
    const snap = await getDocs(q);
    return snap.docs
      .map((d) => toEntry(d.data()))
      .filter((e): e is LeaderboardEntry => e !== null);
  }

  async fetchTopWithRank(
    topN = 50
  ): Promise<{ entries: LeaderboardEntry[]; rankInTop: number | null }> {
    const auth = getFirebaseAuth();
    const user = auth?.currentUser || await ensureAnonymousAuth();
    const entries = await this.fetchTop(topN);
    if (!user) return { entries, rankInTop: null };
    const idx = entries.findIndex((e) => e.uid === user.uid);
    return { entries, rankInTop: idx >= 0 ? idx + 1 : null };
  }
}

export const LeaderboardService = new LeaderboardServiceImpl();
