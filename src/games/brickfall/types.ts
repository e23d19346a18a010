// Axis-aligned rectangle, top-left origin, y grows downward
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Paddle {
  rect: Rect;
  velocityX: number;
}

export interface Ball {
  rect: Rect;
  // Unit direction; speed is applied separately on each advance
  dirX: number;
  dirY: number;
  speed: number;
  held: boolean;
}

export interface Brick {
  rect: Rect;
  row: number;
  col: number;
  alive: boolean;
  colorIndex: number;
  special: boolean;
}

export enum CollectibleKind {
  Widen = 'widen',
}

export interface Collectible {
  rect: Rect;
  vx: number;
  vy: number;
  kind: CollectibleKind;
  alive: boolean;
}

export type SessionOutcome = 'won' | 'lost';

export interface GameState {
  score: number;
  lives: number;
  level: number;
  bricksRemaining: number;
  paused: boolean;
  running: boolean;
  showMenu: boolean;
  outcome: SessionOutcome | null;
}

// One cell of a level layout
export interface BrickCell {
  alive: boolean;
  colorIndex: number;
  special: boolean;
}

export type BrickLayout = BrickCell[][];

export interface LevelProvider {
  layoutFor(level: number): BrickLayout;
}

export interface ScoreRecorder {
  record(score: number): void;
}

export interface BrickfallConfig {
  fieldWidth: number;
  fieldHeight: number;
  paddleWidth: number;
  paddleHeight: number;
  paddleYOffset: number;
  paddleSpeed: number;
  ballSize: number;
  ballSpeedInitial: number;
  /** Multiplier applied on every paddle bounce */
  paddleSpeedGrowth: number;
  /** Multiplier applied on every brick hit */
  brickSpeedGrowth: number;
  bounceAngleDeg: number;
  serveAngleDeg: number;
  brickRows: number;
  brickCols: number;
  brickHeight: number;
  brickPadding: number;
  brickTop: number;
  maxLevels: number;
  startingLives: number;
  maxDt: number;
  pointsPerBrick: number;
  collectibleSize: number;
  collectibleFallSpeed: number;
  maxCollectibles: number;
  widenAmount: number;
  leaderboardSize: number;
}

export const DEFAULT_CONFIG: BrickfallConfig = {
  fieldWidth: 960,
  fieldHeight: 640,
  paddleWidth: 140,
  paddleHeight: 18,
  paddleYOffset: 64,
  paddleSpeed: 800,
  ballSize: 14,
  ballSpeedInitial: 420,
  paddleSpeedGrowth: 1.0,
  brickSpeedGrowth: 1.015,
  bounceAngleDeg: 75,
  serveAngleDeg: 60,
  brickRows: 7,
  brickCols: 12,
  brickHeight: 28,
  brickPadding: 4,
  brickTop: 80,
  maxLevels: 10,
  startingLives: 3,
  maxDt: 0.05,
  pointsPerBrick: 10,
  collectibleSize: 20,
  collectibleFallSpeed: 60,
  maxCollectibles: 8,
  widenAmount: 40,
  leaderboardSize: 5,
};

export function createConfig(overrides: Partial<BrickfallConfig> = {}): BrickfallConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

export type Wall = 'left' | 'right' | 'top';

// Discrete events handed to the presentation/audio side after each step
export type EngineEvent =
  | { type: 'wallBounce'; wall: Wall }
  | { type: 'paddleBounce'; impact: number }
  | {
      type: 'brickBreak';
      row: number;
      col: number;
      colorIndex: number;
      special: boolean;
      x: number;
      y: number;
    }
  | { type: 'collectiblePicked'; kind: CollectibleKind }
  | { type: 'lifeLost'; livesLeft: number }
  | { type: 'levelCleared'; level: number }
  | { type: 'sessionWon'; score: number }
  | { type: 'sessionLost'; score: number };

// Brick palette, indexed by colorIndex % length
export const BRICK_PALETTE: string[] = [
  '#ff7878',
  '#ffc850',
  '#6effaa',
  '#5aa0ff',
  '#d25ac8',
  '#78c8ff',
  '#ff963c',
  '#aa78ff',
  '#a0ffc8',
  '#ff64b4',
];

export const BALL_COLOR = '#fff0b4';
export const PADDLE_COLOR = '#1e5a8c';
export const PADDLE_HIGHLIGHT = '#dcf0ff';
export const COLLECTIBLE_COLOR = '#ffc850';
export const HEART_COLOR = '#ff5078';
