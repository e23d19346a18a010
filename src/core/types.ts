export interface Settings {
  haptics: boolean;
  sound: boolean;
  soundVolume: number; // 0-100
  music: boolean;
  reduceMotion: boolean;
  playerName: string;
}

export interface GameAPI {
  setStatus(status: GameStatus): void;
  gameOver(result: GameResult): void;
  getSettings(): Settings;
  // Leaves the game, e.g. Escape on the title screen
  exit(): void;
  haptics: {
    tap(): void;
    success(): void;
  };
  sounds: {
    bounce(): void;
    brickBreak(colorIndex: number): void;
    collect(): void;
    lifeLost(): void;
    levelClear(): void;
    gameStart(): void;
    gameOver(): void;
    victory(): void;
    newHighScore(): void;
    startMusic(): void;
    stopMusic(): void;
    toggleMusic(): boolean;
  };
}

// HUD values published by the running game
export interface GameStatus {
  score: number;
  lives: number;
  level: number;
}

export interface GameResult {
  score: number;
  won: boolean;
  newBest: boolean;
}

export interface GameInstance {
  start(): void;
  pause(): void;
  resume(): void;
  reset(): void;
  destroy(): void;
}

export type GameFactory = (
  container: HTMLElement,
  api: GameAPI
) => GameInstance;
