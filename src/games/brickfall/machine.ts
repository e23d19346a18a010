import type { BrickfallConfig, GameState, LevelProvider, Rect } from './types';
import { containsPoint } from './geometry';
import { Session, movePaddleTo, resetGame, resetLevel, serveBall, snapHeldBall } from './physics';

export enum Phase {
  Menu = 'menu',
  Playing = 'playing',
  Paused = 'paused',
  SessionOver = 'sessionOver',
}

export type InputEvent =
  | { type: 'quit' }
  | { type: 'escape' }
  | { type: 'primary' }
  | { type: 'restart' }
  | { type: 'muteToggle' }
  | { type: 'pointerMove'; x: number }
  | { type: 'pointerClick'; x: number; y: number };

// Side effects the host carries out after a transition
export type ControlSignal =
  | 'started'
  | 'served'
  | 'paused'
  | 'resumed'
  | 'returnedToMenu'
  | 'musicStart'
  | 'muteToggle'
  | 'quit';

export type PrimaryAction = 'start' | 'serve' | 'pause' | 'resume' | 'restart';

export interface MachineDeps {
  levels: LevelProvider;
  random: () => number;
}

const PLAY_BUTTON_WIDTH = 220;
const PLAY_BUTTON_HEIGHT = 72;
const PLAY_BUTTON_TOP = 260;

// One key serves, pauses, resumes or starts depending on where the session is
const PRIMARY_ACTIONS: Record<Phase, { held: PrimaryAction; free: PrimaryAction }> = {
  [Phase.Menu]: { held: 'start', free: 'start' },
  [Phase.Playing]: { held: 'serve', free: 'pause' },
  [Phase.Paused]: { held: 'resume', free: 'resume' },
  [Phase.SessionOver]: { held: 'restart', free: 'restart' },
};

export function phaseOf(state: GameState): Phase {
  if (state.showMenu) {
    return state.running ? Phase.Menu : Phase.SessionOver;
  }
  return state.paused ? Phase.Paused : Phase.Playing;
}

export function primaryActionFor(phase: Phase, ballHeld: boolean): PrimaryAction {
  const entry = PRIMARY_ACTIONS[phase];
  return ballHeld ? entry.held : entry.free;
}

// Hit region of the PLAY button on the menu overlay
export function menuPlayRect(config: BrickfallConfig): Rect {
  return {
    x: (config.fieldWidth - PLAY_BUTTON_WIDTH) / 2,
    y: PLAY_BUTTON_TOP,
    w: PLAY_BUTTON_WIDTH,
    h: PLAY_BUTTON_HEIGHT,
  };
}

function startPlay(session: Session, levels: LevelProvider): ControlSignal[] {
  session.state.showMenu = false;
  session.state.paused = false;
  session.state.outcome = null;
  resetLevel(session, levels);
  return ['started', 'musicStart'];
}

function runPrimary(session: Session, deps: MachineDeps): ControlSignal[] {
  const action = primaryActionFor(phaseOf(session.state), session.ball.held);
  switch (action) {
    case 'start':
      return startPlay(session, deps.levels);
    case 'restart':
      resetGame(session);
      return startPlay(session, deps.levels);
    case 'serve':
      return serveBall(session, deps.random) ? ['served'] : [];
    case 'pause':
      session.state.paused = true;
      return ['paused'];
    case 'resume':
      session.state.paused = false;
      return ['resumed'];
  }
}

function isMenuPhase(phase: Phase): boolean {
  return phase === Phase.Menu || phase === Phase.SessionOver;
}

/**
 * Apply one input to the session. Returns the signals the host should act on
 * (audio, quitting); an input that does not apply in the current phase
 * returns none.
 */
export function dispatchInput(
  session: Session,
  input: InputEvent,
  deps: MachineDeps
): ControlSignal[] {
  const phase = phaseOf(session.state);

  switch (input.type) {
    case 'quit':
      return ['quit'];
    case 'muteToggle':
      return ['muteToggle'];
    case 'escape':
      if (isMenuPhase(phase)) return ['quit'];
      session.state.showMenu = true;
      session.state.paused = false;
      return ['returnedToMenu'];
    case 'primary':
      return runPrimary(session, deps);
    case 'restart':
      if (!isMenuPhase(phase)) return [];
      resetGame(session);
      return startPlay(session, deps.levels);
    case 'pointerMove':
      movePaddleTo(session, input.x);
      if (session.ball.held) snapHeldBall(session);
      return [];
    case 'pointerClick':
      if (!isMenuPhase(phase)) return [];
      if (!containsPoint(menuPlayRect(session.config), input.x, input.y)) return [];
      return runPrimary(session, deps);
  }
}

// Keyboard bindings; arrow and A/D keys steer the paddle separately
export function inputForKey(key: string): InputEvent | null {
  switch (key) {
    case 'Escape':
      return { type: 'escape' };
    case ' ':
    case 'Enter':
      return { type: 'primary' };
    case 'r':
    case 'R':
      return { type: 'restart' };
    case 'm':
    case 'M':
      return { type: 'muteToggle' };
    default:
      return null;
  }
}

export type SteerKey = 'left' | 'right';

export function steerKeyFor(key: string): SteerKey | null {
  switch (key) {
    case 'ArrowLeft':
    case 'a':
    case 'A':
      return 'left';
    case 'ArrowRight':
    case 'd':
    case 'D':
      return 'right';
    default:
      return null;
  }
}

// Both held cancel out
export function steerDirection(held: ReadonlySet<SteerKey>): -1 | 0 | 1 {
  const left = held.has('left');
  const right = held.has('right');
  if (left === right) return 0;
  return left ? -1 : 1;
}
