import { describe, it, expect, vi } from 'vitest';
import {
  MachineDeps,
  Phase,
  dispatchInput,
  inputForKey,
  menuPlayRect,
  phaseOf,
  primaryActionFor,
  steerDirection,
  steerKeyFor,
} from './machine';
import type { SteerKey } from './machine';
import { Session, createSession } from './physics';
import { proceduralLayout } from './levels';
import { createConfig } from './types';

function setup() {
  const session: Session = createSession(createConfig());
  const layoutFor = vi.fn((level: number) => proceduralLayout(level, 7, 12));
  const deps: MachineDeps = { levels: { layoutFor }, random: () => 0.5 };
  return { session, deps, layoutFor };
}

function started() {
  const ctx = setup();
  dispatchInput(ctx.session, { type: 'primary' }, ctx.deps);
  return ctx;
}

describe('phaseOf', () => {
  it('maps the state flags onto phases', () => {
    const { session } = setup();
    expect(phaseOf(session.state)).toBe(Phase.Menu);
    session.state.showMenu = false;
    expect(phaseOf(session.state)).toBe(Phase.Playing);
    session.state.paused = true;
    expect(phaseOf(session.state)).toBe(Phase.Paused);
    session.state.showMenu = true;
    session.state.running = false;
    expect(phaseOf(session.state)).toBe(Phase.SessionOver);
  });
});

describe('primaryActionFor', () => {
  it('depends on the phase and whether the ball is held', () => {
    expect(primaryActionFor(Phase.Menu, true)).toBe('start');
    expect(primaryActionFor(Phase.Menu, false)).toBe('start');
    expect(primaryActionFor(Phase.Playing, true)).toBe('serve');
    expect(primaryActionFor(Phase.Playing, false)).toBe('pause');
    expect(primaryActionFor(Phase.Paused, true)).toBe('resume');
    expect(primaryActionFor(Phase.Paused, false)).toBe('resume');
    expect(primaryActionFor(Phase.SessionOver, true)).toBe('restart');
    expect(primaryActionFor(Phase.SessionOver, false)).toBe('restart');
  });
});

describe('dispatchInput', () => {
  it('starts play from the menu', () => {
    const { session, deps, layoutFor } = setup();
    const signals = dispatchInput(session, { type: 'primary' }, deps);
    expect(signals).toEqual(['started', 'musicStart']);
    expect(phaseOf(session.state)).toBe(Phase.Playing);
    expect(layoutFor).toHaveBeenCalledWith(1);
    expect(session.state.bricksRemaining).toBe(84);
    expect(session.ball.held).toBe(true);
  });

  it('serves a held ball, then pauses and resumes', () => {
    const { session, deps } = started();
    expect(dispatchInput(session, { type: 'primary' }, deps)).toEqual(['served']);
    expect(session.ball.held).toBe(false);

    expect(dispatchInput(session, { type: 'primary' }, deps)).toEqual(['paused']);
    expect(phaseOf(session.state)).toBe(Phase.Paused);

    expect(dispatchInput(session, { type: 'primary' }, deps)).toEqual(['resumed']);
    expect(phaseOf(session.state)).toBe(Phase.Playing);
  });

  it('returns to the menu on escape while playing', () => {
    const { session, deps } = started();
    session.state.score = 40;
    expect(dispatchInput(session, { type: 'escape' }, deps)).toEqual(['returnedToMenu']);
    expect(phaseOf(session.state)).toBe(Phase.Menu);
    expect(session.state.score).toBe(40);
  });

  it('clears a pause when escaping to the menu', () => {
    const { session, deps } = started();
    session.state.paused = true;
    dispatchInput(session, { type: 'escape' }, deps);
    expect(session.state.paused).toBe(false);
    expect(phaseOf(session.state)).toBe(Phase.Menu);
  });

  it('asks to quit on escape from the menu', () => {
    const { session, deps } = setup();
    expect(dispatchInput(session, { type: 'escape' }, deps)).toEqual(['quit']);
    expect(phaseOf(session.state)).toBe(Phase.Menu);
  });

  it('passes quit and mute straight through', () => {
    const { session, deps } = started();
    expect(dispatchInput(session, { type: 'quit' }, deps)).toEqual(['quit']);
    expect(dispatchInput(session, { type: 'muteToggle' }, deps)).toEqual(['muteToggle']);
    expect(phaseOf(session.state)).toBe(Phase.Playing);
  });

  it('ignores restart during play', () => {
    const { session, deps } = started();
    session.state.score = 70;
    expect(dispatchInput(session, { type: 'restart' }, deps)).toEqual([]);
    expect(session.state.score).toBe(70);
  });

  it('restarts a finished session from scratch', () => {
    const { session, deps } = started();
    Object.assign(session.state, {
      score: 350,
      lives: 0,
      level: 4,
      running: false,
      showMenu: true,
      outcome: 'lost',
    });
    expect(phaseOf(session.state)).toBe(Phase.SessionOver);

    expect(dispatchInput(session, { type: 'restart' }, deps)).toEqual(['started', 'musicStart']);
    expect(session.state).toMatchObject({
      score: 0,
      lives: 3,
      level: 1,
      running: true,
      showMenu: false,
      paused: false,
      outcome: null,
    });
  });

  it('restarts on the primary input after a session ends', () => {
    const { session, deps } = started();
    session.state.running = false;
    session.state.showMenu = true;
    session.state.level = 3;
    dispatchInput(session, { type: 'primary' }, deps);
    expect(session.state.level).toBe(1);
    expect(phaseOf(session.state)).toBe(Phase.Playing);
  });

  it('moves the paddle and a held ball with the pointer', () => {
    const { session, deps } = started();
    expect(dispatchInput(session, { type: 'pointerMove', x: 200 }, deps)).toEqual([]);
    expect(session.paddle.rect.x).toBe(130);
    expect(session.ball.rect.x).toBe(193);
  });

  it('leaves a ball in flight alone on pointer moves', () => {
    const { session, deps } = started();
    dispatchInput(session, { type: 'primary' }, deps);
    const ballX = session.ball.rect.x;
    dispatchInput(session, { type: 'pointerMove', x: 200 }, deps);
    expect(session.paddle.rect.x).toBe(130);
    expect(session.ball.rect.x).toBe(ballX);
  });

  it('starts from a click on the play button only', () => {
    const { session, deps } = setup();
    const play = menuPlayRect(session.config);
    expect(play).toEqual({ x: 370, y: 260, w: 220, h: 72 });

    expect(dispatchInput(session, { type: 'pointerClick', x: 10, y: 10 }, deps)).toEqual([]);
    expect(phaseOf(session.state)).toBe(Phase.Menu);

    expect(dispatchInput(session, { type: 'pointerClick', x: 480, y: 300 }, deps)).toEqual([
      'started',
      'musicStart',
    ]);
    expect(phaseOf(session.state)).toBe(Phase.Playing);
  });

  it('ignores clicks during play', () => {
    const { session, deps } = started();
    expect(dispatchInput(session, { type: 'pointerClick', x: 480, y: 300 }, deps)).toEqual([]);
    expect(session.ball.held).toBe(true);
  });
});

describe('key bindings', () => {
  it('maps keys to inputs', () => {
    expect(inputForKey('Escape')).toEqual({ type: 'escape' });
    expect(inputForKey(' ')).toEqual({ type: 'primary' });
    expect(inputForKey('Enter')).toEqual({ type: 'primary' });
    expect(inputForKey('R')).toEqual({ type: 'restart' });
    expect(inputForKey('m')).toEqual({ type: 'muteToggle' });
    expect(inputForKey('x')).toBeNull();
  });

  it('maps steering keys', () => {
    expect(steerKeyFor('ArrowLeft')).toBe('left');
    expect(steerKeyFor('a')).toBe('left');
    expect(steerKeyFor('D')).toBe('right');
    expect(steerKeyFor('ArrowUp')).toBeNull();
  });

  it('cancels opposing steering keys', () => {
    expect(steerDirection(new Set<SteerKey>())).toBe(0);
    expect(steerDirection(new Set<SteerKey>(['left']))).toBe(-1);
    expect(steerDirection(new Set<SteerKey>(['right']))).toBe(1);
    expect(steerDirection(new Set<SteerKey>(['left', 'right']))).toBe(0);
  });
});
