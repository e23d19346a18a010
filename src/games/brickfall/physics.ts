import {
  Ball,
  Brick,
  BrickfallConfig,
  Collectible,
  CollectibleKind,
  EngineEvent,
  GameState,
  LevelProvider,
  Paddle,
  ScoreRecorder,
  SessionOutcome,
} from './types';
import { Side, centerX, centerY, clamp, degToRad, minimumPenetrationAxis, overlaps } from './geometry';
import { buildBricks } from './levels';

// Everything one play-through owns; the frame loop passes it into every engine call
export interface Session {
  config: BrickfallConfig;
  state: GameState;
  paddle: Paddle;
  ball: Ball;
  bricks: Brick[];
  collectibles: Collectible[];
}

export interface EngineDeps {
  levels: LevelProvider;
  scores: ScoreRecorder;
  // Uniform in [0, 1)
  random: () => number;
}

export function initialState(config: BrickfallConfig): GameState {
  return {
    score: 0,
    lives: config.startingLives,
    level: 1,
    bricksRemaining: 0,
    paused: false,
    running: true,
    showMenu: true,
    outcome: null,
  };
}

export function createSession(config: BrickfallConfig): Session {
  const paddle: Paddle = {
    rect: {
      x: (config.fieldWidth - config.paddleWidth) / 2,
      y: config.fieldHeight - config.paddleYOffset,
      w: config.paddleWidth,
      h: config.paddleHeight,
    },
    velocityX: 0,
  };
  const ball: Ball = {
    rect: { x: 0, y: 0, w: config.ballSize, h: config.ballSize },
    dirX: 0,
    dirY: -1,
    speed: config.ballSpeedInitial,
    held: true,
  };
  const session: Session = {
    config,
    state: initialState(config),
    paddle,
    ball,
    bricks: [],
    collectibles: [],
  };
  snapHeldBall(session);
  return session;
}

export function isPlaying(state: GameState): boolean {
  return state.running && !state.paused && !state.showMenu;
}

export function paddleMaxWidth(config: BrickfallConfig): number {
  return config.fieldWidth / 2;
}

export function clampPaddle(session: Session): void {
  const { rect } = session.paddle;
  rect.x = clamp(rect.x, 0, session.config.fieldWidth - rect.w);
}

export function centerPaddle(session: Session): void {
  session.paddle.rect.x = (session.config.fieldWidth - session.paddle.rect.w) / 2;
}

// Pointer control: center the paddle on x
export function movePaddleTo(session: Session, x: number): void {
  if (!Number.isFinite(x)) return;
  session.paddle.rect.x = x - session.paddle.rect.w / 2;
  clampPaddle(session);
}

// Keyboard control: -1 left, 1 right, 0 stop
export function setPaddleIntent(session: Session, direction: -1 | 0 | 1): void {
  session.paddle.velocityX = direction * session.config.paddleSpeed;
}

export function movePaddle(session: Session, dt: number): void {
  session.paddle.rect.x += session.paddle.velocityX * dt;
  clampPaddle(session);
}

export function snapHeldBall(session: Session): void {
  const { ball, paddle } = session;
  ball.rect.x = paddle.rect.x + (paddle.rect.w - ball.rect.w) / 2;
  ball.rect.y = paddle.rect.y - ball.rect.h - 2;
}

// Re-arm the ball on the paddle at initial speed, pointing straight up
export function holdBall(session: Session): void {
  const { ball } = session;
  ball.held = true;
  ball.speed = session.config.ballSpeedInitial;
  ball.dirX = 0;
  ball.dirY = -1;
  snapHeldBall(session);
}

/**
 * Release a held ball at a random angle within the serve range either side
 * of vertical. Returns false when the ball was already in flight.
 */
export function serveBall(session: Session, random: () => number): boolean {
  const { ball, config } = session;
  if (!ball.held) return false;
  const angle = (random() * 2 - 1) * degToRad(config.serveAngleDeg);
  ball.dirX = Math.sin(angle);
  ball.dirY = -Math.abs(Math.cos(angle));
  ball.held = false;
  return true;
}

// Populate bricks for the current level and put paddle and ball back in place
export function resetLevel(session: Session, levels: LevelProvider): void {
  const { state, config } = session;
  const layout = levels.layoutFor(state.level);
  session.bricks = buildBricks(layout, state.level, config);
  state.bricksRemaining = session.bricks.filter((b) => b.alive).length;
  session.collectibles = [];
  centerPaddle(session);
  holdBall(session);
}

// Back to a fresh session on the menu; bricks arrive on the next start
export function resetGame(session: Session): void {
  const { config } = session;
  session.state = initialState(config);
  session.paddle.rect.w = config.paddleWidth;
  session.paddle.velocityX = 0;
  session.bricks = [];
  session.collectibles = [];
  centerPaddle(session);
  holdBall(session);
}

export function clampDt(rawDt: number, maxDt: number): number {
  if (!Number.isFinite(rawDt) || rawDt < 0) {
    console.warn(`Ignoring invalid frame delta: ${rawDt}`);
    return 0;
  }
  return Math.min(rawDt, maxDt);
}

function sanitizeState(state: GameState, config: BrickfallConfig): void {
  if (state.lives < 0) {
    console.warn(`Lives went negative (${state.lives}), clamping to 0`);
    state.lives = 0;
  }
  if (state.level < 1 || state.level > config.maxLevels) {
    console.warn(`Level ${state.level} out of range, clamping`);
    state.level = clamp(state.level, 1, config.maxLevels);
  }
}

function finishSession(
  session: Session,
  outcome: SessionOutcome,
  scores: ScoreRecorder,
  events: EngineEvent[]
): void {
  const { state } = session;
  state.showMenu = true;
  state.running = false;
  state.paused = false;
  state.outcome = outcome;
  scores.record(state.score);
  events.push(
    outcome === 'won'
      ? { type: 'sessionWon', score: state.score }
      : { type: 'sessionLost', score: state.score }
  );
}

function integrateBall(session: Session, dt: number): void {
  const { ball } = session;
  if (ball.held) {
    snapHeldBall(session);
    return;
  }
  ball.rect.x += ball.dirX * ball.speed * dt;
  ball.rect.y += ball.dirY * ball.speed * dt;
}

function collideWalls(session: Session, events: EngineEvent[]): void {
  const { ball, config } = session;
  const { rect } = ball;
  if (rect.x <= 0) {
    rect.x = 0;
    ball.dirX = Math.abs(ball.dirX);
    events.push({ type: 'wallBounce', wall: 'left' });
  }
  if (rect.x + rect.w >= config.fieldWidth) {
    rect.x = config.fieldWidth - rect.w;
    ball.dirX = -Math.abs(ball.dirX);
    events.push({ type: 'wallBounce', wall: 'right' });
  }
  if (rect.y <= 0) {
    rect.y = 0;
    ball.dirY = Math.abs(ball.dirY);
    events.push({ type: 'wallBounce', wall: 'top' });
  }
}

function collidePaddle(session: Session, events: EngineEvent[]): void {
  const { ball, paddle, config } = session;
  if (ball.dirY <= 0 || !overlaps(ball.rect, paddle.rect)) return;

  const impact = clamp(
    (centerX(ball.rect) - centerX(paddle.rect)) / (paddle.rect.w / 2),
    -1,
    1
  );
  const angle = impact * degToRad(config.bounceAngleDeg);
  ball.dirX = Math.sin(angle);
  ball.dirY = -Math.cos(angle);
  ball.speed *= config.paddleSpeedGrowth;
  ball.rect.y = paddle.rect.y - ball.rect.h - 1;
  events.push({ type: 'paddleBounce', impact });
}

// Row-major scan; -1 when the ball touches no live brick
export function findFirstHitBrick(bricks: Brick[], ball: Ball): number {
  for (let i = 0; i < bricks.length; i++) {
    if (bricks[i].alive && overlaps(ball.rect, bricks[i].rect)) {
      return i;
    }
  }
  return -1;
}

function bounceOffBrick(ball: Ball, brick: Brick): void {
  const { axis, amount } = minimumPenetrationAxis(ball.rect, brick.rect);
  switch (axis) {
    case Side.Left:
      ball.rect.x -= amount;
      ball.dirX = -Math.abs(ball.dirX);
      break;
    case Side.Right:
      ball.rect.x += amount;
      ball.dirX = Math.abs(ball.dirX);
      break;
    case Side.Top:
      ball.rect.y -= amount;
      ball.dirY = -Math.abs(ball.dirY);
      break;
    case Side.Bottom:
      ball.rect.y += amount;
      ball.dirY = Math.abs(ball.dirY);
      break;
  }
}

// Drops nothing while the screen already holds the maximum
export function spawnCollectible(session: Session, brick: Brick): void {
  const { collectibleSize, collectibleFallSpeed, maxCollectibles } = session.config;
  if (session.collectibles.length >= maxCollectibles) return;
  session.collectibles.push({
    rect: {
      x: centerX(brick.rect) - collectibleSize / 2,
      y: centerY(brick.rect) - collectibleSize / 2,
      w: collectibleSize,
      h: collectibleSize,
    },
    vx: 0,
    vy: collectibleFallSpeed,
    kind: CollectibleKind.Widen,
    alive: true,
  });
}

function collideBricks(session: Session, events: EngineEvent[]): void {
  const { ball, bricks, state, config } = session;
  const index = findFirstHitBrick(bricks, ball);
  if (index < 0) return;

  const brick = bricks[index];
  const special = brick.special;
  bounceOffBrick(ball, brick);
  brick.alive = false;
  state.bricksRemaining--;

  if (special) {
    spawnCollectible(session, brick);
    brick.special = false;
  }

  state.score += config.pointsPerBrick * state.level;
  ball.speed *= config.brickSpeedGrowth;
  events.push({
    type: 'brickBreak',
    row: brick.row,
    col: brick.col,
    colorIndex: brick.colorIndex,
    special,
    x: centerX(ball.rect),
    y: centerY(ball.rect),
  });
}

function checkOutOfBounds(session: Session, deps: EngineDeps, events: EngineEvent[]): void {
  const { ball, state, config } = session;
  if (ball.held || ball.rect.y <= config.fieldHeight) return;

  state.lives = Math.max(0, state.lives - 1);
  events.push({ type: 'lifeLost', livesLeft: state.lives });

  if (state.lives === 0) {
    finishSession(session, 'lost', deps.scores, events);
    return;
  }
  centerPaddle(session);
  holdBall(session);
}

function checkLevelClear(session: Session, deps: EngineDeps, events: EngineEvent[]): void {
  const { state, config } = session;
  if (!state.running || state.bricksRemaining > 0) return;

  events.push({ type: 'levelCleared', level: state.level });
  if (state.level + 1 > config.maxLevels) {
    finishSession(session, 'won', deps.scores, events);
    return;
  }
  state.level++;
  resetLevel(session, deps.levels);
}

/**
 * One simulation step of ball, walls, paddle and bricks, then the life and
 * level bookkeeping. Does nothing unless the session is actively playing.
 */
export function stepEngine(session: Session, dt: number, deps: EngineDeps): EngineEvent[] {
  const events: EngineEvent[] = [];
  if (!isPlaying(session.state)) return events;
  sanitizeState(session.state, session.config);

  integrateBall(session, dt);
  if (!session.ball.held) {
    collideWalls(session, events);
    collidePaddle(session, events);
    collideBricks(session, events);
  }
  checkOutOfBounds(session, deps, events);
  checkLevelClear(session, deps, events);
  return events;
}

// Falling pickups; they never touch the ball
export function updateCollectibles(session: Session, dt: number, events: EngineEvent[]): void {
  const { paddle, config } = session;
  for (const item of session.collectibles) {
    if (!item.alive) continue;
    item.rect.x += item.vx * dt;
    item.rect.y += item.vy * dt;
    if (item.rect.y > config.fieldHeight) {
      item.alive = false;
      continue;
    }
    if (overlaps(item.rect, paddle.rect)) {
      if (item.kind === CollectibleKind.Widen) {
        paddle.rect.w = Math.min(paddle.rect.w + config.widenAmount, paddleMaxWidth(config));
        clampPaddle(session);
      }
      item.alive = false;
      events.push({ type: 'collectiblePicked', kind: item.kind });
    }
  }
  session.collectibles = session.collectibles.filter((c) => c.alive);
}

/**
 * Advance the whole session by one frame: paddle in every phase, then the
 * engine step and pickups while playing.
 */
export function advanceFrame(session: Session, rawDt: number, deps: EngineDeps): EngineEvent[] {
  const dt = clampDt(rawDt, session.config.maxDt);
  movePaddle(session, dt);
  if (session.ball.held) snapHeldBall(session);

  const events = stepEngine(session, dt, deps);
  if (isPlaying(session.state)) {
    updateCollectibles(session, dt, events);
  }
  return events;
}
