import type { GameAPI, GameInstance } from '../../core/types';
import { Storage } from '../../core/Storage';
import { LocalLeaderboard, LocalScores, RecordResult } from '../../core/LeaderboardService';
import {
  Particle,
  FloatingText,
  ScreenShake,
  Star,
  addParticles,
  createFloatingText,
  createShake,
  createStarfield,
  drawFloatingTexts,
  drawParticles,
  getShakeOffset,
  spawnBurst,
  updateFloatingTexts,
  updateParticles,
  updateShake,
  updateStarfield,
} from '../../core/effects';
import { BRICK_PALETTE, BrickfallConfig, EngineEvent, LevelProvider, createConfig } from './types';
import { EngineDeps, Session, advanceFrame, createSession, setPaddleIntent } from './physics';
import {
  ControlSignal,
  InputEvent,
  Phase,
  SteerKey,
  dispatchInput,
  inputForKey,
  phaseOf,
  steerDirection,
  steerKeyFor,
} from './machine';
import { TextFetcher, createLevelProvider, fetchLevelText, loadLevelTexts } from './levels';
import {
  drawBackground,
  drawBall,
  drawBricks,
  drawCollectibles,
  drawHud,
  drawMenu,
  drawPaddle,
  drawPausedBanner,
  drawStars,
} from './renderer';

const TITLE = 'BRICKFALL';
const BURST_SIZE = 18;
const STAR_COUNT = 220;
const STAR_LAYERS = 3;

export interface BrickfallOptions {
  config?: Partial<BrickfallConfig>;
  random?: () => number;
  fetchText?: TextFetcher;
  levelBaseUrl?: string;
}

export class BrickfallGame implements GameInstance {
  private api: GameAPI;
  private container: HTMLElement;
  private canvas: HTMLCanvasElement;
  private ctx: CanvasRenderingContext2D;

  private config: BrickfallConfig;
  private session: Session;
  private levels: LevelProvider;
  private scores: LocalLeaderboard;
  private savedScores: LocalScores;
  private lastRecord: RecordResult | null = null;
  private random: () => number;
  private fetchText: TextFetcher;
  private levelBaseUrl: string;

  private steering = new Set<SteerKey>();
  private particles: Particle[] = [];
  private floatingTexts: FloatingText[] = [];
  private stars: Star[];
  private shake: ScreenShake | null = null;
  private publishedStatus = '';

  private scale: number = 1;
  private offsetX: number = 0;
  private offsetY: number = 0;
  private dpr: number = 1;

  private isPaused: boolean = false;
  private isDestroyed: boolean = false;
  private lastTime: number = 0;
  private elapsed: number = 0;
  private animationFrameId: number = 0;

  constructor(container: HTMLElement, api: GameAPI, options: BrickfallOptions = {}) {
    this.container = container;
    this.api = api;
    this.config = createConfig(options.config);
    this.random = options.random ?? Math.random;
    this.fetchText = options.fetchText ?? fetchLevelText;
    this.levelBaseUrl = options.levelBaseUrl ?? `${import.meta.env.BASE_URL}levels/`;

    this.session = createSession(this.config);
    this.levels = this.createLevels(new Map());
    this.scores = new LocalLeaderboard(Storage, this.config.leaderboardSize);
    this.savedScores = this.scores.load();
    this.stars = createStarfield(
      this.config.fieldWidth,
      this.config.fieldHeight,
      STAR_COUNT,
      STAR_LAYERS,
      this.random
    );

    this.canvas = document.createElement('canvas');
    this.canvas.style.width = '100%';
    this.canvas.style.height = '100%';
    this.canvas.style.display = 'block';
    this.canvas.style.touchAction = 'none';
    container.appendChild(this.canvas);

    const ctx = this.canvas.getContext('2d');
    if (!ctx) throw new Error('Failed to get 2D context');
    this.ctx = ctx;

    this.resize();
    window.addEventListener('resize', this.resize);
    this.setupEventListeners();
  }

  private createLevels(texts: ReadonlyMap<number, string>): LevelProvider {
    return createLevelProvider({
      rows: this.config.brickRows,
      cols: this.config.brickCols,
      texts,
    });
  }

  private get deps(): EngineDeps {
    return {
      levels: this.levels,
      random: this.random,
      scores: {
        record: (score: number) => {
          this.lastRecord = this.scores.record(score);
          this.savedScores = this.scores.load();
        },
      },
    };
  }

  // Level files arrive once; until then the generated layouts are used
  private loadLevels() {
    loadLevelTexts(this.fetchText, this.levelBaseUrl, this.config.maxLevels)
      .then((texts) => {
        if (this.isDestroyed) return;
        this.levels = this.createLevels(texts);
      })
      .catch((err: unknown) => {
        console.warn('Level files unavailable:', err);
      });
  }

  private resize = () => {
    const rect = this.container.getBoundingClientRect();
    this.dpr = window.devicePixelRatio || 1;

    this.canvas.width = rect.width * this.dpr;
    this.canvas.height = rect.height * this.dpr;

    // Letterbox the fixed field into the container
    const { fieldWidth, fieldHeight } = this.config;
    this.scale = Math.min(rect.width / fieldWidth, rect.height / fieldHeight) || 1;
    this.offsetX = (rect.width - fieldWidth * this.scale) / 2;
    this.offsetY = (rect.height - fieldHeight * this.scale) / 2;

    this.render();
  };

  private setupEventListeners() {
    window.addEventListener('keydown', this.handleKeyDown);
    window.addEventListener('keyup', this.handleKeyUp);
    this.canvas.addEventListener('pointermove', this.handlePointerMove);
    this.canvas.addEventListener('pointerdown', this.handlePointerDown);
  }

  private removeEventListeners() {
    window.removeEventListener('keydown', this.handleKeyDown);
    window.removeEventListener('keyup', this.handleKeyUp);
    this.canvas.removeEventListener('pointermove', this.handlePointerMove);
    this.canvas.removeEventListener('pointerdown', this.handlePointerDown);
  }

  private toField(clientX: number, clientY: number): { x: number; y: number } {
    const rect = this.canvas.getBoundingClientRect();
    return {
      x: (clientX - rect.left - this.offsetX) / this.scale,
      y: (clientY - rect.top - this.offsetY) / this.scale,
    };
  }

  private handleKeyDown = (e: KeyboardEvent) => {
    if (this.isPaused || this.isDestroyed) return;

    const steer = steerKeyFor(e.key);
    if (steer) {
      e.preventDefault();
      this.steering.add(steer);
      setPaddleIntent(this.session, steerDirection(this.steering));
      return;
    }

    const input = inputForKey(e.key);
    if (!input || e.repeat) return;
    e.preventDefault();
    this.dispatch(input);
  };

  private handleKeyUp = (e: KeyboardEvent) => {
    const steer = steerKeyFor(e.key);
    if (!steer) return;
    this.steering.delete(steer);
    setPaddleIntent(this.session, steerDirection(this.steering));
  };

  private handlePointerMove = (e: PointerEvent) => {
    if (this.isPaused) return;
    const pos = this.toField(e.clientX, e.clientY);
    this.dispatch({ type: 'pointerMove', x: pos.x });
  };

  private handlePointerDown = (e: PointerEvent) => {
    if (this.isPaused) return;
    e.preventDefault();
    const pos = this.toField(e.clientX, e.clientY);
    const phase = phaseOf(this.session.state);

    if (phase === Phase.Menu || phase === Phase.SessionOver) {
      this.dispatch({ type: 'pointerClick', x: pos.x, y: pos.y });
      return;
    }
    // Touch has no space bar: a tap follows the paddle and serves
    this.dispatch({ type: 'pointerMove', x: pos.x });
    if (phase === Phase.Playing && this.session.ball.held) {
      this.dispatch({ type: 'primary' });
    }
  };

  private dispatch(input: InputEvent) {
    const signals = dispatchInput(this.session, input, this.deps);
    signals.forEach((signal) => this.handleSignal(signal));
  }

  private handleSignal(signal: ControlSignal) {
    switch (signal) {
      case 'started':
        this.lastRecord = null;
        this.particles = [];
        this.floatingTexts = [];
        this.api.sounds.gameStart();
        break;
      case 'musicStart':
        this.api.sounds.startMusic();
        break;
      case 'muteToggle': {
        const phase = phaseOf(this.session.state);
        if (this.api.sounds.toggleMusic() && (phase === Phase.Playing || phase === Phase.Paused)) {
          this.api.sounds.startMusic();
        }
        break;
      }
      case 'served':
        this.api.haptics.tap();
        break;
      case 'quit':
        this.api.exit();
        break;
      case 'returnedToMenu':
        this.api.sounds.stopMusic();
        break;
      case 'paused':
      case 'resumed':
        break;
    }
    this.publishStatus();
  }

  private handleEvents(events: EngineEvent[]) {
    const reduceMotion = this.api.getSettings().reduceMotion;

    for (const event of events) {
      switch (event.type) {
        case 'wallBounce':
          this.api.sounds.bounce();
          break;
        case 'paddleBounce':
          this.api.sounds.bounce();
          this.api.haptics.tap();
          break;
        case 'brickBreak': {
          const color = BRICK_PALETTE[event.colorIndex % BRICK_PALETTE.length];
          this.api.sounds.brickBreak(event.colorIndex);
          if (!reduceMotion) {
            this.particles = addParticles(
              this.particles,
              spawnBurst(event.x, event.y, color, BURST_SIZE, this.random)
            );
          }
          break;
        }
        case 'collectiblePicked': {
          const { rect } = this.session.paddle;
          this.api.sounds.collect();
          this.api.haptics.success();
          this.floatingTexts.push(createFloatingText(rect.x + rect.w / 2, rect.y - 16, 'WIDE', '#ffc850'));
          break;
        }
        case 'lifeLost':
          this.api.sounds.lifeLost();
          if (!reduceMotion) this.shake = createShake();
          break;
        case 'levelCleared':
          this.api.sounds.levelClear();
          if (event.level < this.config.maxLevels) {
            this.floatingTexts.push(
              createFloatingText(
                this.config.fieldWidth / 2,
                this.config.fieldHeight / 2,
                `LEVEL ${event.level + 1}`,
                '#ffffff',
                36
              )
            );
          }
          break;
        case 'sessionWon':
        case 'sessionLost':
          this.finishSession(event.score, event.type === 'sessionWon');
          break;
      }
    }
  }

  private finishSession(score: number, won: boolean) {
    const newBest = this.lastRecord?.newBest ?? false;
    this.api.sounds.stopMusic();
    if (newBest) {
      this.api.sounds.newHighScore();
    } else if (won) {
      this.api.sounds.victory();
    } else {
      this.api.sounds.gameOver();
    }
    this.api.gameOver({ score, won, newBest });
  }

  private publishStatus() {
    const { score, lives, level } = this.session.state;
    const key = `${score}|${lives}|${level}`;
    if (key === this.publishedStatus) return;
    this.publishedStatus = key;
    this.api.setStatus({ score, lives, level });
  }

  private startGameLoop() {
    if (this.animationFrameId || this.isPaused || this.isDestroyed) return;
    this.lastTime = performance.now();
    this.animationFrameId = requestAnimationFrame(this.gameLoop);
  }

  private gameLoop = (time: number) => {
    if (this.isDestroyed || this.isPaused) {
      this.animationFrameId = 0;
      return;
    }

    const rawDt = Math.max(0, (time - this.lastTime) / 1000);
    this.lastTime = time;
    const dt = Math.min(rawDt, this.config.maxDt);
    this.elapsed += dt;

    const events = advanceFrame(this.session, rawDt, this.deps);
    this.handleEvents(events);
    this.publishStatus();

    this.particles = updateParticles(this.particles, dt);
    this.floatingTexts = updateFloatingTexts(this.floatingTexts, dt);
    this.shake = updateShake(this.shake, dt);
    if (!this.api.getSettings().reduceMotion) {
      updateStarfield(this.stars, this.config.fieldWidth, this.config.fieldHeight, dt);
    }

    this.render();
    this.animationFrameId = requestAnimationFrame(this.gameLoop);
  };

  private render() {
    const ctx = this.ctx;
    const { state } = this.session;
    const reduceMotion = this.api.getSettings().reduceMotion;

    ctx.setTransform(1, 0, 0, 1, 0, 0);
    ctx.fillStyle = '#05060f';
    ctx.fillRect(0, 0, this.canvas.width, this.canvas.height);

    const shake = getShakeOffset(this.shake, this.random);
    const s = this.dpr * this.scale;
    ctx.setTransform(s, 0, 0, s, this.dpr * (this.offsetX + shake.x), this.dpr * (this.offsetY + shake.y));

    drawBackground(ctx, this.config, reduceMotion ? 0 : this.elapsed);
    drawStars(ctx, this.stars);
    drawBricks(ctx, this.session.bricks);
    drawParticles(ctx, this.particles, reduceMotion);
    drawCollectibles(ctx, this.session.collectibles);
    drawPaddle(ctx, this.session.paddle);
    drawBall(ctx, this.session.ball);
    drawFloatingTexts(ctx, this.floatingTexts, reduceMotion);
    drawHud(ctx, state, this.config);

    const phase = phaseOf(state);
    if (phase === Phase.Menu || phase === Phase.SessionOver) {
      drawMenu(
        ctx,
        {
          title: TITLE,
          highScore: this.savedScores.best,
          leaderboard: this.savedScores.board,
          outcome: phase === Phase.SessionOver ? state.outcome : null,
        },
        this.config
      );
    } else if (phase === Phase.Paused) {
      drawPausedBanner(ctx, this.config);
    }
  }

  start() {
    this.loadLevels();
    this.publishStatus();
    this.startGameLoop();
  }

  pause() {
    this.isPaused = true;
    this.steering.clear();
    setPaddleIntent(this.session, 0);
    if (this.animationFrameId) {
      cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = 0;
    }
  }

  resume() {
    this.isPaused = false;
    this.startGameLoop();
    this.render();
  }

  // Full reset straight into a new session
  reset() {
    const phase = phaseOf(this.session.state);
    if (phase === Phase.Menu || phase === Phase.SessionOver) {
      this.dispatch({ type: 'restart' });
      return;
    }
    this.dispatch({ type: 'escape' });
    this.dispatch({ type: 'restart' });
  }

  destroy() {
    this.isDestroyed = true;
    if (this.animationFrameId) {
      cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = 0;
    }
    // Quitting mid-session still keeps a beaten best
    if (this.session.state.running) {
      this.scores.saveBest(this.session.state.score);
    }
    this.api.sounds.stopMusic();
    this.removeEventListeners();
    window.removeEventListener('resize', this.resize);
    this.canvas.remove();
  }
}
