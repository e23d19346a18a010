// Brickfall Renderer: draws a session in field coordinates

import type { Star } from '../../core/effects';
import {
  Ball,
  Brick,
  BrickfallConfig,
  Collectible,
  GameState,
  Paddle,
  Rect,
  BALL_COLOR,
  BRICK_PALETTE,
  COLLECTIBLE_COLOR,
  HEART_COLOR,
  PADDLE_COLOR,
  PADDLE_HIGHLIGHT,
} from './types';
import { centeredTextX, formatCount, numberPixelsRight, textPixels, textWidth } from './font';
import { menuPlayRect } from './machine';

const HUD_HEIGHT = 44;
const HUD_TEXT = '#ebebff';
const HUD_BOX = 'rgba(40, 48, 80, 0.86)';

export interface MenuView {
  title: string;
  highScore: number;
  leaderboard: number[];
  // Null on the title menu, set once a session has ended
  outcome: 'won' | 'lost' | null;
}

function fillRect(ctx: CanvasRenderingContext2D, r: Rect): void {
  ctx.fillRect(r.x, r.y, r.w, r.h);
}

function fillPixels(ctx: CanvasRenderingContext2D, pixels: Rect[], color: string): void {
  ctx.fillStyle = color;
  for (const p of pixels) fillRect(ctx, p);
}

export function drawPixelText(
  ctx: CanvasRenderingContext2D,
  text: string,
  x: number,
  y: number,
  scale: number,
  color: string
): void {
  fillPixels(ctx, textPixels(text, x, y, scale), color);
}

// Vertical gradient plus a slow drifting nebula band
export function drawBackground(
  ctx: CanvasRenderingContext2D,
  config: BrickfallConfig,
  timeSec: number
): void {
  const { fieldWidth: w, fieldHeight: h } = config;
  const gradient = ctx.createLinearGradient(0, 0, 0, h);
  gradient.addColorStop(0, 'rgb(8, 10, 28)');
  gradient.addColorStop(1, 'rgb(18, 30, 78)');
  ctx.fillStyle = gradient;
  ctx.fillRect(0, 0, w, h);

  const offset = Math.sin(timeSec * 0.12) * 60;
  for (let i = 0; i < 80; i++) {
    const y = h * 0.25 + Math.sin(i * 0.12 + offset * 0.01) * 16 + offset * 0.05 + i;
    const bandWidth = w * (0.5 + 0.12 * Math.sin(i * 0.3 + offset * 0.02));
    ctx.fillStyle = `rgba(120, 40, 200, ${(20 + (i % 4) * 6) / 255})`;
    ctx.fillRect(w / 2 - bandWidth / 2, y, bandWidth, 6);
  }
}

export function drawStars(ctx: CanvasRenderingContext2D, stars: Star[]): void {
  for (const s of stars) {
    const brightness = Math.min(255, Math.round(180 + 40 / (s.layer + 1)));
    ctx.fillStyle = `rgb(${brightness}, ${brightness}, ${brightness})`;
    const size = Math.max(1, s.size);
    ctx.fillRect(s.x, s.y, size, size);
  }
}

export function drawBricks(ctx: CanvasRenderingContext2D, bricks: Brick[]): void {
  for (const b of bricks) {
    if (!b.alive) continue;
    const { x, y, w, h } = b.rect;
    ctx.fillStyle = BRICK_PALETTE[b.colorIndex % BRICK_PALETTE.length];
    ctx.fillRect(x, y, w, h);

    // Shine and bottom shadow
    ctx.fillStyle = 'rgba(255, 255, 255, 0.43)';
    ctx.fillRect(x + 6, y + 4, w * 0.5, h * 0.35);
    ctx.fillStyle = 'rgba(0, 0, 0, 0.16)';
    ctx.fillRect(x + 4, y + h - 6, w - 6, 6);

    if (b.special) {
      ctx.strokeStyle = COLLECTIBLE_COLOR;
      ctx.lineWidth = 2;
      ctx.strokeRect(x + 1, y + 1, w - 2, h - 2);
    }
  }
}

export function drawCollectibles(ctx: CanvasRenderingContext2D, items: Collectible[]): void {
  for (const item of items) {
    ctx.fillStyle = COLLECTIBLE_COLOR;
    fillRect(ctx, item.rect);
    ctx.strokeStyle = 'rgba(255, 255, 255, 0.4)';
    ctx.lineWidth = 1;
    ctx.strokeRect(item.rect.x, item.rect.y, item.rect.w, item.rect.h);
  }
}

export function drawPaddle(ctx: CanvasRenderingContext2D, paddle: Paddle): void {
  const { x, y, w, h } = paddle.rect;
  ctx.fillStyle = PADDLE_COLOR;
  ctx.fillRect(x, y, w, h);
  ctx.fillStyle = PADDLE_HIGHLIGHT;
  ctx.fillRect(x + 4, y + 2, w - 8, h / 2 - 2);
}

export function drawBall(ctx: CanvasRenderingContext2D, ball: Ball): void {
  const rings = 6;
  const { x, y, w, h } = ball.rect;
  ctx.fillStyle = BALL_COLOR;
  for (let i = rings; i >= 1; i--) {
    const spread = rings - i;
    ctx.globalAlpha = (40 * (i / rings)) / 255;
    ctx.fillRect(x - spread * 2, y - spread * 2, w + spread * 4, h + spread * 4);
  }
  ctx.globalAlpha = 1;
  ctx.fillRect(x, y, w, h);
}

function drawHeart(ctx: CanvasRenderingContext2D, x: number, y: number): void {
  const w = 20;
  const h = 18;
  ctx.fillStyle = HEART_COLOR;
  ctx.fillRect(x, y, w / 2, h / 2);
  ctx.fillRect(x + w / 2, y, w / 2, h / 2);
  ctx.fillRect(x + w / 4, y + h / 4, w / 2, (h * 3) / 4);
}

// Top strip: SCORE and LEVEL boxes, one heart per life on the right
export function drawHud(ctx: CanvasRenderingContext2D, state: GameState, config: BrickfallConfig): void {
  ctx.fillStyle = 'rgba(6, 8, 20, 0.86)';
  ctx.fillRect(0, 0, config.fieldWidth, HUD_HEIGHT);

  const sy = 8;
  const sx = 18;
  ctx.fillStyle = HUD_BOX;
  ctx.fillRect(sx - 6, sy - 4, 160, 32);
  drawPixelText(ctx, 'SCORE', sx, sy + 2, 2, HUD_TEXT);
  fillPixels(ctx, numberPixelsRight(state.score, sx + 150, sy + 4, 4), HUD_TEXT);

  const mx = config.fieldWidth / 2 - 80;
  ctx.fillStyle = HUD_BOX;
  ctx.fillRect(mx - 6, sy - 4, 160, 32);
  drawPixelText(ctx, 'LEVEL', mx, sy + 2, 2, HUD_TEXT);
  fillPixels(ctx, numberPixelsRight(state.level, mx + 130, sy + 4, 4), HUD_TEXT);

  let rx = config.fieldWidth - 20;
  for (let i = 0; i < state.lives; i++) {
    drawHeart(ctx, rx - 20, sy + 6);
    rx -= 30;
  }
}

export function drawPausedBanner(ctx: CanvasRenderingContext2D, config: BrickfallConfig): void {
  ctx.fillStyle = 'rgba(0, 0, 0, 0.5)';
  ctx.fillRect(0, 0, config.fieldWidth, config.fieldHeight);
  const text = 'PAUSED';
  drawPixelText(ctx, text, centeredTextX(text, config.fieldWidth, 6), config.fieldHeight / 2 - 21, 6, HUD_TEXT);
}

// Title menu and session summary share one overlay
export function drawMenu(ctx: CanvasRenderingContext2D, view: MenuView, config: BrickfallConfig): void {
  const w = config.fieldWidth;
  ctx.fillStyle = 'rgba(0, 0, 0, 0.78)';
  ctx.fillRect(0, 0, w, config.fieldHeight);

  drawPixelText(ctx, view.title, centeredTextX(view.title, w, 10), 80, 10, '#ff8c46');

  const label = 'HIGH SCORE';
  const hsX = w / 2 - 60;
  drawPixelText(ctx, label, hsX, 18, 2, '#ff5050');
  drawPixelText(ctx, formatCount(view.highScore), hsX + textWidth(label, 2) + 8, 24, 3, '#ffffff');

  if (view.outcome) {
    const banner = view.outcome === 'won' ? 'YOU WIN' : 'GAME OVER';
    drawPixelText(ctx, banner, centeredTextX(banner, w, 4), 170, 4, view.outcome === 'won' ? '#6effaa' : '#ff5078');
  }

  const play = menuPlayRect(config);
  ctx.fillStyle = 'rgba(40, 20, 90, 0.86)';
  fillRect(ctx, play);
  drawPixelText(ctx, 'PLAY', play.x + 56, play.y + 12, 6, '#ffb4c8');
  drawPixelText(ctx, 'TAP TO START', w / 2 - 70, play.y + play.h + 18, 2, 'rgba(200, 200, 220, 0.8)');

  const lbX = w / 2 - 140;
  const lbY = play.y + play.h + 60;
  drawPixelText(ctx, 'LEADERBOARD', lbX, lbY, 2, '#c8b4f0');
  view.leaderboard.forEach((score, i) => {
    const rank = `${i + 1}`;
    const rowY = lbY + 26 + i * 22;
    drawPixelText(ctx, rank, lbX, rowY, 2, 'rgba(220, 220, 220, 0.9)');
    drawPixelText(ctx, formatCount(score), lbX + textWidth(rank, 2) + 18, rowY, 2, '#ffffff');
  });
}
