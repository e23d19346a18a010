import type { Rect } from './types';

export enum Side {
  Left = 'left',
  Right = 'right',
  Top = 'top',
  Bottom = 'bottom',
}

export interface Penetration {
  axis: Side;
  amount: number;
}

// Touching edges do not count as overlap
export function overlaps(a: Rect, b: Rect): boolean {
  return !(
    a.x + a.w <= b.x ||
    b.x + b.w <= a.x ||
    a.y + a.h <= b.y ||
    b.y + b.h <= a.y
  );
}

/**
 * Shallowest side through which `moving` intersects `fixed`.
 *
 * Ties resolve in the order left, right, top, bottom; replays depend on it.
 */
export function minimumPenetrationAxis(moving: Rect, fixed: Rect): Penetration {
  const candidates: Penetration[] = [
    { axis: Side.Left, amount: moving.x + moving.w - fixed.x },
    { axis: Side.Right, amount: fixed.x + fixed.w - moving.x },
    { axis: Side.Top, amount: moving.y + moving.h - fixed.y },
    { axis: Side.Bottom, amount: fixed.y + fixed.h - moving.y },
  ];

  let best = candidates[0];
  for (let i = 1; i < candidates.length; i++) {
    // Strict comparison keeps the earlier side on a tie
    if (candidates[i].amount < best.amount) {
      best = candidates[i];
    }
  }
  return best;
}

export function centerX(r: Rect): number {
  return r.x + r.w / 2;
}

export function centerY(r: Rect): number {
  return r.y + r.h / 2;
}

export function containsPoint(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x <= r.x + r.w && y >= r.y && y <= r.y + r.h;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degToRad(deg: number): number {
  return deg * (Math.PI / 180);
}
