import { describe, it, expect } from 'vitest';
import {
  MAX_PARTICLES,
  Particle,
  addParticles,
  createFloatingText,
  createShake,
  createStarfield,
  getShakeOffset,
  spawnBurst,
  updateFloatingTexts,
  updateParticles,
  updateShake,
  updateStarfield,
} from './effects';

const particle = (overrides: Partial<Particle> = {}): Particle => ({
  x: 0,
  y: 0,
  vx: 0,
  vy: 0,
  color: '#fff',
  size: 2,
  age: 0,
  maxAge: 1,
  ...overrides,
});

describe('particles', () => {
  it('spawns a burst from the random source', () => {
    const burst = spawnBurst(10, 20, '#f00', 4, () => 0.5);
    expect(burst).toHaveLength(4);
    expect(burst[0].x).toBe(10);
    expect(burst[0].vx).toBeCloseTo(-120);
    expect(burst[0].vy).toBeCloseTo(0);
    expect(burst[0].size).toBe(3);
    expect(burst[0].maxAge).toBe(0.75);
  });

  it('drops the oldest particles past the cap', () => {
    const pool = Array.from({ length: MAX_PARTICLES - 2 }, () => particle());
    const fresh = Array.from({ length: 5 }, (_, i) => particle({ x: i }));
    const merged = addParticles(pool, fresh);
    expect(merged).toHaveLength(MAX_PARTICLES);
    expect(merged[merged.length - 1].x).toBe(4);
  });

  it('moves, pulls down and ages out', () => {
    let particles = [particle({ vx: 10 })];
    particles = updateParticles(particles, 0.5);
    expect(particles[0]).toMatchObject({ x: 5, y: 0, vy: 100, age: 0.5 });
    particles = updateParticles(particles, 0.5);
    expect(particles).toEqual([]);
  });
});

describe('floating text', () => {
  it('expires after its duration', () => {
    let texts = [createFloatingText(0, 0, 'WIDE', '#fff')];
    texts = updateFloatingTexts(texts, 1);
    expect(texts).toHaveLength(1);
    texts = updateFloatingTexts(texts, 0.3);
    expect(texts).toEqual([]);
  });
});

describe('starfield', () => {
  it('places stars from the random source', () => {
    const stars = createStarfield(100, 100, 10, 3, () => 0.5);
    expect(stars).toHaveLength(10);
    expect(stars[0]).toEqual({ x: 50, y: 50, vx: 0, vy: 0, size: 3, layer: 1 });
  });

  it('wraps stars around the margin', () => {
    const stars = [{ x: -25, y: 130, vx: 0, vy: 0, size: 1, layer: 0 }];
    updateStarfield(stars, 100, 100, 0.1);
    expect(stars[0].x).toBe(120);
    expect(stars[0].y).toBe(-20);
  });
});

describe('screen shake', () => {
  it('runs out after its duration', () => {
    const shake = createShake(8, 0.3);
    expect(updateShake(shake, 0.1)).toBe(shake);
    expect(updateShake(shake, 0.25)).toBeNull();
    expect(updateShake(null, 0.1)).toBeNull();
  });

  it('offsets by up to the intensity', () => {
    expect(getShakeOffset(null)).toEqual({ x: 0, y: 0 });
    expect(getShakeOffset(createShake(8, 0.3), () => 1)).toEqual({ x: 8, y: 8 });
  });
});
