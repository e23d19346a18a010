// Cosmetic effects advanced with the frame delta; none of them feed back into gameplay

export type RandomSource = () => number;

export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  color: string;
  size: number;
  age: number;
  maxAge: number;
}

export interface FloatingText {
  x: number;
  y: number;
  text: string;
  color: string;
  fontSize: number;
  age: number;
  duration: number;
}

export interface Star {
  x: number;
  y: number;
  vx: number;
  vy: number;
  size: number;
  layer: number;
}

export const PARTICLE_GRAVITY = 200;
export const MAX_PARTICLES = 512;
const STAR_MARGIN = 20;

// Burst in random directions; ages out after 0.5-1.0s
export function spawnBurst(
  x: number,
  y: number,
  color: string,
  count: number,
  random: RandomSource = Math.random
): Particle[] {
  const particles: Particle[] = [];
  for (let i = 0; i < count; i++) {
    const angle = random() * Math.PI * 2;
    const speed = 60 + random() * 120;
    particles.push({
      x,
      y,
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed,
      color,
      size: 2 + random() * 2,
      age: 0,
      maxAge: 0.5 + random() * 0.5,
    });
  }
  return particles;
}

// Oldest particles are dropped first once the pool is full
export function addParticles(pool: Particle[], fresh: Particle[]): Particle[] {
  const merged = pool.concat(fresh);
  return merged.length > MAX_PARTICLES ? merged.slice(merged.length - MAX_PARTICLES) : merged;
}

export function updateParticles(particles: Particle[], dt: number): Particle[] {
  for (const p of particles) {
    p.x += p.vx * dt;
    p.y += p.vy * dt;
    p.vy += PARTICLE_GRAVITY * dt;
    p.age += dt;
  }
  return particles.filter((p) => p.age < p.maxAge);
}

export function createFloatingText(
  x: number,
  y: number,
  text: string,
  color: string,
  fontSize: number = 24
): FloatingText {
  return { x, y, text, color, fontSize, age: 0, duration: 1.2 };
}

export function updateFloatingTexts(texts: FloatingText[], dt: number): FloatingText[] {
  for (const ft of texts) ft.age += dt;
  return texts.filter((ft) => ft.age < ft.duration);
}

/**
 * Background stars spread over the field plus a margin, in `layers` depth
 * layers. Nearer layers are larger and drift faster.
 */
export function createStarfield(
  width: number,
  height: number,
  count: number,
  layers: number,
  random: RandomSource = Math.random
): Star[] {
  const stars: Star[] = [];
  for (let i = 0; i < count; i++) {
    const layer = Math.floor(random() * layers);
    const drift = (layer + 1) * 4;
    stars.push({
      x: random() * (width + 200) - 100,
      y: random() * (height + 200) - 100,
      vx: (random() - 0.5) * drift,
      vy: (random() - 0.5) * drift,
      size: 1 + Math.floor(random() * 3) + (layers - layer) * 0.5,
      layer,
    });
  }
  return stars;
}

// Stars leaving the field plus margin wrap to the opposite edge
export function updateStarfield(stars: Star[], width: number, height: number, dt: number): void {
  for (const s of stars) {
    s.x += s.vx * dt;
    s.y += s.vy * dt;
    if (s.x < -STAR_MARGIN) s.x = width + STAR_MARGIN;
    if (s.x > width + STAR_MARGIN) s.x = -STAR_MARGIN;
    if (s.y < -STAR_MARGIN) s.y = height + STAR_MARGIN;
    if (s.y > height + STAR_MARGIN) s.y = -STAR_MARGIN;
  }
}

export function drawParticles(
  ctx: CanvasRenderingContext2D,
  particles: Particle[],
  reduceMotion: boolean
): void {
  if (reduceMotion) return;

  for (const particle of particles) {
    const progress = Math.min(particle.age / particle.maxAge, 1);
    const alpha = 1 - progress;
    const size = particle.size * (1 - progress * 0.5);

    ctx.globalAlpha = alpha;
    ctx.fillStyle = particle.color;
    ctx.fillRect(particle.x - size / 2, particle.y - size / 2, size, size);

    // Glow
    ctx.globalAlpha = alpha * 0.3;
    ctx.fillRect(particle.x - size, particle.y - size, size * 2, size * 2);
  }

  ctx.globalAlpha = 1;
}

export function drawFloatingTexts(
  ctx: CanvasRenderingContext2D,
  floatingTexts: FloatingText[],
  reduceMotion: boolean
): void {
  for (const ft of floatingTexts) {
    const progress = Math.min(ft.age / ft.duration, 1);
    const easeOut = 1 - Math.pow(1 - progress, 3);
    const floatDistance = reduceMotion ? 25 : 50;
    const y = ft.y - easeOut * floatDistance;

    let alpha: number;
    if (progress < 0.15) {
      alpha = progress / 0.15;
    } else if (progress > 0.7) {
      alpha = (1 - progress) / 0.3;
    } else {
      alpha = 1;
    }

    ctx.globalAlpha = alpha;
    ctx.fillStyle = ft.color;
    ctx.font = `bold ${ft.fontSize}px monospace`;
    ctx.textAlign = 'center';
    ctx.textBaseline = 'middle';

    ctx.strokeStyle = 'rgba(0, 0, 0, 0.5)';
    ctx.lineWidth = 3;
    ctx.strokeText(ft.text, ft.x, y);
    ctx.fillText(ft.text, ft.x, y);
  }

  ctx.globalAlpha = 1;
}

export interface ScreenShake {
  age: number;
  duration: number;
  intensity: number;
}

export function createShake(intensity: number = 8, duration: number = 0.3): ScreenShake {
  return { age: 0, duration, intensity };
}

// Null once the shake has run its course
export function updateShake(shake: ScreenShake | null, dt: number): ScreenShake | null {
  if (!shake) return null;
  shake.age += dt;
  return shake.age >= shake.duration ? null : shake;
}

export function getShakeOffset(
  shake: ScreenShake | null,
  random: RandomSource = Math.random
): { x: number; y: number } {
  if (!shake) return { x: 0, y: 0 };
  const strength = shake.intensity * (1 - shake.age / shake.duration);
  return {
    x: (random() - 0.5) * strength * 2,
    y: (random() - 0.5) * strength * 2,
  };
}
