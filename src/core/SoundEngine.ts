/**
 * Programmatic Sound Engine using Web Audio API
 * All sounds are synthesized - no audio files needed
 */

type OscillatorType = 'sine' | 'square' | 'sawtooth' | 'triangle';

interface ToneConfig {
  frequency: number;
  duration: number;
  type?: OscillatorType;
  gain?: number;
  attack?: number;
  decay?: number;
  // Glide target reached at the end of the tone
  endFrequency?: number;
}

interface NoiseConfig {
  duration: number;
  gain?: number;
  attack?: number;
  decay?: number;
  filter?: {
    type: BiquadFilterType;
    frequency: number;
    Q?: number;
  };
}

interface AudioGraph {
  ctx: AudioContext;
  master: GainNode;
}

interface MusicNodes {
  low: OscillatorNode;
  fifth: OscillatorNode;
  gain: GainNode;
}

// Pentatonic scale, one note per brick colour
const BREAK_NOTES = [523, 587, 659, 784, 880];
const MUSIC_LEVEL = 0.15;

class SoundEngineClass {
  private graph: AudioGraph | null = null;
  private enabled: boolean = true;
  private musicEnabled: boolean = true;
  private volume: number = 50; // 0-100
  private music: MusicNodes | null = null;

  private getGraph(): AudioGraph | null {
    if (!this.graph) {
      if (typeof AudioContext === 'undefined') return null;
      const ctx = new AudioContext();
      const master = ctx.createGain();
      master.connect(ctx.destination);
      this.graph = { ctx, master };
      this.updateMasterVolume();
    }
    // Browsers start the context suspended until a user gesture
    if (this.graph.ctx.state === 'suspended') {
      this.graph.ctx.resume().catch((e: unknown) => console.warn('Audio resume failed:', e));
    }
    return this.graph;
  }

  private updateMasterVolume() {
    if (this.graph) {
      this.graph.master.gain.value = (this.volume / 100) * 0.35;
    }
  }

  setEnabled(enabled: boolean) {
    this.enabled = enabled;
    if (!enabled) this.stopMusic();
  }

  setVolume(volume: number) {
    this.volume = Math.max(0, Math.min(100, volume));
    this.updateMasterVolume();
  }

  setMusicEnabled(enabled: boolean) {
    this.musicEnabled = enabled;
    if (!enabled) this.stopMusic();
  }

  private playTone(config: ToneConfig) {
    if (!this.enabled) return;
    const graph = this.getGraph();
    if (!graph) return;

    const { ctx, master } = graph;
    const {
      frequency,
      duration,
      type = 'sine',
      gain = 0.5,
      attack = 0.01,
      decay = 0.1,
      endFrequency,
    } = config;

    const osc = ctx.createOscillator();
    const gainNode = ctx.createGain();
    const now = ctx.currentTime;

    osc.type = type;
    osc.frequency.setValueAtTime(frequency, now);
    if (endFrequency !== undefined) {
      osc.frequency.exponentialRampToValueAtTime(endFrequency, now + duration);
    }

    gainNode.gain.setValueAtTime(0, now);
    gainNode.gain.linearRampToValueAtTime(gain, now + attack);
    gainNode.gain.linearRampToValueAtTime(gain * 0.7, now + attack + duration * 0.3);
    gainNode.gain.linearRampToValueAtTime(0, now + duration - decay);

    osc.connect(gainNode);
    gainNode.connect(master);

    osc.start(now);
    osc.stop(now + duration);
  }

  private playTones(configs: ToneConfig[], stagger: number = 0) {
    if (!this.enabled) return;

    configs.forEach((config, i) => {
      setTimeout(() => this.playTone(config), i * stagger * 1000);
    });
  }

  private playNoise(config: NoiseConfig) {
    if (!this.enabled) return;
    const graph = this.getGraph();
    if (!graph) return;

    const { ctx, master } = graph;
    const { duration, gain = 0.3, attack = 0.01, decay = 0.05, filter } = config;

    const bufferSize = Math.floor(ctx.sampleRate * duration);
    const buffer = ctx.createBuffer(1, bufferSize, ctx.sampleRate);
    const data = buffer.getChannelData(0);
    for (let i = 0; i < bufferSize; i++) {
      data[i] = Math.random() * 2 - 1;
    }

    const noise = ctx.createBufferSource();
    noise.buffer = buffer;

    const gainNode = ctx.createGain();
    const now = ctx.currentTime;
    gainNode.gain.setValueAtTime(0, now);
    gainNode.gain.linearRampToValueAtTime(gain, now + attack);
    gainNode.gain.linearRampToValueAtTime(0, now + duration - decay);

    if (filter) {
      const filterNode = ctx.createBiquadFilter();
      filterNode.type = filter.type;
      filterNode.frequency.value = filter.frequency;
      if (filter.Q) filterNode.Q.value = filter.Q;

      noise.connect(filterNode);
      filterNode.connect(gainNode);
    } else {
      noise.connect(gainNode);
    }

    gainNode.connect(master);
    noise.start(now);
    noise.stop(now + duration);
  }

  // ============================================
  // UI Sounds
  // ============================================

  /** Soft click for buttons and taps */
  uiClick() {
    this.playTone({
      frequency: 880,
      duration: 0.06,
      gain: 0.12,
      attack: 0.003,
      decay: 0.03,
    });
  }

  /** Toggle switch sound */
  uiToggle(on: boolean) {
    this.playTone({
      frequency: on ? 600 : 400,
      duration: 0.1,
      gain: 0.15,
      decay: 0.05,
    });
  }

  /** Modal/sheet open sound */
  uiOpen() {
    this.playTones([
      { frequency: 400, duration: 0.1, gain: 0.15 },
      { frequency: 600, duration: 0.15, gain: 0.12 },
    ], 0.05);
  }

  /** Modal/sheet close sound */
  uiClose() {
    this.playTones([
      { frequency: 500, duration: 0.1, gain: 0.12 },
      { frequency: 350, duration: 0.12, gain: 0.1 },
    ], 0.04);
  }

  /** Navigation/back sound */
  uiBack() {
    this.playTone({
      frequency: 350,
      duration: 0.12,
      type: 'triangle',
      gain: 0.15,
      decay: 0.05,
    });
  }

  // ============================================
  // Game Sounds
  // ============================================

  /** Ball off a wall or the paddle */
  bounce() {
    this.playTone({
      frequency: 420,
      endFrequency: 560,
      duration: 0.08,
      type: 'square',
      gain: 0.08,
      attack: 0.003,
      decay: 0.03,
    });
  }

  brickBreak(colorIndex: number) {
    const frequency = BREAK_NOTES[Math.abs(Math.floor(colorIndex)) % BREAK_NOTES.length];
    this.playTone({
      frequency,
      duration: 0.12,
      type: 'triangle',
      gain: 0.18,
      attack: 0.005,
      decay: 0.06,
    });
    this.playNoise({
      duration: 0.06,
      gain: 0.05,
      filter: { type: 'bandpass', frequency: 2400, Q: 2 },
    });
  }

  /** Paddle caught a falling pickup */
  collect() {
    this.playTones([
      { frequency: 660, duration: 0.08, gain: 0.12, attack: 0.005 },
      { frequency: 880, duration: 0.08, gain: 0.12, attack: 0.005 },
      { frequency: 1320, duration: 0.12, gain: 0.1, attack: 0.005 },
    ], 0.04);
  }

  lifeLost() {
    this.playTone({
      frequency: 330,
      endFrequency: 110,
      duration: 0.4,
      type: 'sawtooth',
      gain: 0.1,
      attack: 0.01,
      decay: 0.15,
    });
  }

  levelClear() {
    this.playTones([
      { frequency: 523, duration: 0.15, gain: 0.3 },
      { frequency: 659, duration: 0.15, gain: 0.28 },
      { frequency: 784, duration: 0.2, gain: 0.25 },
      { frequency: 1047, duration: 0.3, gain: 0.2 },
    ], 0.1);
  }

  // ============================================
  // Game State Sounds
  // ============================================

  gameStart() {
    this.playTones([
      { frequency: 392, duration: 0.1, gain: 0.12 },
      { frequency: 523, duration: 0.1, gain: 0.12 },
      { frequency: 659, duration: 0.12, gain: 0.1 },
    ], 0.07);
  }

  gameOver() {
    this.playTones([
      { frequency: 392, duration: 0.2, gain: 0.15, attack: 0.02 },
      { frequency: 330, duration: 0.25, gain: 0.12, attack: 0.02 },
      { frequency: 262, duration: 0.35, gain: 0.1, attack: 0.02 },
    ], 0.18);
  }

  victory() {
    this.playTones([
      { frequency: 523, duration: 0.12, gain: 0.15 },
      { frequency: 659, duration: 0.12, gain: 0.15 },
      { frequency: 784, duration: 0.12, gain: 0.15 },
      { frequency: 1047, duration: 0.35, gain: 0.18 },
      { frequency: 1319, duration: 0.45, gain: 0.12 },
    ], 0.12);
  }

  newHighScore() {
    this.playTones([
      { frequency: 523, duration: 0.12, gain: 0.15 },
      { frequency: 659, duration: 0.12, gain: 0.15 },
      { frequency: 784, duration: 0.12, gain: 0.15 },
      { frequency: 1047, duration: 0.2, gain: 0.18 },
    ], 0.1);

    setTimeout(() => {
      this.playTones([
        { frequency: 1200, duration: 0.08, gain: 0.08 },
        { frequency: 1400, duration: 0.08, gain: 0.06 },
        { frequency: 1600, duration: 0.1, gain: 0.05 },
      ], 0.05);
    }, 350);
  }

  // ============================================
  // Background Music (ambient drone)
  // ============================================

  startMusic() {
    if (this.music || !this.enabled || !this.musicEnabled) return;
    const graph = this.getGraph();
    if (!graph) return;

    const { ctx, master } = graph;
    const low = ctx.createOscillator();
    const fifth = ctx.createOscillator();
    const gain = ctx.createGain();
    const filter = ctx.createBiquadFilter();

    low.type = 'sine';
    low.frequency.setValueAtTime(55, ctx.currentTime); // A1
    fifth.type = 'triangle';
    fifth.frequency.setValueAtTime(82.41, ctx.currentTime); // E2
    filter.type = 'lowpass';
    filter.frequency.value = 400;

    low.connect(gain);
    fifth.connect(filter);
    filter.connect(gain);
    gain.connect(master);

    gain.gain.setValueAtTime(0, ctx.currentTime);
    gain.gain.linearRampToValueAtTime(MUSIC_LEVEL, ctx.currentTime + 2);

    low.start();
    fifth.start();
    this.music = { low, fifth, gain };
  }

  stopMusic() {
    const music = this.music;
    if (!music || !this.graph) return;
    this.music = null;

    music.gain.gain.setTargetAtTime(0, this.graph.ctx.currentTime, 0.5);
    setTimeout(() => {
      music.low.stop();
      music.fifth.stop();
    }, 600);
  }
}

// Singleton export
export const SoundEngine = new SoundEngineClass();
