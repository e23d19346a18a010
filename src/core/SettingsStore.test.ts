import { describe, it, expect } from 'vitest';
import { DEFAULT_PLAYER_NAME, getDefaultSettings, mergeSettings } from './SettingsStore';

describe('mergeSettings', () => {
  const defaults = getDefaultSettings();

  it('returns the defaults for missing or malformed data', () => {
    expect(mergeSettings(defaults, undefined)).toEqual(defaults);
    expect(mergeSettings(defaults, 'loud')).toEqual(defaults);
    expect(mergeSettings(defaults, null)).toEqual(defaults);
  });

  it('keeps well-typed saved fields only', () => {
    const merged = mergeSettings(defaults, {
      sound: false,
      music: 'yes',
      reduceMotion: true,
      extra: 1,
    });
    expect(merged).toEqual({ ...defaults, sound: false, reduceMotion: true });
  });

  it('clamps the volume', () => {
    expect(mergeSettings(defaults, { soundVolume: 150 }).soundVolume).toBe(100);
    expect(mergeSettings(defaults, { soundVolume: -3 }).soundVolume).toBe(0);
    expect(mergeSettings(defaults, { soundVolume: Number.NaN }).soundVolume).toBe(50);
  });

  it('trims and shortens the player name', () => {
    expect(mergeSettings(defaults, { playerName: '  Ace  ' }).playerName).toBe('Ace');
    expect(mergeSettings(defaults, { playerName: 'A'.repeat(20) }).playerName).toBe('A'.repeat(16));
    expect(mergeSettings(defaults, { playerName: '   ' }).playerName).toBe(DEFAULT_PLAYER_NAME);
  });
});
