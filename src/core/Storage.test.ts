// @vitest-environment jsdom
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Storage } from './Storage';

describe('Storage', () => {
  beforeEach(() => {
    localStorage.clear();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stores JSON under the app prefix', () => {
    Storage.write('settings', { sound: false });
    expect(localStorage.getItem('brickfall.settings')).toBe('{"sound":false}');
    expect(Storage.read('settings')).toEqual({ sound: false });
  });

  it('reads missing keys as undefined', () => {
    expect(Storage.read('nothing')).toBeUndefined();
  });

  it('discards unparseable values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    localStorage.setItem('brickfall.broken', '{oops');
    expect(Storage.read('broken')).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('removes a single key', () => {
    Storage.write('count', 1);
    Storage.remove('count');
    expect(localStorage.getItem('brickfall.count')).toBeNull();
  });

  it('clears only its own keys', () => {
    localStorage.setItem('other-app', 'keep');
    Storage.write('a', 1);
    Storage.write('b', 2);
    Storage.clearAll();
    expect(localStorage.length).toBe(1);
    expect(localStorage.getItem('other-app')).toBe('keep');
  });
});
