const PREFIX = 'brickfall.';

// Minimal JSON key/value surface; the leaderboard takes any implementation
export interface KeyValueStore {
  read(key: string): unknown;
  write(key: string, value: unknown): void;
  remove(key: string): void;
}

export const Storage = {
  // Parsed JSON, or undefined when missing, unreadable or corrupt
  read(key: string): unknown {
    try {
      const raw = localStorage.getItem(PREFIX + key);
      if (raw === null) return undefined;
      return JSON.parse(raw);
    } catch (e) {
      console.warn(`Discarding unreadable value for ${key}:`, e);
      return undefined;
    }
  },

  write(key: string, value: unknown): void {
    try {
      localStorage.setItem(PREFIX + key, JSON.stringify(value));
    } catch (e) {
      console.warn(`Could not save ${key}:`, e);
    }
  },

  remove(key: string): void {
    try {
      localStorage.removeItem(PREFIX + key);
    } catch (e) {
      console.warn(`Could not remove ${key}:`, e);
    }
  },

  clearAll(): void {
    try {
      const keysToRemove: string[] = [];
      for (let i = 0; i < localStorage.length; i++) {
        const key = localStorage.key(i);
        if (key?.startsWith(PREFIX)) {
          keysToRemove.push(key);
        }
      }
      keysToRemove.forEach((key) => localStorage.removeItem(key));
    } catch (e) {
      console.warn('Could not clear saved data:', e);
    }
  },
};
