import React, { createContext, useContext, useState, useCallback, useEffect, ReactNode } from 'react';
import { Storage } from './Storage';
import type { Settings } from './types';

const SETTINGS_KEY = 'settings';
export const DEFAULT_PLAYER_NAME = 'PLAYER';

export function getDefaultSettings(): Settings {
  return {
    haptics: true,
    sound: true,
    soundVolume: 50,
    music: true,
    reduceMotion: false,
    playerName: DEFAULT_PLAYER_NAME,
  };
}

// Keep only well-typed saved fields so new defaults show through after upgrades
export function mergeSettings(defaults: Settings, saved: unknown): Settings {
  if (typeof saved !== 'object' || saved === null) return defaults;
  const merged: Settings = { ...defaults };
  const record = new Map<string, unknown>(Object.entries(saved));

  for (const key of ['haptics', 'sound', 'music', 'reduceMotion'] as const) {
    const value = record.get(key);
    if (typeof value === 'boolean') merged[key] = value;
  }
  const volume = record.get('soundVolume');
  if (typeof volume === 'number' && Number.isFinite(volume)) {
    merged.soundVolume = Math.max(0, Math.min(100, volume));
  }
  const name = record.get('playerName');
  if (typeof name === 'string' && name.trim().length > 0) {
    merged.playerName = name.trim().slice(0, 16);
  }
  return merged;
}

interface SettingsContextValue {
  settings: Settings;
  updateSettings: (partial: Partial<Settings>) => void;
  resetSettings: () => void;
}

const SettingsContext = createContext<SettingsContextValue | null>(null);

export function SettingsProvider({ children }: { children: ReactNode }) {
  const [settings, setSettings] = useState<Settings>(() =>
    mergeSettings(getDefaultSettings(), Storage.read(SETTINGS_KEY))
  );

  useEffect(() => {
    Storage.write(SETTINGS_KEY, settings);
  }, [settings]);

  const updateSettings = useCallback((partial: Partial<Settings>) => {
    setSettings((prev) => ({ ...prev, ...partial }));
  }, []);

  const resetSettings = useCallback(() => {
    setSettings(getDefaultSettings());
  }, []);

  const value: SettingsContextValue = {
    settings,
    updateSettings,
    resetSettings,
  };

  return React.createElement(SettingsContext.Provider, { value }, children);
}

export function useSettings(): SettingsContextValue {
  const ctx = useContext(SettingsContext);
  if (!ctx) {
    throw new Error('useSettings must be used within SettingsProvider');
  }
  return ctx;
}
