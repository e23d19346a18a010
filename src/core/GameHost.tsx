import { useEffect, useRef, useState } from 'react';
import { useSettings } from './SettingsStore';
import { SoundEngine } from './SoundEngine';
import type { GameAPI, GameFactory, GameInstance, GameResult, GameStatus, Settings } from './types';

interface GameHostProps {
  loadGame: () => Promise<{ default: GameFactory }>;
  onStatusChange: (status: GameStatus) => void;
  onGameOver: (result: GameResult) => void;
  onExit: () => void;
  onMusicToggle: (on: boolean) => void;
  isPaused: boolean;
  // Each increment restarts the running game
  resetToken: number;
}

export function GameHost({
  loadGame,
  onStatusChange,
  onGameOver,
  onExit,
  onMusicToggle,
  isPaused,
  resetToken,
}: GameHostProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const instanceRef = useRef<GameInstance | null>(null);
  const { settings } = useSettings();
  const settingsRef = useRef<Settings>(settings);
  const [isLoading, setIsLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  // Keep settings ref and the audio engine in step with the store
  useEffect(() => {
    settingsRef.current = settings;
    SoundEngine.setEnabled(settings.sound);
    SoundEngine.setVolume(settings.soundVolume);
    SoundEngine.setMusicEnabled(settings.music);
  }, [settings]);

  useEffect(() => {
    const instance = instanceRef.current;
    if (!instance) return;

    if (isPaused) {
      instance.pause();
    } else {
      instance.resume();
    }
  }, [isPaused]);

  useEffect(() => {
    if (resetToken > 0) instanceRef.current?.reset();
  }, [resetToken]);

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;

    const api: GameAPI = {
      setStatus: (status: GameStatus) => {
        if (!destroyed) onStatusChange(status);
      },
      gameOver: (result: GameResult) => {
        if (!destroyed) onGameOver(result);
      },
      getSettings: () => settingsRef.current,
      exit: () => {
        if (!destroyed) onExit();
      },
      haptics: {
        tap: () => {
          if (settingsRef.current.haptics && navigator.vibrate) {
            navigator.vibrate(10);
          }
        },
        success: () => {
          if (settingsRef.current.haptics && navigator.vibrate) {
            navigator.vibrate([10, 50, 10]);
          }
        },
      },
      sounds: {
        bounce: () => SoundEngine.bounce(),
        brickBreak: (colorIndex: number) => SoundEngine.brickBreak(colorIndex),
        collect: () => SoundEngine.collect(),
        lifeLost: () => SoundEngine.lifeLost(),
        levelClear: () => SoundEngine.levelClear(),
        gameStart: () => SoundEngine.gameStart(),
        gameOver: () => SoundEngine.gameOver(),
        victory: () => SoundEngine.victory(),
        newHighScore: () => SoundEngine.newHighScore(),
        startMusic: () => SoundEngine.startMusic(),
        stopMusic: () => SoundEngine.stopMusic(),
        toggleMusic: () => {
          const on = !settingsRef.current.music;
          SoundEngine.setMusicEnabled(on);
          onMusicToggle(on);
          return on;
        },
      },
    };

    loadGame()
      .then((module) => {
        if (destroyed) return;
        const factory = module.default;
        const instance = factory(container, api);
        instanceRef.current = instance;
        setIsLoading(false);
        instance.start();
      })
      .catch((err: unknown) => {
        if (destroyed) return;
        console.error('Failed to load game:', err);
        setError('Failed to load game');
        setIsLoading(false);
      });

    return () => {
      destroyed = true;
      if (instanceRef.current) {
        instanceRef.current.destroy();
        instanceRef.current = null;
      }
    };
  }, [loadGame, onStatusChange, onGameOver, onExit, onMusicToggle]);

  return (
    <div className="flex-1 w-full h-full relative overflow-hidden">
      {/* Always render container so game can mount */}
      <div
        ref={containerRef}
        className="absolute inset-0"
        style={{ touchAction: 'none' }}
      />

      {isLoading && (
        <div className="absolute inset-0 flex items-center justify-center bg-gray-900">
          <div className="animate-pulse text-white">Loading...</div>
        </div>
      )}

      {error && (
        <div className="absolute inset-0 flex items-center justify-center bg-gray-900">
          <p className="text-white">{error}</p>
        </div>
      )}
    </div>
  );
}
