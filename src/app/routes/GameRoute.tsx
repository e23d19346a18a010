import { useState, useCallback, useRef } from 'react';
import { useNavigate } from 'react-router-dom';
import { GameHost } from '../../core/GameHost';
import { LeaderboardService } from '../../core/LeaderboardService';
import { useSettings } from '../../core/SettingsStore';
import type { GameResult, GameStatus } from '../../core/types';
import { HUD } from '../ui/HUD';
import { OptionsModal } from '../ui/OptionsModal';
import { GameOverOverlay } from '../ui/GameOverOverlay';
import { ControlsModal } from '../ui/ControlsModal';

const loadBrickfall = () => import('../../games/brickfall');

const INITIAL_STATUS: GameStatus = { score: 0, lives: 3, level: 1 };

export function GameRoute() {
  const navigate = useNavigate();
  const { settings, updateSettings } = useSettings();

  const [status, setStatus] = useState<GameStatus>(INITIAL_STATUS);
  const [result, setResult] = useState<GameResult | null>(null);
  const [optionsOpen, setOptionsOpen] = useState(false);
  const [controlsOpen, setControlsOpen] = useState(false);
  const [resetToken, setResetToken] = useState(0);
  const playerNameRef = useRef(settings.playerName);
  playerNameRef.current = settings.playerName;

  const handleStatusChange = useCallback((next: GameStatus) => {
    setStatus(next);
  }, []);

  const handleGameOver = useCallback((next: GameResult) => {
    setResult(next);
    if (next.score <= 0 || !LeaderboardService.isAvailable()) return;

    LeaderboardService.submitBest(playerNameRef.current, next.score).catch((err: unknown) => {
      console.error('Failed to submit score:', err);
    });
  }, []);

  const handleExit = useCallback(() => {
    navigate('/leaderboard');
  }, [navigate]);

  const handleMusicToggle = useCallback(
    (on: boolean) => {
      updateSettings({ music: on });
    },
    [updateSettings]
  );

  const handlePlayAgain = useCallback(() => {
    setResult(null);
    setStatus(INITIAL_STATUS);
    setResetToken((t) => t + 1);
  }, []);

  return (
    <div className="flex-1 flex flex-col overflow-hidden">
      <HUD
        status={status}
        onOptionsClick={() => setOptionsOpen(true)}
        onInfoClick={() => setControlsOpen(true)}
      />

      <GameHost
        loadGame={loadBrickfall}
        onStatusChange={handleStatusChange}
        onGameOver={handleGameOver}
        onExit={handleExit}
        onMusicToggle={handleMusicToggle}
        isPaused={optionsOpen || controlsOpen || result !== null}
        resetToken={resetToken}
      />

      {result && (
        <GameOverOverlay
          result={result}
          onPlayAgain={handlePlayAgain}
          onDismiss={() => setResult(null)}
        />
      )}

      <OptionsModal isOpen={optionsOpen} onClose={() => setOptionsOpen(false)} />
      <ControlsModal isOpen={controlsOpen} onClose={() => setControlsOpen(false)} />
    </div>
  );
}
