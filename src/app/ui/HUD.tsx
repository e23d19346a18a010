import { useNavigate } from 'react-router-dom';
import { Storage } from '../../core/Storage';
import { SoundEngine } from '../../core/SoundEngine';
import { useSettings } from '../../core/SettingsStore';
import { LocalLeaderboard } from '../../core/LeaderboardService';
import type { GameStatus } from '../../core/types';

interface HUDProps {
  status: GameStatus;
  onOptionsClick: () => void;
  onInfoClick: () => void;
}

const localScores = new LocalLeaderboard(Storage, 5);

export function HUD({ status, onOptionsClick, onInfoClick }: HUDProps) {
  const navigate = useNavigate();
  const { settings } = useSettings();
  const bestScore = localScores.load().best;

  const handleBoardClick = () => {
    if (settings.sound) SoundEngine.uiClick();
    navigate('/leaderboard');
  };

  const handleInfoClick = () => {
    if (settings.sound) SoundEngine.uiOpen();
    onInfoClick();
  };

  const handleOptionsClick = () => {
    if (settings.sound) SoundEngine.uiOpen();
    onOptionsClick();
  };

  return (
    <div className="flex items-center justify-between px-4 py-3 bg-gray-900/80 backdrop-blur-sm">
      <div className="flex items-center gap-1">
        <button
          onClick={handleBoardClick}
          className="p-2 -m-2 text-yellow-400/90 hover:text-yellow-300 active:scale-95 transition-all"
          aria-label="Leaderboard"
        >
          <span className="text-xl">🏆</span>
        </button>
        <button
          onClick={handleInfoClick}
          className="p-2 text-white/80 hover:text-white active:scale-95 transition-all"
          aria-label="Controls"
        >
          <svg className="w-5 h-5" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path
              strokeLinecap="round"
              strokeLinejoin="round"
              strokeWidth={2}
              d="M13 16h-1v-4h-1m1-4h.01M21 12a9 9 0 11-18 0 9 9 0 0118 0z"
            />
          </svg>
        </button>
      </div>

      <div className="flex flex-col items-center">
        <span className="text-sm font-semibold text-white/60 font-display">
          Level {status.level} · {'♥'.repeat(Math.max(0, status.lives))}
        </span>
        <div className="flex items-center gap-3">
          <span className="text-2xl font-extrabold tabular-nums font-display">{status.score.toLocaleString()}</span>
          {bestScore > 0 && (
            <span className="text-sm text-primary-400/90 font-display font-semibold">
              Best: {bestScore.toLocaleString()}
            </span>
          )}
        </div>
      </div>

      <button
        onClick={handleOptionsClick}
        className="p-2 -m-2 text-white/80 hover:text-white active:scale-95 transition-all"
        aria-label="Options"
      >
        <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
          <path
            strokeLinecap="round"
            strokeLinejoin="round"
            strokeWidth={2}
            d="M10.325 4.317c.426-1.756 2.924-1.756 3.35 0a1.724 1.724 0 002.573 1.066c1.543-.94 3.31.826 2.37 2.37a1.724 1.724 0 001.065 2.572c1.756.426 1.756 2.924 0 3.35a1.724 1.724 0 00-1.066 2.573c.94 1.543-.826 3.31-2.37 2.37a1.724 1.724 0 00-2.572 1.065c-.426 1.756-2.924 1.756-3.35 0a1.724 1.724 0 00-2.573-1.066c-1.543.94-3.31-.826-2.37-2.37a1.724 1.724 0 00-1.065-2.572c-1.756-.426-1.756-2.924 0-3.35a1.724 1.724 0 001.066-2.573c-.94-1.543.826-3.31 2.37-2.37.996.608 2.296.07 2.572-1.065z"
          />
          <path
            strokeLinecap="round"
            strokeLinejoin="round"
            strokeWidth={2}
            d="M15 12a3 3 0 11-6 0 3 3 0 016 0z"
          />
        </svg>
      </button>
    </div>
  );
}
