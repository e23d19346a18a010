import { useState, useEffect } from 'react';
import { useNavigate } from 'react-router-dom';
import { LeaderboardService, LeaderboardEntry, LocalLeaderboard } from '../../core/LeaderboardService';
import { Storage } from '../../core/Storage';
import { getFirebaseAuth } from '../../core/firebase';
import { SoundEngine } from '../../core/SoundEngine';
import { useSettings } from '../../core/SettingsStore';

const localScores = new LocalLeaderboard(Storage, 5);

function rankBadge(rank: number) {
  if (rank === 1) return <span className="text-2xl">🥇</span>;
  if (rank === 2) return <span className="text-2xl">🥈</span>;
  if (rank === 3) return <span className="text-2xl">🥉</span>;
  return <span className="text-gray-400 font-medium">#{rank}</span>;
}

export function LeaderboardRoute() {
  const navigate = useNavigate();
  const { settings } = useSettings();
  const globalEnabled = LeaderboardService.isAvailable();
  const [local] = useState(() => localScores.load());

  const [entries, setEntries] = useState<LeaderboardEntry[]>([]);
  const [userRank, setUserRank] = useState<number | null>(null);
  const [isLoading, setIsLoading] = useState(globalEnabled);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!globalEnabled) return;
    let cancelled = false;

    async function fetchLeaderboard() {
      try {
        const result = await LeaderboardService.fetchTopWithRank(50);
        if (cancelled) return;
        setEntries(result.entries);
        setUserRank(result.rankInTop);
      } catch (err) {
        console.error('Failed to fetch leaderboard:', err);
        if (!cancelled) setError('Failed to load leaderboard');
      } finally {
        if (!cancelled) setIsLoading(false);
      }
    }

    void fetchLeaderboard();
    return () => {
      cancelled = true;
    };
  }, [globalEnabled]);

  const currentUid = getFirebaseAuth()?.currentUser?.uid;
  const localRows = local.board.filter((score) => score > 0);

  return (
    <div className="flex-1 flex flex-col overflow-hidden">
      {/* Header */}
      <header className="px-4 py-3 bg-gray-900/80 backdrop-blur-sm flex items-center gap-4">
        <button
          onClick={() => {
            if (settings.sound) SoundEngine.uiBack();
            navigate('/');
          }}
          className="p-2 -m-2 text-white/80 hover:text-white"
          aria-label="Back"
        >
          <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M15 19l-7-7 7-7" />
          </svg>
        </button>
        <div>
          <h1 className="text-lg font-bold">Brickfall Leaderboard</h1>
          {userRank && (
            <p className="text-sm text-yellow-400">Your rank: #{userRank}</p>
          )}
        </div>
      </header>

      {/* Content */}
      <div className="flex-1 overflow-y-auto">
        <section>
          <h2 className="px-4 pt-4 pb-2 text-sm font-semibold text-gray-400 uppercase tracking-wide">
            This Device
          </h2>
          {localRows.length === 0 ? (
            <p className="px-4 py-3 text-gray-400">No scores yet - be the first to play!</p>
          ) : (
            <div className="divide-y divide-gray-700/50">
              {localRows.map((score, index) => (
                <div key={index} className="flex items-center gap-4 px-4 py-3">
                  <div className="w-8 text-center">{rankBadge(index + 1)}</div>
                  <div className="flex-1" />
                  <span className="font-bold tabular-nums">{score.toLocaleString()}</span>
                </div>
              ))}
            </div>
          )}
        </section>

        {globalEnabled && (
          <section>
            <h2 className="px-4 pt-6 pb-2 text-sm font-semibold text-gray-400 uppercase tracking-wide">
              Global
            </h2>
            {isLoading ? (
              <div className="px-4 py-3 animate-pulse text-gray-400">Loading...</div>
            ) : error ? (
              <p className="px-4 py-3 text-red-400">{error}</p>
            ) : entries.length === 0 ? (
              <p className="px-4 py-3 text-gray-400">No global scores yet</p>
            ) : (
              <div className="divide-y divide-gray-700/50">
                {entries.map((entry, index) => {
                  const isCurrentUser = entry.uid === currentUid;

                  return (
                    <div
                      key={entry.uid}
                      className={`flex items-center gap-4 px-4 py-3 ${
                        isCurrentUser ? 'bg-yellow-500/10' : ''
                      }`}
                    >
                      <div className="w-8 text-center">{rankBadge(index + 1)}</div>

                      <div className="flex-1 min-w-0">
                        <p
                          className={`font-medium truncate ${
                            isCurrentUser ? 'text-yellow-400' : 'text-white'
                          }`}
                        >
                          {entry.playerName}
                          {isCurrentUser && <span className="ml-2 text-xs">(You)</span>}
                        </p>
                      </div>

                      <div className="text-right">
                        <span className="font-bold tabular-nums">{entry.score.toLocaleString()}</span>
                      </div>
                    </div>
                  );
                })}
              </div>
            )}
          </section>
        )}
      </div>
    </div>
  );
}
