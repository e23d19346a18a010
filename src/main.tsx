import ReactDOM from 'react-dom/client';
import { HashRouter, Routes, Route, Navigate } from 'react-router-dom';
import { SettingsProvider } from './core/SettingsStore';
import { AppShell } from './app/AppShell';
import { GameRoute } from './app/routes/GameRoute';
import { LeaderboardRoute } from './app/routes/LeaderboardRoute';
import './index.css';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Missing #root element');
}

ReactDOM.createRoot(rootElement).render(
  <SettingsProvider>
    <HashRouter>
      <AppShell>
        <Routes>
          <Route path="/" element={<GameRoute />} />
          <Route path="/leaderboard" element={<LeaderboardRoute />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </AppShell>
    </HashRouter>
  </SettingsProvider>
);
