import { SoundEngine } from '../../core/SoundEngine';
import { useSettings } from '../../core/SettingsStore';

interface ControlsModalProps {
  isOpen: boolean;
  onClose: () => void;
}

const RULES = [
  'Break every brick to clear the level and move on',
  'Each brick is worth 10 points times the level number',
  'Outlined bricks drop a capsule - catch it to widen your paddle',
  'The ball speeds up a little with every brick it breaks',
  'Miss the ball and you lose a life - three and you are out',
];

const CONTROLS: Array<[string, string]> = [
  ['← → / A D', 'Move paddle'],
  ['Mouse / touch', 'Steer paddle'],
  ['Space / Enter', 'Start, serve, pause, resume'],
  ['R', 'Restart from the menu'],
  ['M', 'Toggle music'],
  ['Esc', 'Back to menu, or quit from the menu'],
];

export function ControlsModal({ isOpen, onClose }: ControlsModalProps) {
  const { settings } = useSettings();

  if (!isOpen) return null;

  const handleClose = () => {
    if (settings.sound) SoundEngine.uiClose();
    onClose();
  };

  return (
    <div className="fixed inset-0 z-40 flex items-center justify-center p-4">
      {/* Backdrop */}
      <div
        className="absolute inset-0 bg-black/60 backdrop-blur-sm"
        onClick={handleClose}
      />

      <div className="relative bg-gray-800 rounded-2xl p-6 max-w-sm w-full animate-pop-in max-h-[90vh] overflow-y-auto">
        <div className="flex items-center justify-between mb-4">
          <h2 className="text-xl font-bold font-display">Brickfall</h2>
          <button
            onClick={handleClose}
            className="p-2 -m-2 text-gray-400 hover:text-white"
            aria-label="Close"
          >
            <svg className="w-6 h-6" fill="none" stroke="currentColor" viewBox="0 0 24 24">
              <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M6 18L18 6M6 6l12 12" />
            </svg>
          </button>
        </div>

        <div className="space-y-3">
          <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide">How to Play</h3>
          <ul className="space-y-2">
            {RULES.map((rule, i) => (
              <li key={i} className="flex gap-3 text-sm text-gray-200">
                <span className="text-primary-400 font-bold">{i + 1}.</span>
                <span>{rule}</span>
              </li>
            ))}
          </ul>
        </div>

        <div className="space-y-3 mt-6">
          <h3 className="text-sm font-semibold text-gray-400 uppercase tracking-wide">Controls</h3>
          <dl className="grid grid-cols-[auto_1fr] gap-x-4 gap-y-2 text-sm">
            {CONTROLS.map(([keys, action]) => (
              <div key={keys} className="contents">
                <dt className="font-mono text-primary-400">{keys}</dt>
                <dd className="text-gray-200">{action}</dd>
              </div>
            ))}
          </dl>
        </div>

        <button
          onClick={handleClose}
          className="w-full mt-6 py-3 bg-primary-500 hover:bg-primary-400 text-white font-bold font-display rounded-xl transition-colors shadow-lg shadow-primary-500/25"
        >
          Got it!
        </button>
      </div>
    </div>
  );
}
