import { useState, useEffect } from 'react';

// The playfield is 3:2; narrow portrait screens get a hint to turn sideways
export function OrientationOverlay() {
  const [isNarrowPortrait, setIsNarrowPortrait] = useState(false);
  const [dismissed, setDismissed] = useState(false);

  useEffect(() => {
    const checkOrientation = () => {
      setIsNarrowPortrait(window.innerHeight > window.innerWidth && window.innerWidth < 640);
    };

    checkOrientation();
    window.addEventListener('resize', checkOrientation);
    window.addEventListener('orientationchange', checkOrientation);

    return () => {
      window.removeEventListener('resize', checkOrientation);
      window.removeEventListener('orientationchange', checkOrientation);
    };
  }, []);

  if (!isNarrowPortrait || dismissed) return null;

  return (
    <div className="fixed inset-0 z-50 bg-gray-900/95 flex flex-col items-center justify-center p-8">
      <div className="text-6xl mb-6 animate-bounce rotate-90">📱</div>
      <h2 className="text-xl font-bold text-white mb-2">Rotate Your Device</h2>
      <p className="text-gray-400 text-center">
        Brickfall is best played in landscape
      </p>
      <button
        onClick={() => setDismissed(true)}
        className="mt-6 px-6 py-2 bg-gray-700 hover:bg-gray-600 text-white rounded-xl"
      >
        Play anyway
      </button>
    </div>
  );
}
