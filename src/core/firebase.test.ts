import { describe, it, expect } from 'vitest';
import { readFirebaseConfig } from './firebase';

describe('readFirebaseConfig', () => {
  it('is null without an API key and project id', () => {
    expect(readFirebaseConfig({})).toBeNull();
    expect(readFirebaseConfig({ VITE_FIREBASE_API_KEY: 'test-key' })).toBeNull();
    expect(readFirebaseConfig({ VITE_FIREBASE_PROJECT_ID: 'test-project' })).toBeNull();
  });

  it('maps the env onto Firebase options', () => {
    expect(
      readFirebaseConfig({
        VITE_FIREBASE_API_KEY: 'test-key',
        VITE_FIREBASE_PROJECT_ID: 'test-project',
        VITE_FIREBASE_APP_ID: 'test-app',
      })
    ).toEqual({
      apiKey: 'test-key',
      authDomain: undefined,
      projectId: 'test-project',
      appId: 'test-app',
      storageBucket: undefined,
      messagingSenderId: undefined,
    });
  });
});
