import { initializeApp, FirebaseApp, FirebaseOptions } from 'firebase/app';
import { getAuth, signInAnonymously, signOut, onAuthStateChanged, User, Auth } from 'firebase/auth';
import { getFirestore, Firestore } from 'firebase/firestore';

const AUTH_TIMEOUT_MS = 8000;

export interface FirebaseEnv {
  VITE_FIREBASE_API_KEY?: string;
  VITE_FIREBASE_AUTH_DOMAIN?: string;
  VITE_FIREBASE_PROJECT_ID?: string;
  VITE_FIREBASE_APP_ID?: string;
  VITE_FIREBASE_STORAGE_BUCKET?: string;
  VITE_FIREBASE_MESSAGING_SENDER_ID?: string;
}

// Null unless both an API key and a project id are set
export function readFirebaseConfig(env: FirebaseEnv): FirebaseOptions | null {
  if (!env.VITE_FIREBASE_API_KEY || !env.VITE_FIREBASE_PROJECT_ID) return null;
  return {
    apiKey: env.VITE_FIREBASE_API_KEY,
    authDomain: env.VITE_FIREBASE_AUTH_DOMAIN,
    projectId: env.VITE_FIREBASE_PROJECT_ID,
    appId: env.VITE_FIREBASE_APP_ID,
    storageBucket: env.VITE_FIREBASE_STORAGE_BUCKET,
    messagingSenderId: env.VITE_FIREBASE_MESSAGING_SENDER_ID,
  };
}

const firebaseConfig = readFirebaseConfig(import.meta.env);

// Initialized on first use so the game runs without any config
let _app: FirebaseApp | null = null;
let _auth: Auth | null = null;
let _firestore: Firestore | null = null;

export function getFirebaseApp(): FirebaseApp | null {
  if (!firebaseConfig) return null;
  if (!_app) {
    _app = initializeApp(firebaseConfig);
  }
  return _app;
}

export function getFirebaseAuth(): Auth | null {
  const app = getFirebaseApp();
  if (!app) return null;
  if (!_auth) {
    _auth = getAuth(app);
  }
  return _auth;
}

export function getFirestoreDb(): Firestore | null {
  const app = getFirebaseApp();
  if (!app) return null;
  if (!_firestore) {
    _firestore = getFirestore(app);
  }
  return _firestore;
}

function waitForUser(auth: Auth): Promise<User> {
  return new Promise<User>((resolve, reject) => {
    const timeout = setTimeout(() => {
      unsub();
      reject(new Error('Auth timeout'));
    }, AUTH_TIMEOUT_MS);

    const finish = (result: { user: User } | { error: unknown }) => {
      clearTimeout(timeout);
      unsub();
      if ('user' in result) resolve(result.user);
      else reject(result.error);
    };

    const unsub = onAuthStateChanged(auth, (u) => {
      if (u) {
        finish({ user: u });
        return;
      }
      signInAnonymously(auth).then(
        (cred) => finish({ user: cred.user }),
        (error: unknown) => finish({ error })
      );
    });
  });
}

export async function ensureAnonymousAuth(): Promise<User | null> {
  const auth = getFirebaseAuth();
  if (!auth) return null;
  if (auth.currentUser) return auth.currentUser;

  try {
    return await waitForUser(auth);
  } catch (e) {
    console.warn('Firebase auth failed:', e);
    return null;
  }
}

export async function resetFirebaseIdentity(): Promise<User | null> {
  const auth = getFirebaseAuth();
  if (!auth) return null;
  await signOut(auth);
  return ensureAnonymousAuth();
}
