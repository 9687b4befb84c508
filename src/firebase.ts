/**
 * Firebase initialization and configuration
 * Using the modular web SDK
 */

import { getApp, getApps, initializeApp, type FirebaseApp } from 'firebase/app';
import { connectAuthEmulator, getAuth, type Auth } from 'firebase/auth';
import { connectFirestoreEmulator, getFirestore, type Firestore } from 'firebase/firestore';
import type { EmulatorConfig, FirebaseClientConfig } from './config';

export type FirebaseServices = {
  app: FirebaseApp;
  auth: Auth;
  db: Firestore;
};

let cachedServices: FirebaseServices | null = null;

function parseHost(host: string): { hostname: string; port: number } {
  const [hostname, portText] = host.split(':');
  const port = Number(portText);
  if (!hostname || !Number.isInteger(port)) {
    throw new Error(`[firebase] Invalid emulator host "${host}", expected host:port`);
  }
  return { hostname, port };
}

export function getFirebaseServices(
  config: FirebaseClientConfig,
  emulators: EmulatorConfig = {},
): FirebaseServices {
  if (cachedServices) return cachedServices;

  const app = getApps().length === 0 ? initializeApp(config) : getApp();
  const auth = getAuth(app);
  const db = getFirestore(app);

  if (emulators.authHost) {
    connectAuthEmulator(auth, `http://${emulators.authHost}`, { disableWarnings: true });
    console.log('[firebase] Auth emulator:', emulators.authHost);
  }
  if (emulators.firestoreHost) {
    const { hostname, port } = parseHost(emulators.firestoreHost);
    connectFirestoreEmulator(db, hostname, port);
    console.log('[firebase] Firestore emulator:', emulators.firestoreHost);
  }

  console.log('[firebase] Initialized project', config.projectId);
  cachedServices = { app, auth, db };
  return cachedServices;
}
