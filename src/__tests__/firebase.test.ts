import { initializeApp } from 'firebase/app';
import { connectAuthEmulator, getAuth } from 'firebase/auth';
import { connectFirestoreEmulator, getFirestore } from 'firebase/firestore';
import type { FirebaseClientConfig } from '../config';
import { getFirebaseServices } from '../firebase';

jest.mock('firebase/app', () => ({
  getApps: jest.fn(() => []),
  getApp: jest.fn(),
  initializeApp: jest.fn(() => ({ name: '[DEFAULT]' })),
}));

jest.mock('firebase/auth', () => ({
  connectAuthEmulator: jest.fn(),
  getAuth: jest.fn(() => ({ currentUser: null })),
}));

jest.mock('firebase/firestore', () => ({
  connectFirestoreEmulator: jest.fn(),
  getFirestore: jest.fn(() => ({ type: 'firestore' })),
}));

const firebaseConfig: FirebaseClientConfig = {
  apiKey: 'test-api-key',
  authDomain: 'postboard-test.firebaseapp.com',
  projectId: 'postboard-test',
  appId: 'test-app-id',
};

describe('getFirebaseServices', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // Runs first: a rejected emulator host leaves nothing cached.
  it('rejects an emulator host without a port', () => {
    expect(() => getFirebaseServices(firebaseConfig, { firestoreHost: 'localhost' })).toThrow(
      '[firebase] Invalid emulator host "localhost", expected host:port',
    );
    expect(connectFirestoreEmulator).not.toHaveBeenCalled();
  });

  it('initializes once and connects configured emulators', () => {
    const emulators = { authHost: '127.0.0.1:9099', firestoreHost: '127.0.0.1:8080' };

    const first = getFirebaseServices(firebaseConfig, emulators);
    const second = getFirebaseServices(firebaseConfig, emulators);

    expect(second).toBe(first);
    expect(initializeApp).toHaveBeenCalledTimes(1);
    expect(initializeApp).toHaveBeenCalledWith(firebaseConfig);
    expect(getAuth).toHaveBeenCalledTimes(1);
    expect(getFirestore).toHaveBeenCalledTimes(1);
    expect(connectAuthEmulator).toHaveBeenCalledWith(first.auth, 'http://127.0.0.1:9099', {
      disableWarnings: true,
    });
    expect(connectFirestoreEmulator).toHaveBeenCalledWith(first.db, '127.0.0.1', 8080);
  });
});
