/**
 * Application configuration
 * Reads from environment variables (process.env)
 *
 * Required when POSTBOARD_BACKEND is "firebase" (the default):
 * - FIREBASE_API_KEY, FIREBASE_AUTH_DOMAIN, FIREBASE_PROJECT_ID,
 *   FIREBASE_STORAGE_BUCKET, FIREBASE_MESSAGING_SENDER_ID, FIREBASE_APP_ID
 *
 * Optional:
 * - POSTBOARD_BACKEND: "firebase" or "memory"
 * - FIREBASE_AUTH_EMULATOR_HOST: e.g. "127.0.0.1:9099"
 * - FIRESTORE_EMULATOR_HOST: e.g. "127.0.0.1:8080"
 * - SESSION_TTL_MINUTES: sessions expire after this many minutes
 */

import { z } from 'zod';

export class ConfigError extends Error {
  readonly code = 'config_invalid' as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  POSTBOARD_BACKEND: z.enum(['firebase', 'memory']).default('firebase'),
  FIREBASE_API_KEY: optionalString,
  FIREBASE_AUTH_DOMAIN: optionalString,
  FIREBASE_PROJECT_ID: optionalString,
  FIREBASE_STORAGE_BUCKET: optionalString,
  FIREBASE_MESSAGING_SENDER_ID: optionalString,
  FIREBASE_APP_ID: optionalString,
  FIREBASE_AUTH_EMULATOR_HOST: optionalString,
  FIRESTORE_EMULATOR_HOST: optionalString,
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().optional(),
});

const REQUIRED_FIREBASE_KEYS = [
  'FIREBASE_API_KEY',
  'FIREBASE_AUTH_DOMAIN',
  'FIREBASE_PROJECT_ID',
  'FIREBASE_APP_ID',
] as const;

export type FirebaseClientConfig = {
  apiKey: string;
  authDomain: string;
  projectId: string;
  storageBucket?: string;
  messagingSenderId?: string;
  appId: string;
};

export type EmulatorConfig = {
  authHost?: string;
  firestoreHost?: string;
};

export type AppConfig =
  | {
      backend: 'memory';
      sessionTtlMs: number | null;
    }
  | {
      backend: 'firebase';
      firebase: FirebaseClientConfig;
      emulators: EmulatorConfig;
      sessionTtlMs: number | null;
    };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const sessionTtlMs =
    values.SESSION_TTL_MINUTES !== undefined ? values.SESSION_TTL_MINUTES * 60_000 : null;

  if (values.POSTBOARD_BACKEND === 'memory') {
    return { backend: 'memory', sessionTtlMs };
  }

  const missing = REQUIRED_FIREBASE_KEYS.filter((key) => !values[key]);
  if (missing.length > 0) {
    throw new ConfigError(missing.map((key) => `${key}: required`));
  }

  const {
    FIREBASE_API_KEY: apiKey = '',
    FIREBASE_AUTH_DOMAIN: authDomain = '',
    FIREBASE_PROJECT_ID: projectId = '',
    FIREBASE_APP_ID: appId = '',
  } = values;

  if (!values.FIREBASE_MESSAGING_SENDER_ID) {
    console.warn('[config] FIREBASE_MESSAGING_SENDER_ID is not set');
  }

  return {
    backend: 'firebase',
    firebase: {
      apiKey,
      authDomain,
      projectId,
      appId,
      ...(values.FIREBASE_STORAGE_BUCKET ? { storageBucket: values.FIREBASE_STORAGE_BUCKET } : {}),
      ...(values.FIREBASE_MESSAGING_SENDER_ID
        ? { messagingSenderId: values.FIREBASE_MESSAGING_SENDER_ID }
        : {}),
    },
    emulators: {
      ...(values.FIREBASE_AUTH_EMULATOR_HOST ? { authHost: values.FIREBASE_AUTH_EMULATOR_HOST } : {}),
      ...(values.FIRESTORE_EMULATOR_HOST ? { firestoreHost: values.FIRESTORE_EMULATOR_HOST } : {}),
    },
    sessionTtlMs,
  };
}
