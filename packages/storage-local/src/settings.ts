import { DEFAULT_CLIENT_SETTINGS, type ApiScheme, type ClientSettings } from '@ariachat/shared-types';
import type { KeyValueStorage } from './storage';

const STORAGE_KEY = 'ariachat.client.settings.v1';

export interface SettingsInput {
  api?: Partial<ClientSettings['api']>;
  stream?: Partial<ClientSettings['stream']>;
  fallback?: Partial<ClientSettings['fallback']>;
  auth?: Partial<ClientSettings['auth']>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function isApiScheme(value: unknown): value is ApiScheme {
  return value === 'http' || value === 'https';
}

function normalizeHost(value: unknown, fallback: string): string {
  if (typeof value !== 'string' || !value.trim()) return fallback;
  return value.trim().replace(/\/+$/, '');
}

function normalizePort(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    return fallback;
  }
  return Math.max(1, Math.min(65_535, value));
}

function normalizeDuration(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.round(value);
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function section(input: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = input[key];
  return isRecord(value) ? value : {};
}

export function validateSettings(input: unknown): ClientSettings {
  const base = DEFAULT_CLIENT_SETTINGS;
  if (!isRecord(input)) {
    return base;
  }

  const api = section(input, 'api');
  const stream = section(input, 'stream');
  const fallback = section(input, 'fallback');
  const auth = section(input, 'auth');

  return {
    schemaVersion: 1,
    api: {
      scheme: isApiScheme(api.scheme) ? api.scheme : base.api.scheme,
      host: normalizeHost(api.host, base.api.host),
      port: normalizePort(api.port, base.api.port),
    },
    stream: {
      connectTimeoutMs: normalizeDuration(stream.connectTimeoutMs, base.stream.connectTimeoutMs),
      resourceTimeoutMs: normalizeDuration(stream.resourceTimeoutMs, base.stream.resourceTimeoutMs),
      credentialWaitMs: normalizeDuration(stream.credentialWaitMs, base.stream.credentialWaitMs),
      lenientFraming: normalizeBoolean(stream.lenientFraming, base.stream.lenientFraming),
    },
    fallback: {
      enabled: normalizeBoolean(fallback.enabled, base.fallback.enabled),
    },
    auth: {
      accessToken: typeof auth.accessToken === 'string' ? auth.accessToken : base.auth.accessToken,
    },
  };
}

export function mergeSettings(current: ClientSettings, patch: SettingsInput): ClientSettings {
  return validateSettings({
    api: { ...current.api, ...patch.api },
    stream: { ...current.stream, ...patch.stream },
    fallback: { ...current.fallback, ...patch.fallback },
    auth: { ...current.auth, ...patch.auth },
  });
}

export function loadSettings(storage: KeyValueStorage): ClientSettings {
  const raw = storage.getItem(STORAGE_KEY);
  if (!raw) {
    return DEFAULT_CLIENT_SETTINGS;
  }

  try {
    return validateSettings(JSON.parse(raw));
  } catch (error) {
    console.warn('[ariachat][settings] ignoring unreadable settings', {
      error: error instanceof Error ? error.message : String(error),
    });
    return DEFAULT_CLIENT_SETTINGS;
  }
}

export function saveSettings(patch: SettingsInput, storage: KeyValueStorage): ClientSettings {
  const merged = mergeSettings(loadSettings(storage), patch);
  storage.setItem(STORAGE_KEY, JSON.stringify(merged));
  return merged;
}

export function resetSettings(storage: KeyValueStorage): void {
  storage.removeItem(STORAGE_KEY);
}
