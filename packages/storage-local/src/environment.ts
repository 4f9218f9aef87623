import type { ClientSettings } from '@ariachat/shared-types';
import { mergeSettings, type SettingsInput } from './settings';

export type Environment = Record<string, string | undefined>;

function parsePort(raw: string | undefined): number | undefined {
  if (!raw || !/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  return Number(raw.trim());
}

/** Applies `ARIA_API_HOST`, `ARIA_API_PORT`, `ARIA_API_SCHEME` and `ARIA_ACCESS_TOKEN` on top of stored settings. */
export function applyEnvironmentOverrides(settings: ClientSettings, env: Environment = process.env): ClientSettings {
  const patch: SettingsInput = { api: {}, auth: {} };

  if (env.ARIA_API_HOST?.trim()) {
    patch.api = { ...patch.api, host: env.ARIA_API_HOST };
  }
  const port = parsePort(env.ARIA_API_PORT);
  if (port !== undefined) {
    patch.api = { ...patch.api, port };
  }
  const scheme = env.ARIA_API_SCHEME?.trim().toLowerCase();
  if (scheme === 'http' || scheme === 'https') {
    patch.api = { ...patch.api, scheme };
  }
  if (env.ARIA_ACCESS_TOKEN) {
    patch.auth = { accessToken: env.ARIA_ACCESS_TOKEN };
  }

  return mergeSettings(settings, patch);
}
