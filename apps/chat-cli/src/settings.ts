import type { ClientSettings } from '@ariachat/shared-types';
import {
  applyEnvironmentOverrides,
  loadSettings,
  mergeSettings,
  type Environment,
  type KeyValueStorage,
} from '@ariachat/storage-local';
import type { CliOptions } from './args';

/** Stored settings, then environment, then command-line flags. */
export function resolveClientSettings(options: CliOptions, storage: KeyValueStorage, env: Environment): ClientSettings {
  const base = applyEnvironmentOverrides(loadSettings(storage), env);
  return mergeSettings(base, {
    api: {
      ...(options.host !== undefined ? { host: options.host } : {}),
      ...(options.port !== undefined ? { port: options.port } : {}),
      ...(options.scheme !== undefined ? { scheme: options.scheme } : {}),
    },
    auth: options.token !== undefined ? { accessToken: options.token } : {},
    fallback: options.fallback ? {} : { enabled: false },
  });
}
