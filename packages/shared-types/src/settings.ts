export type ApiScheme = 'http' | 'https';

export interface ClientSettings {
  schemaVersion: 1;
  api: {
    scheme: ApiScheme;
    host: string;
    port: number;
  };
  stream: {
    connectTimeoutMs: number;
    resourceTimeoutMs: number;
    credentialWaitMs: number;
    lenientFraming: boolean;
  };
  fallback: {
    enabled: boolean;
  };
  auth: {
    accessToken: string;
  };
}

export const DEFAULT_CLIENT_SETTINGS: ClientSettings = {
  schemaVersion: 1,
  api: {
    scheme: 'http',
    host: 'localhost',
    port: 50052,
  },
  stream: {
    connectTimeoutMs: 60_000,
    resourceTimeoutMs: 3_600_000,
    credentialWaitMs: 250,
    lenientFraming: false,
  },
  fallback: {
    enabled: true,
  },
  auth: {
    accessToken: '',
  },
};
