import { parseArgs } from 'node:util';
import type { ApiScheme } from '@ariachat/shared-types';

export interface CliOptions {
  host?: string;
  port?: number;
  scheme?: ApiScheme;
  token?: string;
  fallback: boolean;
  prompt?: string;
  help: boolean;
}

export const HELP_TEXT = `
ariachat - stream turns from an Aria runtime

USAGE:
  ariachat [options]

OPTIONS:
  --host <host>        Runtime host (default: localhost, env ARIA_API_HOST)
  --port <port>        Runtime port (default: 50052, env ARIA_API_PORT)
  --scheme <scheme>    http or https (default: http, env ARIA_API_SCHEME)
  --token <token>      Bearer token (env ARIA_ACCESS_TOKEN)
  --no-fallback        Report an unreachable runtime instead of simulating a response
  --prompt <text>      Run a single turn and exit
  -h, --help           Show this help message

COMMANDS (interactive):
  /new       Start a new session
  /cancel    Cancel the running turn
  /quit      Exit
`;

export class CliUsageError extends Error {
  name = 'CliUsageError';
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
  const { values } = parsed;

  let port: number | undefined;
  if (values.port !== undefined) {
    port = Number(values.port);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      throw new CliUsageError(`Invalid --port: ${values.port}`);
    }
  }

  let scheme: ApiScheme | undefined;
  if (values.scheme !== undefined) {
    const normalized = values.scheme.toLowerCase();
    if (normalized !== 'http' && normalized !== 'https') {
      throw new CliUsageError(`Invalid --scheme: ${values.scheme} (expected http or https)`);
    }
    scheme = normalized;
  }

  return {
    host: values.host,
    port,
    scheme,
    token: values.token,
    fallback: !values['no-fallback'],
    prompt: values.prompt,
    help: values.help ?? false,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      scheme: { type: 'string' },
      token: { type: 'string' },
      'no-fallback': { type: 'boolean' },
      prompt: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });
}
