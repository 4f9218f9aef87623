import readline from 'node:readline';
import { createFileStorage, redactSecrets, type Environment } from '@ariachat/storage-local';
import {
  apiBaseUrl,
  createRestSessionProvider,
  createStaticCredentialProvider,
  createTurnOrchestrator,
  errorMessage,
} from '@ariachat/stream-core';
import { CliUsageError, HELP_TEXT, parseCliArgs, type CliOptions } from './args';
import { createChatSession } from './chat-session';
import { resolveClientSettings } from './settings';

export { parseCliArgs, HELP_TEXT, CliUsageError, type CliOptions } from './args';
export { createChatSession, type ChatSession, type ChatSessionOptions } from './chat-session';
export { formatRunnerEvent, formatTurnEvent } from './format';
export { resolveClientSettings } from './settings';

export interface MainOptions {
  argv?: string[];
  env?: Environment;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Runs the chat client and resolves to a process exit code. */
export async function main(options: MainOptions = {}): Promise<number> {
  const output = options.output ?? process.stdout;
  const write = (line: string) => {
    output.write(`${line}\n`);
  };

  let cli: CliOptions;
  try {
    cli = parseCliArgs(options.argv ?? process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      write(`${error.message}\n${HELP_TEXT}`);
      return 2;
    }
    throw error;
  }
  if (cli.help) {
    write(HELP_TEXT);
    return 0;
  }

  const settings = resolveClientSettings(cli, createFileStorage(), options.env ?? process.env);
  console.info('[ariachat][cli] starting', redactSecrets({ api: settings.api, auth: settings.auth }));

  const credentials = createStaticCredentialProvider(settings.auth.accessToken);
  const sessions = createRestSessionProvider({
    baseUrl: apiBaseUrl(settings),
    credentials,
    credentialWaitMs: settings.stream.credentialWaitMs,
  });
  const orchestrator = createTurnOrchestrator({ settings, sessions, credentials });
  const chat = createChatSession({ orchestrator, sessions, write });

  if (cli.prompt !== undefined) {
    const result = await chat.runPrompt(cli.prompt);
    chat.dispose();
    return result && result.outcome !== 'failed' ? 0 : 1;
  }

  const rl = readline.createInterface({ input: options.input ?? process.stdin, output, prompt: 'you> ' });

  return new Promise<number>((resolve) => {
    rl.on('line', (line) => {
      chat
        .handleLine(line)
        .then((next) => {
          if (next === 'quit') {
            rl.close();
          } else {
            rl.prompt();
          }
        })
        .catch((error: unknown) => {
          write(`[error] ${errorMessage(error)}`);
          rl.prompt();
        });
    });
    rl.on('SIGINT', () => {
      if (orchestrator.getState().isProcessing) {
        orchestrator.cancelCurrentTurn().catch((error: unknown) => {
          console.error('[ariachat][cli] cancel failed', { error: errorMessage(error) });
        });
        return;
      }
      rl.close();
    });
    rl.on('close', () => {
      orchestrator
        .cancelCurrentTurn()
        .catch((error: unknown) => {
          console.error('[ariachat][cli] cancel failed', { error: errorMessage(error) });
        })
        .finally(() => {
          chat.dispose();
          resolve(0);
        });
    });
    rl.prompt();
  });
}
