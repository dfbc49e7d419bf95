#!/usr/bin/env node
/**
 * whisper command line entry
 *
 * Parses arguments, loads config and the private key, and hands over to the
 * requested mode. Every failure ends here as an exit code.
 */

import { AppConfig, ExitCode } from '../shared/types';
import { CliArgs, parseArgs, USAGE } from './cli/args';
import { loadConfig } from './config';
import { log, setLogEcho, setLogLevel } from './logging';
import { runChatSession } from './tui/session';
import { isAbortError } from './whisper/connection-state';
import { toErrorMessage, WhisperError } from './whisper/errors';
import { loadKeypair, withKeypair } from './whisper/key-loader';
import { receiveMessages } from './whisper/recv';
import { isSecureRelayUrl } from './whisper/relay-connection';
import { sendDirectMessage } from './whisper/send';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

async function runCommand(args: CliArgs, config: AppConfig, signal: AbortSignal, io: CliIo, env: NodeJS.ProcessEnv): Promise<ExitCode> {
  const relayUrl = args.relay ?? config.relay;
  if (!relayUrl) {
    throw new WhisperError('--relay is required (or set relay in config.yaml)', ExitCode.InvalidArgs);
  }
  if (args.command === 'send' && args.to === undefined) {
    throw new WhisperError('--to is required for send', ExitCode.InvalidArgs);
  }
  if (args.command !== 'tui' && !isSecureRelayUrl(relayUrl)) {
    io.stderr('Warning: insecure relay (not wss://)\n');
  }

  const timeoutMs = args.timeoutMs ?? config.timeoutMs;
  const keypair = await loadKeypair(args.key, env);

  switch (args.command) {
    case 'tui':
      return runChatSession(
        {
          relayUrl,
          recipient: args.to,
          keypair,
          timeoutMs,
          historyLimit: config.historyLimit,
          signal,
        },
        { reportError: (message) => io.stderr(`Error: ${message}\n`) }
      );
    case 'send': {
      const result = await withKeypair(keypair, (kp) =>
        sendDirectMessage(
          {
            relayUrl,
            recipient: args.to ?? '',
            keypair: kp,
            timeoutMs,
            subject: args.subject,
            replyTo: args.replyTo,
            signal,
          },
          { warn: (message) => io.stderr(`Warning: ${message}\n`) }
        )
      );
      io.stdout(`${result.eventId}\n`);
      return ExitCode.Ok;
    }
    case 'recv': {
      const count = await withKeypair(keypair, (kp) =>
        receiveMessages(
          {
            relayUrl,
            keypair: kp,
            timeoutMs,
            since: args.since,
            limit: args.limit,
            json: args.json,
            signal,
          },
          {
            writeLine: (line) => io.stdout(`${line}\n`),
            notice: (message) => io.stderr(`Relay notice: ${message}\n`),
          }
        )
      );
      log('info', `Received ${count} message(s)`);
      return ExitCode.Ok;
    }
    case 'help':
      io.stdout(USAGE);
      return ExitCode.Ok;
  }
}

/**
 * Runs one invocation and resolves with its exit code. Never rejects.
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = processIo,
  signal?: AbortSignal
): Promise<ExitCode> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr(`Error: ${toErrorMessage(error)}\n\n${USAGE}`);
    return ExitCode.InvalidArgs;
  }

  if (args.command === 'help') {
    io.stdout(USAGE);
    return ExitCode.Ok;
  }

  const config = loadConfig();
  setLogLevel(args.verbose ? 'debug' : config.logLevel);
  setLogEcho(args.verbose && args.command !== 'tui');

  const controller = new AbortController();
  const abort = () => controller.abort();
  signal?.addEventListener('abort', abort, { once: true });
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    return await runCommand(args, config, controller.signal, io, env);
  } catch (error) {
    if (isAbortError(error)) {
      return ExitCode.Ok;
    }
    const message = toErrorMessage(error);
    log('error', `${args.command} failed: ${message}`);
    io.stderr(`Error: ${message}\n`);
    return error instanceof WhisperError ? error.exitCode : ExitCode.InvalidArgs;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    signal?.removeEventListener('abort', abort);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${toErrorMessage(error)}\n`);
      process.exitCode = ExitCode.InvalidArgs;
    }
  );
}
