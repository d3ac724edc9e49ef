#!/usr/bin/env node
import { TerminalRenderer } from '../renderer/TerminalRenderer';
import type { Output } from '../renderer/TerminalRenderer';
import { parseCliArgs } from './cli/args';
import { runCommand } from './cli';
import type { CliContext } from './cli/context';
import { StartupError } from './services/ai/errors';
import { ReadlineLineReader } from './services/chat/LineReader';
import { CredentialVault } from './services/security/CredentialVault';
import { SessionStore } from './services/storage/SessionStore';
import { SettingsStore } from './services/storage/SettingsStore';
import { createLogger, setLogLevel } from './utils/logger';

const log = createLogger('main');

function defaultContext(): CliContext {
  return {
    env: process.env,
    stdout: process.stdout,
    settings: new SettingsStore(),
    credentials: new CredentialVault(),
    sessions: new SessionStore(),
    createReader: () => new ReadlineLineReader(process.stdin, process.stdout),
  };
}

/**
 * Runs one invocation and resolves with the process exit code.
 * Startup failures are printed as `Error: <message>` and give exit code 1;
 * any other error propagates.
 */
export async function main(argv: readonly string[], overrides: Partial<CliContext> = {}): Promise<number> {
  const ctx: CliContext = { ...defaultContext(), ...overrides };
  const stdout: Output = ctx.stdout;

  try {
    const args = parseCliArgs(argv);
    if (args.verbose) setLogLevel('debug');
    log.debug('command:', args.command.name);
    return await runCommand(args, ctx);
  } catch (error) {
    if (!(error instanceof StartupError)) throw error;
    new TerminalRenderer(stdout).renderError(error);
    return error.exitCode;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      // Exit explicitly: idle keep-alive sockets held by the SDKs would otherwise
      // keep the process around after the session ends.
      process.stdout.write('', () => process.exit(code));
    },
    (error: unknown) => {
      console.error(error);
      process.exit(1);
    },
  );
}
