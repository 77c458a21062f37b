// packages/node-runtime/src/program.ts
import { Command, InvalidArgumentError, Option } from 'commander';
import { createHalfshift } from './index.js';
import { summarizeMetadata } from '../../core/src/cipher/category.js';
import type { ShiftKey } from '../../core/src/cipher/keys.js';
import type { Halfshift } from '../../core/src/index.js';
import { isVerbosity } from '../../core/src/util/logger.js';
import { ConfigError } from '../../core/src/errors/index.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

/** Process seams, swapped out by the tests. */
export interface CliIO {
  stdout    : (s: string) => void;
  stderr    : (s: string) => void;
  readStdin : () => Promise<string>;
  setExitCode(code: number): void;
}

interface GlobalOpts {
  shift1?   : ShiftKey;
  shift2?   : ShiftKey;
  verbose   : number;
}

/**
 * Integer option parser. Values past the safe-integer range come back as
 * bigint so no digit is lost.
 */
export function parseShiftKey(v: string): ShiftKey {
  const s = v.trim();
  if (!/^[+-]?\d+$/.test(s)) {
    throw new InvalidArgumentError('Shift key must be an integer.');
  }
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : BigInt(s);
}

export interface ProgramOptions {
  /** Log sink for the engine; defaults to STDERR */
  logger?       : (msg: string) => void;
  /** Throw CommanderError instead of exiting (inherited by subcommands) */
  exitOverride? : boolean;
}

export function createProgram(io: CliIO, opt: ProgramOptions = {}): Command {
  const program = new Command();
  if (opt.exitOverride) program.exitOverride();

  program
    .name('halfshift')
    .version(PKG_VERSION)
    .description(
      'Split-alphabet substitution cipher with sidecar metadata\n' +
      'a-m: +shift1*shift2, n-z: -(shift1+shift2), A-M: -shift1, N-Z: +shift2^2',
    )
    .configureOutput({
      writeOut: s => io.stdout(s),
      writeErr: s => io.stderr(s),
    })

    .addOption(
      new Option('-a, --shift1 <int>', 'first shift key (required except by inspect)')
        .argParser(parseShiftKey)
    )

    .addOption(
      new Option('-b, --shift2 <int>', 'second shift key (required except by inspect)')
        .argParser(parseShiftKey)
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    );

  function engine(): Halfshift {
    const { shift1, shift2, verbose } = program.opts<GlobalOpts>();
    if (shift1 === undefined || shift2 === undefined) {
      throw new ConfigError('Both --shift1 and --shift2 are required.');
    }
    const level = Math.min(verbose, 4);
    return createHalfshift({
      shift1,
      shift2,
      verbose: isVerbosity(level) ? level : 4,
      ...(opt.logger ? { logger: opt.logger } : {}),
    });
  }

  // STDIN: drop exactly one trailing line break
  async function textArg(text: string | undefined): Promise<string> {
    if (text !== undefined) return text;
    return (await io.readStdin()).replace(/\r?\n$/, '');
  }

  program
    .command('encrypt-text [text]')
    .description('Encrypt plaintext; omit arg to read STDIN (one trailing newline dropped). Prints { text, metadata } as JSON')
    .option('--plain', 'print only the ciphertext (not decodable exactly)')
    .action(async (text: string | undefined, cmd: { plain?: boolean }) => {
      const crypt = engine();
      const plain = await textArg(text);
      if (cmd.plain) {
        io.stdout(crypt.encryptText(plain) + '\n');
        return;
      }
      io.stdout(JSON.stringify(crypt.encryptTextWithMeta(plain)) + '\n');
    });

  program
    .command('decrypt-text [text]')
    .description('Decrypt ciphertext; omit arg to read STDIN (one trailing newline dropped). Without --meta the heuristic decode is used')
    .option('-m, --meta <codes>', 'metadata string produced by encrypt-text')
    .action(async (text: string | undefined, cmd: { meta?: string }) => {
      const crypt  = engine();
      const cipher = await textArg(text);
      io.stdout(crypt.decryptText(cipher, cmd.meta) + '\n');
    });

  program
    .command('inspect <metadata>')
    .description('Show per-category counts of a metadata string')
    .action((metadata: string) => {
      io.stdout(JSON.stringify(summarizeMetadata(metadata), null, 2) + '\n');
    });

  program
    .command('verify [text]')
    .description('Encrypt then decrypt and check the text comes back unchanged; omit arg to read STDIN')
    .action(async (text: string | undefined) => {
      const report = engine().verify(await textArg(text));
      io.stdout(`Verification: ${report.ok ? 'SUCCESS' : 'FAILURE'}\n`);
      io.stdout(`Heuristic decode: ${report.heuristicOk ? 'matches' : 'differs'}\n`);
      if (!report.ok) io.setExitCode(1);
    });

  return program;
}
