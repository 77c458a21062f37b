import { CommanderError } from 'commander';
import { createProgram, parseShiftKey, type CliIO } from '../src/program.js';
import { ConfigError, LengthMismatchError } from '../../core/src/errors/index.js';

/* ------------------------------------------------------------------ */
/*  In-process harness                                                 */
/* ------------------------------------------------------------------ */
function harness(stdin = '') {
  const out: string[] = [];
  const err: string[] = [];
  const logs: string[] = [];
  let exitCode = 0;
  const io: CliIO = {
    stdout    : s => { out.push(s); },
    stderr    : s => { err.push(s); },
    readStdin : async () => stdin,
    setExitCode(code) { exitCode = code; },
  };
  const program = createProgram(io, { exitOverride: true, logger: m => logs.push(m) });
  return {
    run: (args: string[]) => program.parseAsync(args, { from: 'user' }),
    stdout: () => out.join(''),
    stderr: () => err.join(''),
    logs,
    exitCode: () => exitCode,
  };
}

describe('halfshift (CLI, in process)', () => {
  it('encrypt-text prints text and metadata as JSON', async () => {
    const h = harness();
    await h.run(['-a', '3', '-b', '2', 'encrypt-text', 'Hello, World!']);
    expect(h.stdout()).toBe('{"text":"Ekrrj, Ajmrj!","metadata":"ulllL00ULLll0"}\n');
  });

  it('encrypt-text --plain reads STDIN when no argument is given', async () => {
    const h = harness('Hello');
    await h.run(['-a', '3', '-b', '2', 'encrypt-text', '--plain']);
    expect(h.stdout()).toBe('Ekrrj\n');
  });

  it('accepts negative keys', async () => {
    const h = harness();
    await h.run(['--shift1=-23', '--shift2=28', 'encrypt-text', '--plain', 'Hello, World!']);
    expect(h.stdout()).toBe('Ekrrj, Ajmrj!\n');
  });

  it('decrypt-text uses metadata when given', async () => {
    const h = harness();
    await h.run(['-a', '3', '-b', '2', 'decrypt-text', 'Ekrrj, Ajmrj!', '-m', 'ulllL00ULLll0']);
    expect(h.stdout()).toBe('Hello, World!\n');
  });

  it('drops one trailing newline from STDIN', async () => {
    const h = harness('Ekrrj, Ajmrj!\n');
    await h.run(['-a', '3', '-b', '2', 'decrypt-text', '-m', 'ulllL00ULLll0']);
    expect(h.stdout()).toBe('Hello, World!\n');
  });

  it('drops only a single CRLF from STDIN', async () => {
    const h = harness('Hello\r\n\r\n');
    await h.run(['-a', '3', '-b', '2', 'encrypt-text']);
    expect(h.stdout()).toBe('{"text":"Ekrrj\\r\\n","metadata":"ulllL00"}\n');
  });

  it('decrypt-text falls back to the heuristic', async () => {
    const h = harness();
    await h.run(['-a', '3', '-b', '2', 'decrypt-text', 'Ekrrj, Ajmrj!']);
    expect(h.stdout()).toBe('Helld, Ddgld!\n');
  });

  it('decrypt-text rejects a metadata length mismatch', async () => {
    const h = harness();
    await expect(h.run(['-a', '3', '-b', '4', 'decrypt-text', 'ab', '-m', 'l']))
      .rejects.toThrow(LengthMismatchError);
    expect(h.stdout()).toBe('');
  });

  it('inspect summarises metadata without keys', async () => {
    const h = harness();
    await h.run(['inspect', 'ulllL00ULLll0']);
    expect(JSON.parse(h.stdout())).toEqual({
      lower_first : 5,
      lower_second: 3,
      upper_first : 1,
      upper_second: 1,
      passthrough : 3,
      total       : 13,
      unknown     : 0,
    });
  });

  it('verify reports success and heuristic disagreement', async () => {
    const h = harness();
    await h.run(['-a', '3', '-b', '2', 'verify', 'Hello, World!']);
    expect(h.stdout()).toBe('Verification: SUCCESS\nHeuristic decode: differs\n');
    expect(h.exitCode()).toBe(0);
  });

  it('passes -v through to the engine logger', async () => {
    const h = harness();
    await h.run(['-a', '3', '-b', '2', '-v', 'encrypt-text', 'x']);
    expect(h.logs).toEqual(['1| Start text encryption', '1| Encryption finished']);
  });

  it('requires both keys for the cipher commands', async () => {
    const h = harness();
    await expect(h.run(['-a', '3', 'encrypt-text', 'x']))
      .rejects.toThrow(new ConfigError('Both --shift1 and --shift2 are required.'));
    expect(h.stdout()).toBe('');
  });

  it('rejects a non-integer key', async () => {
    const h = harness();
    const err = await h.run(['-a', '1.5', '-b', '2', 'encrypt-text', 'x']).then(() => null, (e: unknown) => e);
    expect(err).toBeInstanceOf(CommanderError);
    expect(h.stderr()).toContain('Shift key must be an integer.');
  });
});

describe('parseShiftKey', () => {
  it('returns numbers in the safe range and bigints beyond it', () => {
    expect(parseShiftKey('-42')).toBe(-42);
    expect(parseShiftKey('+7')).toBe(7);
    expect(parseShiftKey('1000000000000000000000003')).toBe(1000000000000000000000003n);
  });
});
