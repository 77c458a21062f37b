import { fileURLToPath } from 'node:url';
import { execa } from 'execa';

/* ------------------------------------------------------------------ */
/*  Paths & runtime                                                    */
/* ------------------------------------------------------------------ */
const CLI = fileURLToPath(new URL('../src/cli.ts', import.meta.url));

// Node loads the TypeScript entry through tsx
const run = (args: string[], input?: string) =>
  execa(process.execPath, ['--import', 'tsx', CLI, ...args], {
    input,
    reject: false,
  });

/* ------------------------------------------------------------------ */
/*  Tests                                                              */
/* ------------------------------------------------------------------ */
describe('halfshift (CLI)', () => {
  it('encrypt-text | decrypt-text round-trip', async () => {
    const enc = await run(['-a', '3', '-b', '2', 'encrypt-text', 'Hello, World!']);
    expect(enc.exitCode).toBe(0);
    expect(JSON.parse(enc.stdout)).toEqual({ text: 'Ekrrj, Ajmrj!', metadata: 'ulllL00ULLll0' });

    const dec = await run(['-a', '3', '-b', '2', 'decrypt-text', '-m', 'ulllL00ULLll0'], 'Ekrrj, Ajmrj!');
    expect(dec.stdout).toBe('Hello, World!');
  });

  it('decrypts piped text ending in a newline', async () => {
    const dec = await run(['-a', '3', '-b', '2', 'decrypt-text', '-m', 'ulllL00ULLll0'], 'Ekrrj, Ajmrj!\n');
    expect(dec.exitCode).toBe(0);
    expect(dec.stdout).toBe('Hello, World!');
  });

  it('reports a missing key as a ConfigError', async () => {
    const proc = await run(['-b', '2', 'encrypt-text', 'x']);
    expect(proc.exitCode).toBe(1);
    expect(proc.stderr).toContain('Error [ConfigError]: Both --shift1 and --shift2 are required.');
  });

  it('fails cleanly on a metadata length mismatch', async () => {
    const proc = await run(['-a', '3', '-b', '4', 'decrypt-text', 'ab', '-m', 'l']);
    expect(proc.exitCode).toBe(1);
    expect(proc.stderr).toContain(
      'Error [LengthMismatchError]: Ciphertext and metadata lengths do not match (ciphertext: 2, metadata: 1)',
    );
  });
});
