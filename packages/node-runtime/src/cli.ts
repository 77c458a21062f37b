#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import { createProgram } from './program.js';

async function readAllFromStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of stdin) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  return Buffer.concat(chunks).toString('utf8');
}

function reportAndExit(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', reportAndExit);
process.on('unhandledRejection', reportAndExit);

const program = createProgram({
  stdout    : s => { stdout.write(s); },
  stderr    : s => { stderr.write(s); },
  readStdin : readAllFromStdin,
  setExitCode(code) { process.exitCode = code; },
});

program.parseAsync(process.argv).catch(reportAndExit);
