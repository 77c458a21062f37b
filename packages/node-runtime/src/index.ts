// packages/node-runtime/src/index.ts
import { stderr } from 'node:process';
import { Halfshift, type HalfshiftOptions } from '../../core/src/index.js';

/** Log lines go to STDERR so STDOUT stays machine readable. */
export const stderrSink = (msg: string): void => {
  stderr.write(msg + '\n');
};

export function createHalfshift(cfg: HalfshiftOptions): Halfshift {
  return new Halfshift({ logger: stderrSink, ...cfg });
}

export { Halfshift, type HalfshiftOptions } from '../../core/src/index.js';
