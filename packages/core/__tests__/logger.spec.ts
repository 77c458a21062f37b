import { createLogger, isVerbosity } from '../src/util/logger.js';

describe('tiny logger', () => {
  it('obeys verbosity levels', () => {
    const sink: string[] = [];
    const log = createLogger(2, m => sink.push(m));

    log.log(3, 'low-prio');   // should be ignored
    log.log(1, 'important');
    expect(sink).toEqual(['1| important']);
  });

  it('applies a level changed after creation', () => {
    const sink: string[] = [];
    const log = createLogger(0, m => sink.push(m));
    log.log(2, 'hidden');
    log.level = 2;
    log.log(2, 'shown');
    expect(sink).toEqual(['2| shown']);
  });

  it('recognises valid verbosity values', () => {
    expect(isVerbosity(4)).toBe(true);
    expect(isVerbosity(5)).toBe(false);
    expect(isVerbosity(1.5)).toBe(false);
  });
});
