import {
  classify,
  parseMetadata,
  serializeMetadata,
  summarizeMetadata,
  categoryOfCode,
} from '../../src/cipher/category.js';
import { encodeTagged, encodeWithMetadata } from '../../src/cipher/engine.js';
import { InvalidMetadataError } from '../../src/errors/index.js';

describe('classify', () => {
  it.each([
    ['a', 'lower_first'],
    ['m', 'lower_first'],
    ['n', 'lower_second'],
    ['z', 'lower_second'],
    ['A', 'upper_first'],
    ['M', 'upper_first'],
    ['N', 'upper_second'],
    ['Z', 'upper_second'],
    ['5', 'passthrough'],
    [' ', 'passthrough'],
    ['é', 'passthrough'],
    ['Ж', 'passthrough'],
    ['🌍', 'passthrough'],
  ])('%s → %s', (ch, expected) => {
    expect(classify(ch)).toBe(expected);
  });
});

describe('metadata codes', () => {
  it('parses the five codes strictly', () => {
    expect(parseMetadata('lLuU0')).toEqual([
      'lower_first', 'lower_second', 'upper_first', 'upper_second', 'passthrough',
    ]);
  });

  it('rejects an unknown code with its position', () => {
    expect(() => parseMetadata('lq')).toThrow(InvalidMetadataError);
    expect(() => parseMetadata('lq')).toThrow('Unknown metadata code "q" at position 1');
  });

  it('lenient lookup reads unknown codes as passthrough', () => {
    expect(categoryOfCode('x')).toBe('passthrough');
    expect(categoryOfCode('U')).toBe('upper_second');
  });

  it('typed tags serialise to the persisted string', () => {
    const text = 'Mixed CASE, digits 42 & ñ';
    expect(serializeMetadata(encodeTagged(text, 5, -9).tags))
      .toBe(encodeWithMetadata(text, 5, -9).metadata);
  });

  it('summarises a metadata string', () => {
    expect(summarizeMetadata('ulllL00ULLll0x')).toEqual({
      lower_first : 5,
      lower_second: 3,
      upper_first : 1,
      upper_second: 1,
      passthrough : 3,
      total       : 14,
      unknown     : 1,
    });
  });
});
