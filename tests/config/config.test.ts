import { parseInteger, parseList } from '../../src/config';

describe('Config parsing', () => {
  it('falls back when an integer setting is unset or not a number', () => {
    expect(parseInteger(undefined, 4)).toBe(4);
    expect(parseInteger('', 4)).toBe(4);
    expect(parseInteger('many', 4)).toBe(4);
  });

  it('reads integer settings in base 10', () => {
    expect(parseInteger('08', 4)).toBe(8);
    expect(parseInteger('0', 4)).toBe(0);
  });

  it('splits lists and drops blanks', () => {
    expect(parseList(' USES, ,MENTIONS ', '')).toEqual(['USES', 'MENTIONS']);
    expect(parseList(undefined, 'A,B')).toEqual(['A', 'B']);
  });
});
