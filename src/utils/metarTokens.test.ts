import { describe, expect, it } from 'vitest';
import { classifyToken, tokenize } from './metarTokens';

describe('metarTokens', () => {
  it('splits on any whitespace', () => {
    expect(tokenize('  KHIO\t051953Z\n36008KT  10SM ')).toEqual(['KHIO', '051953Z', '36008KT', '10SM']);
    expect(tokenize('')).toEqual([]);
  });

  it('drops the report type word', () => {
    expect(tokenize('METAR KHIO 051953Z')).toEqual(['KHIO', '051953Z']);
  });

  it('classifies each kind of group', () => {
    const tokens = ['36008KT', '280V350', '10SM', '-RA', 'BKN025', '21/M01', 'A3012', 'AUTO', 'XYZZY'];
    expect(tokens.map((_, i) => classifyToken(tokens, i).kind)).toEqual([
      'wind',
      'windVariation',
      'visibility',
      'weather',
      'cloud',
      'temperature',
      'pressure',
      'modifier',
      'unrecognized'
    ]);
  });

  it('consumes both tokens of a mixed visibility', () => {
    const classified = classifyToken(['2', '1/4SM', 'BR'], 0);
    expect(classified.kind).toBe('visibility');
    expect(classified.consumed).toBe(2);
  });

  it('leaves a lone digit unrecognized', () => {
    const classified = classifyToken(['2', 'BR'], 0);
    expect(classified).toEqual({ kind: 'unrecognized', token: '2', consumed: 1 });
  });
});
