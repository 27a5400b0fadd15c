import { describe, expect, it } from 'vitest';
import { describeVisibility, parseMixedVisibility, parseVisibility } from './visibilityParser';

describe('visibilityParser', () => {
  it('flags 10SM as the top of the reporting range', () => {
    expect(parseVisibility('10SM')).toEqual({
      statuteMiles: 10,
      isMaximum: true,
      isLessThan: false,
      text: '10',
      description: '10+ miles visibility'
    });
  });

  it('treats anything above 10SM as 10 or more', () => {
    const visibility = parseVisibility('15SM');
    expect(visibility?.statuteMiles).toBe(15);
    expect(visibility?.isMaximum).toBe(true);
    expect(visibility?.description).toBe('10+ miles visibility');
  });

  it('decodes whole miles', () => {
    expect(parseVisibility('3SM')?.description).toBe('3 miles visibility');
    expect(parseVisibility('1SM')?.description).toBe('1 mile visibility');
    expect(parseVisibility('0SM')?.description).toBe('0 miles visibility');
    expect(parseVisibility('5SM')?.isMaximum).toBe(false);
  });

  it('normalizes fractions to decimal miles', () => {
    const visibility = parseVisibility('1/2SM');
    expect(visibility?.statuteMiles).toBe(0.5);
    expect(visibility?.text).toBe('1/2');
    expect(visibility?.description).toBe('1/2 mile visibility');
    expect(parseVisibility('3/4SM')?.statuteMiles).toBe(0.75);
  });

  it('decodes the less-than prefix', () => {
    const visibility = parseVisibility('M1/4SM');
    expect(visibility?.statuteMiles).toBe(0.25);
    expect(visibility?.isLessThan).toBe(true);
    expect(visibility?.description).toBe('less than 1/4 mile visibility');
  });

  it('combines the two-token mixed form', () => {
    expect(parseMixedVisibility('1', '1/2SM')).toEqual({
      statuteMiles: 1.5,
      isMaximum: false,
      isLessThan: false,
      text: '1 1/2',
      description: '1 1/2 miles visibility'
    });
    expect(parseMixedVisibility('2', '3/4SM')?.statuteMiles).toBe(2.75);
  });

  it('rejects tokens that only look like mixed visibility', () => {
    expect(parseMixedVisibility('1', '3SM')).toBeUndefined();
    expect(parseMixedVisibility('12', '1/2SM')).toBeUndefined();
    expect(parseMixedVisibility('1', '3/2SM')).toBeUndefined();
  });

  it('ignores metric and malformed groups', () => {
    expect(parseVisibility('9999')).toBeUndefined();
    expect(parseVisibility('CAVOK')).toBeUndefined();
    expect(parseVisibility('1/0SM')).toBeUndefined();
    expect(parseVisibility('SM')).toBeUndefined();
  });

  it('describes a missing visibility as unknown', () => {
    expect(describeVisibility(undefined)).toBe('visibility unknown');
    expect(describeVisibility(parseVisibility('2SM'))).toBe('2 miles visibility');
  });
});
