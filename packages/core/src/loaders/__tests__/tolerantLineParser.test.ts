import { describe, it, expect } from 'vitest';
import { parseCandidateLine, splitTolerantLine, stripOuterQuotes } from '../tolerantLineParser';

describe('stripOuterQuotes', () => {
  it('removes one quote from each end', () => {
    expect(stripOuterQuotes('"R1,Comfort"')).toBe('R1,Comfort');
  });

  it('removes only one layer', () => {
    expect(stripOuterQuotes('""R1,Comfort""')).toBe('"R1,Comfort"');
  });

  it('handles a quote on one side only', () => {
    expect(stripOuterQuotes('"R1,Comfort')).toBe('R1,Comfort');
    expect(stripOuterQuotes('R1,Comfort"')).toBe('R1,Comfort');
  });

  it('leaves unquoted lines alone', () => {
    expect(stripOuterQuotes('R1,Comfort')).toBe('R1,Comfort');
  });
});

describe('splitTolerantLine', () => {
  it('strips trailing whitespace and the line break before unwrapping', () => {
    expect(splitTolerantLine('"R1,Comfort,positive"  \r')).toEqual(['R1', 'Comfort', 'positive']);
  });

  it('trims each column', () => {
    expect(splitTolerantLine('R1 ,  Value/Price ')).toEqual(['R1', 'Value/Price']);
  });

  it('splits quoted evidence that contains commas', () => {
    const line = '"R1,Fit/Sizing,negative,""runs small, order up"""';

    expect(splitTolerantLine(line)).toEqual([
      'R1',
      'Fit/Sizing',
      'negative',
      '""runs small',
      'order up""',
    ]);
  });
});

describe('parseCandidateLine', () => {
  it('takes the review id and aspect from the first two columns', () => {
    expect(parseCandidateLine('"R7,Durability,negative,""broke, twice"""')).toEqual({
      reviewId: 'R7',
      aspect: 'Durability',
      rest: ['negative', '""broke', 'twice""'],
    });
  });

  it('returns null for lines with fewer than two columns', () => {
    expect(parseCandidateLine('')).toBeNull();
    expect(parseCandidateLine('R1')).toBeNull();
    expect(parseCandidateLine('"R1"')).toBeNull();
  });

  it('mis-splits an aspect that itself holds a comma', () => {
    expect(parseCandidateLine('R1,"Size, Fit",negative')).toEqual({
      reviewId: 'R1',
      aspect: '"Size',
      rest: ['Fit"', 'negative'],
    });
  });
});
