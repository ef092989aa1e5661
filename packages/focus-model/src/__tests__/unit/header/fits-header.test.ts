/**
 * FITS header codec tests
 */

import { describe, it, expect } from 'vitest';
import { BLOCK_LENGTH, CARD_LENGTH, FitsHeader, formatCard, formatNumber } from '../../../header/fits-header.js';

function rawHeader(cards: readonly string[]): Uint8Array {
  const text = [...cards, 'END'].map((card) => card.padEnd(CARD_LENGTH)).join('');
  return new TextEncoder().encode(text.padEnd(BLOCK_LENGTH, ' '));
}

/**
 * Serialised cards up to END, trailing padding removed
 */
function cardsOf(header: FitsHeader): string[] {
  const text = new TextDecoder().decode(header.toBytes());
  const cards: string[] = [];
  for (let offset = 0; offset < text.length; offset += CARD_LENGTH) {
    const card = text.slice(offset, offset + CARD_LENGTH).trimEnd();
    if (card === 'END') break;
    cards.push(card);
  }
  return cards;
}

describe('formatCard', () => {
  it('should right-justify numbers to column 30 and append the comment', () => {
    const card = formatCard('MEANFOC', -1.5, 'Mean HST focus model defocus (microns)');

    expect(card).toHaveLength(80);
    expect(card.slice(0, 30)).toBe(`MEANFOC = ${' '.repeat(16)}-1.5`);
    expect(card.slice(30).trimEnd()).toBe(' / Mean HST focus model defocus (microns)');
  });

  it('should quote strings, pad them to 8 characters and escape quotes', () => {
    expect(formatCard('DETECTOR', 'UVIS').trimEnd()).toBe("DETECTOR= 'UVIS    '");
    expect(formatCard('OBSERVER', "O'Brien").trimEnd()).toBe("OBSERVER= 'O''Brien'");
  });

  it('should write logicals as T and F', () => {
    expect(formatCard('SIMPLE', true).trimEnd()).toBe(`SIMPLE  = ${' '.repeat(19)}T`);
  });

  it('should reject non-finite numbers', () => {
    expect(() => formatCard('MEANFOC', Number.NaN)).toThrow('FITS numeric values must be finite, got NaN');
  });
});

describe('formatNumber', () => {
  it('should keep integers and mark floats', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(-1.5)).toBe('-1.5');
    expect(formatNumber(1e21)).toBe('1E+21');
    expect(formatNumber(1e-7)).toBe('1E-7');
  });
});

describe('FitsHeader', () => {
  it('should round-trip values through bytes', () => {
    const bytes = FitsHeader.fromEntries([
      ['SIMPLE', true],
      ['BITPIX', 16],
      ['DATE-OBS', '2010-01-15', 'UT date'],
      ['EXPTIME', 420.5],
    ]).toBytes();

    expect(bytes.byteLength).toBe(BLOCK_LENGTH);

    const { header, headerLength } = FitsHeader.parse(bytes);
    expect(headerLength).toBe(BLOCK_LENGTH);
    expect(cardsOf(header).map((card) => card.slice(0, 8).trimEnd())).toEqual([
      'SIMPLE',
      'BITPIX',
      'DATE-OBS',
      'EXPTIME',
    ]);
    expect(header.get('SIMPLE')).toBe(true);
    expect(header.get('bitpix')).toBe(16);
    expect(header.get('DATE-OBS')).toBe('2010-01-15');
    expect(cardsOf(header)[2]).toBe("DATE-OBS= '2010-01-15' / UT date");
    expect(header.get('EXPTIME')).toBe(420.5);
  });

  it('should read D exponents, escaped quotes and valueless cards', () => {
    const { header } = FitsHeader.parse(
      rawHeader([
        `SIMPLE  = ${'T'.padStart(20)}`,
        `EXPTIME = ${'1.5D2'.padStart(20)} / seconds`,
        "OBSERVER= 'O''Brien '",
        'COMMENT   free text',
      ])
    );

    expect(header.get('EXPTIME')).toBe(150);
    expect(header.get('OBSERVER')).toBe("O'Brien");
    expect(header.get('COMMENT')).toBeUndefined();

    header.set('EXPTIME', 200);
    expect(cardsOf(header)[1]).toBe(`EXPTIME = ${'200'.padStart(20)} / seconds`);
    expect(cardsOf(header)[3]).toBe('COMMENT   free text');
  });

  it('should keep an existing comment when overwriting a value', () => {
    const header = FitsHeader.fromEntries([
      ['SIMPLE', true],
      ['OBJECT', 'M31', 'target name'],
    ]);

    header.set('OBJECT', 'M32');

    expect(header.get('OBJECT')).toBe('M32');
    expect(cardsOf(header)).toEqual([`SIMPLE  = ${'T'.padStart(20)}`, "OBJECT  = 'M32     ' / target name"]);
  });

  it('should grow by one block when a new card does not fit', () => {
    const entries = Array.from({ length: 34 }, (_, index) => [`KEY${index}`, index] as const);
    const header = FitsHeader.fromEntries([['SIMPLE', true], ...entries]);
    expect(header.toBytes().byteLength).toBe(BLOCK_LENGTH);

    header.set('MEANFOC', -1.5);

    const bytes = header.toBytes();
    expect(bytes.byteLength).toBe(2 * BLOCK_LENGTH);
    expect(FitsHeader.parse(bytes).header.get('MEANFOC')).toBe(-1.5);
  });

  it('should reject invalid keywords', () => {
    const header = FitsHeader.fromEntries([['SIMPLE', true]]);
    expect(() => header.set('TOOLONGKEY', 1)).toThrow('Invalid FITS keyword: TOOLONGKEY');
  });

  it('should reject bytes that are not a FITS header', () => {
    expect(() => FitsHeader.parse(new TextEncoder().encode('hello'.padEnd(BLOCK_LENGTH)))).toThrow(
      'Not a FITS file: first card is not SIMPLE = T'
    );
    expect(() => FitsHeader.parse(new Uint8Array(10))).toThrow('Not a FITS file: too short for a header');
    expect(() =>
      FitsHeader.parse(new TextEncoder().encode(`SIMPLE  = ${'T'.padStart(20)}`.padEnd(BLOCK_LENGTH)))
    ).toThrow('FITS header has no END card');
  });
});
