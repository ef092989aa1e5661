/**
 * FITS primary header reader/writer
 *
 * A header is a run of 80-character ASCII cards padded to 2880-byte blocks
 * and terminated by an END card. Cards are kept verbatim so that untouched
 * keywords are written back byte for byte.
 *
 * Supported value types: quoted strings ('' escapes a quote), logical T/F,
 * integers and floats (D or E exponent). CONTINUE long strings and complex
 * values read as undefined.
 */

import { ParseError } from '../core/errors.js';
import type { HeaderStore, HeaderValue } from './header-store.js';

export const CARD_LENGTH = 80;
export const BLOCK_LENGTH = 2880;

const KEYWORD_PATTERN = /^[A-Z0-9_-]{1,8}$/;
const INTEGER_PATTERN = /^[-+]?\d+$/;
const FLOAT_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[EeDd][-+]?\d+)?$/;
const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

interface ParsedCard {
  readonly value?: HeaderValue;
  readonly comment?: string;
}

export class FitsHeader implements HeaderStore {
  private constructor(private readonly cards: string[]) {}

  /**
   * Parse the primary header at the start of a FITS file
   *
   * @returns The header and its length in bytes (whole blocks, END included)
   * @throws {ParseError} When the bytes are not a FITS primary header
   */
  static parse(bytes: Uint8Array): { header: FitsHeader; headerLength: number } {
    const cards: string[] = [];

    for (let offset = 0; offset + CARD_LENGTH <= bytes.byteLength; offset += CARD_LENGTH) {
      const card = decodeAscii(bytes.subarray(offset, offset + CARD_LENGTH));

      if (offset === 0 && !/^SIMPLE  = +T/.test(card)) {
        throw new ParseError('Not a FITS file: first card is not SIMPLE = T');
      }

      if (card.startsWith('END') && card.slice(3).trim() === '') {
        const headerLength = Math.ceil((offset + CARD_LENGTH) / BLOCK_LENGTH) * BLOCK_LENGTH;
        return { header: new FitsHeader(cards), headerLength };
      }

      cards.push(card);
    }

    if (cards.length === 0) {
      throw new ParseError('Not a FITS file: too short for a header');
    }
    throw new ParseError('FITS header has no END card');
  }

  /**
   * Fresh header holding only the given cards (tests, new files)
   */
  static fromEntries(entries: ReadonlyArray<readonly [string, HeaderValue, string?]>): FitsHeader {
    const header = new FitsHeader([]);
    for (const [keyword, value, comment] of entries) {
      header.set(keyword, value, comment);
    }
    return header;
  }

  get(keyword: string): HeaderValue | undefined {
    const index = this.indexOf(keyword);
    return index === -1 ? undefined : parseCard(this.cards[index]).value;
  }

  /**
   * @throws Error For an invalid keyword, a non-ASCII string or a card over 80 characters
   */
  set(keyword: string, value: HeaderValue, comment?: string): void {
    const key = keyword.toUpperCase();
    if (!KEYWORD_PATTERN.test(key)) {
      throw new Error(`Invalid FITS keyword: ${keyword}`);
    }

    const index = this.indexOf(key);
    const keptComment = comment ?? (index === -1 ? undefined : parseCard(this.cards[index]).comment);
    const card = formatCard(key, value, keptComment);

    if (index === -1) {
      this.cards.push(card);
    } else {
      this.cards[index] = card;
    }
  }

  /**
   * Serialise cards + END, padded with spaces to whole blocks
   */
  toBytes(): Uint8Array {
    const text = [...this.cards, 'END'.padEnd(CARD_LENGTH)].join('');
    const padded = text.padEnd(Math.ceil(text.length / BLOCK_LENGTH) * BLOCK_LENGTH, ' ');
    return new TextEncoder().encode(padded);
  }

  private indexOf(keyword: string): number {
    const key = keyword.toUpperCase();
    return this.cards.findIndex((card) => card.slice(0, 8).trimEnd() === key);
  }
}

// ============================================================================
// Card Codec
// ============================================================================

function decodeAscii(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

function parseCard(card: string): ParsedCard {
  if (card.slice(8, 10) !== '= ') {
    return {};
  }

  const field = card.slice(10);
  const trimmed = field.trimStart();

  if (trimmed.startsWith("'")) {
    let value = '';
    let position = 1;
    while (position < trimmed.length) {
      const char = trimmed[position];
      if (char === "'") {
        if (trimmed[position + 1] === "'") {
          value += "'";
          position += 2;
          continue;
        }
        break;
      }
      value += char;
      position++;
    }
    return {
      value: value.trimEnd(),
      comment: extractComment(trimmed.slice(position + 1)),
    };
  }

  const slash = trimmed.indexOf('/');
  const raw = (slash === -1 ? trimmed : trimmed.slice(0, slash)).trim();
  const comment = slash === -1 ? undefined : extractComment(trimmed.slice(slash));

  return { value: parseScalar(raw), comment };
}

function extractComment(rest: string): string | undefined {
  const slash = rest.indexOf('/');
  if (slash === -1) return undefined;
  const comment = rest.slice(slash + 1).trim();
  return comment === '' ? undefined : comment;
}

function parseScalar(raw: string): HeaderValue | undefined {
  if (raw === 'T') return true;
  if (raw === 'F') return false;
  if (INTEGER_PATTERN.test(raw)) return Number(raw);
  if (FLOAT_PATTERN.test(raw)) return Number(raw.replace(/[Dd]/, 'E'));
  return undefined;
}

/**
 * Fixed-format value field: strings left-justified in quotes (at least
 * 8 characters), everything else right-justified to column 30
 */
function formatValue(value: HeaderValue): string {
  if (typeof value === 'string') {
    if (!PRINTABLE_ASCII.test(value)) {
      throw new Error('FITS string values must be printable ASCII');
    }
    return `'${value.replace(/'/g, "''").padEnd(8)}'`;
  }

  if (typeof value === 'boolean') {
    return (value ? 'T' : 'F').padStart(20);
  }

  if (!Number.isFinite(value)) {
    throw new Error(`FITS numeric values must be finite, got ${value}`);
  }

  return formatNumber(value).padStart(20);
}

/**
 * Integers as-is; floats always carry a decimal point or an E exponent
 */
export function formatNumber(value: number): string {
  const text = String(value).replace('e', 'E');
  if (Number.isInteger(value) && !text.includes('E')) {
    return text;
  }
  return /[.E]/.test(text) ? text : `${text}.0`;
}

export function formatCard(keyword: string, value: HeaderValue, comment?: string): string {
  const base = `${keyword.padEnd(8)}= ${formatValue(value)}`;
  const card = comment ? `${base} / ${comment}` : base;

  if (base.length > CARD_LENGTH) {
    throw new Error(`Value for ${keyword} does not fit in one FITS card`);
  }
  if (!PRINTABLE_ASCII.test(card)) {
    throw new Error('FITS comments must be printable ASCII');
  }

  return card.slice(0, CARD_LENGTH).padEnd(CARD_LENGTH);
}
