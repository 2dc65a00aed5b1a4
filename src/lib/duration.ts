/**
 * Duration strings
 *
 * Parses durations written as a sequence of decimal numbers with unit
 * suffixes ("300ms", "1.5h", "2h45m"), with an optional leading sign.
 * Values are returned in milliseconds.
 */

import { type Result, Success, Failure } from '@/types';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d*\.?\d*)([a-zµμ]+)/y;

/**
 * Parse a duration string into milliseconds
 */
export function parseDuration(input: string): Result<number> {
  const invalid = (): Result<number> => Failure(`invalid duration "${input}"`);

  let text = input;
  let sign = 1;
  if (text.startsWith('-') || text.startsWith('+')) {
    sign = text.startsWith('-') ? -1 : 1;
    text = text.slice(1);
  }

  if (text === '0') return Success(0);
  if (text === '') return invalid();

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < text.length) {
    const match = SEGMENT.exec(text);
    if (!match) return invalid();

    const [, amount = '', unit = ''] = match;
    const scale = UNIT_MS[unit];
    if (amount === '' || amount === '.') return invalid();
    if (scale === undefined) {
      return Failure(`unknown unit "${unit}" in duration "${input}"`);
    }
    total += Number(amount) * scale;
  }

  return Success(sign * total);
}

/**
 * Format milliseconds back into the same notation ("1h2m3s", "250ms")
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  const sign = ms < 0 ? '-' : '';
  let rest = Math.abs(ms);
  if (rest < 1_000) return `${sign}${rest}ms`;

  const hours = Math.floor(rest / 3_600_000);
  rest -= hours * 3_600_000;
  const minutes = Math.floor(rest / 60_000);
  rest -= minutes * 60_000;
  const seconds = rest / 1_000;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (hours > 0 || minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return `${sign}${parts.join('')}`;
}
