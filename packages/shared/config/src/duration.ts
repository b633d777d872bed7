/**
 * Duration parsing for Connection-Timeout values
 *
 * Accepts the same grammar operators already use for the agent's other
 * ingesters: an optional sign followed by one or more decimal numbers, each
 * with a unit, e.g. "30s", "1h30m", "1.5m", "250ms". Values are milliseconds.
 */

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3, // U+00B5 micro sign
  'μs': 1e-3, // U+03BC Greek mu
  ms: 1,
  s: SECOND_MS,
  m: MINUTE_MS,
  h: HOUR_MS,
};

/** Largest representable duration: 2^63-1 nanoseconds */
export const MAX_DURATION_MS = 9_223_372_036_854.775;

const NUMBER_PATTERN = /^(\d*)(?:\.(\d*))?/;
const UNIT_PATTERN = /^[^\d.]*/;

/**
 * Parse a duration string into milliseconds
 *
 * @throws Error if the string is not a valid duration
 */
export function parseDuration(text: string): number {
  let rest = text;
  let negative = false;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    negative = rest.startsWith('-');
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new Error(`invalid duration "${text}"`);
  }

  let total = 0;
  while (rest !== '') {
    const number = NUMBER_PATTERN.exec(rest);
    const whole = number?.[1] ?? '';
    const fraction = number?.[2] ?? '';
    if (!number || (whole === '' && fraction === '')) {
      throw new Error(`invalid duration "${text}"`);
    }
    rest = rest.slice(number[0].length);

    const unit = UNIT_PATTERN.exec(rest)?.[0] ?? '';
    if (unit === '') {
      throw new Error(`missing unit in duration "${text}"`);
    }
    const scale = UNIT_MS[unit];
    if (scale === undefined) {
      throw new Error(`unknown unit "${unit}" in duration "${text}"`);
    }
    rest = rest.slice(unit.length);

    total += Number(`${whole || '0'}.${fraction || '0'}`) * scale;
    if (total > MAX_DURATION_MS) {
      throw new Error(`invalid duration "${text}"`);
    }
  }

  return negative ? -total : total;
}

/**
 * Parse a duration, returning null instead of throwing
 */
export function tryParseDuration(text: string): number | null {
  try {
    return parseDuration(text);
  } catch {
    return null;
  }
}

/**
 * Render milliseconds as a duration string, e.g. 5400000 -> "1h30m0s"
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';

  const sign = ms < 0 ? '-' : '';
  const abs = Math.abs(ms);
  if (abs < 1000) {
    return `${sign}${abs}ms`;
  }

  const hours = Math.floor(abs / HOUR_MS);
  const minutes = Math.floor((abs % HOUR_MS) / MINUTE_MS);
  const seconds = (abs % MINUTE_MS) / SECOND_MS;

  if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${sign}${minutes}m${seconds}s`;
  return `${sign}${seconds}s`;
}
