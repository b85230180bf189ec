import { err, ok, type Result } from 'neverthrow';

const UNIT_NS = {
  ns: 1,
  us: 1_000,
  'µs': 1_000, // U+00B5 micro sign
  'μs': 1_000, // U+03BC Greek mu
  ms: 1_000_000,
  s: 1_000_000_000,
  m: 60_000_000_000,
  h: 3_600_000_000_000,
} as const;

type DurationUnit = keyof typeof UNIT_NS;

/** Largest delay a Node timer honours; anything above fires after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

function isDurationUnit(value: string): value is DurationUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_NS, value);
}

/**
 * Parse a duration such as `300ms`, `5s`, `1m30s` or `1.5h` into milliseconds.
 *
 * Segments are summed; a bare `0` is accepted. Sub-millisecond units are
 * allowed and the result is rounded to the nearest millisecond. Durations a
 * timer cannot wait for are rejected.
 */
export function parseDuration(input: string): Result<number, string> {
  const text = input.trim();
  if (text === '0') return ok(0);
  if (text === '') return err('duration is empty');

  let rest = text;
  let totalNs = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    const value = match?.[1];
    const unit = match?.[2];
    if (!match || value === undefined || unit === undefined || !isDurationUnit(unit)) {
      return err(`invalid duration "${input}" (expected e.g. 300ms, 5s, 1m30s)`);
    }
    totalNs += Number(value) * UNIT_NS[unit];
    rest = rest.slice(match[0].length);
  }

  const ms = Math.round(totalNs / 1_000_000);
  if (!Number.isFinite(ms) || ms > MAX_DURATION_MS) {
    return err(`duration "${input}" exceeds the maximum of ${MAX_DURATION_MS}ms`);
  }
  return ok(ms);
}
