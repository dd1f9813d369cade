/**
 * Timestamp helpers for inspection output and date options. All UTC.
 */

import { ConfigurationError } from '../reliability/errors.js';

const DATE_OPTION = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2}))?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format epoch seconds as `YYYY-MM-DD HH:MM:SS` (UTC, fractions dropped)
 */
export function formatUtc(epochSeconds: number): string {
  const d = new Date(Math.floor(epochSeconds) * 1000);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

/**
 * Parse `YYYY-MM-DD`, `YYYY-MM-DD HH:MM:SS` or `YYYY-MM-DDTHH:MM:SS` as UTC
 * epoch seconds
 *
 * @throws ConfigurationError (INVALID_OPTION) on any other input
 */
export function parseDateOption(value: string, optionName: string): number {
  const match = DATE_OPTION.exec(value.trim());
  if (!match) {
    throw new ConfigurationError(
      `Invalid ${optionName} date "${value}": expected YYYY-MM-DD or YYYY-MM-DD HH:MM:SS`,
      { code: 'INVALID_OPTION' }
    );
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map((part) => Number(part ?? 0));
  const millis = Date.UTC(year, month - 1, day, hours, minutes, seconds);
  const check = new Date(millis);

  if (
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hours > 23 ||
    minutes > 59 ||
    seconds > 59
  ) {
    throw new ConfigurationError(`Invalid ${optionName} date "${value}": no such date or time`, {
      code: 'INVALID_OPTION',
    });
  }

  return millis / 1000;
}
