import { MalformedTimestampError } from './errors';

const DIGITS = /^\d+$/;

/**
 * Format whole seconds as `MM:SS`. There is no hour component; minutes keep
 * growing past 59 (6000s and up produces three minute digits).
 */
export function encodeTimestamp(totalSec: number): string {
  if (!Number.isFinite(totalSec) || totalSec < 0) {
    throw new RangeError(`Cannot encode ${totalSec} as a timestamp`);
  }
  const total = Math.floor(totalSec);
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Parse `SS`, `MM:SS` or `H:MM:SS` into seconds. Components of 60 or more
 * are accepted as-is ("01:75" is 135).
 */
export function decodeTimestamp(input: string): number {
  if (input.trim() === '') {
    throw new MalformedTimestampError(input, 'empty');
  }
  const parts = input.split(':').map((p) => p.trim());
  if (parts.length > 3) {
    throw new MalformedTimestampError(input, `expected at most 3 components, got ${parts.length}`);
  }
  let total = 0;
  for (const part of parts) {
    if (!DIGITS.test(part)) {
      throw new MalformedTimestampError(input, `component "${part}" is not a non-negative integer`);
    }
    total = total * 60 + Number(part);
  }
  return total;
}
