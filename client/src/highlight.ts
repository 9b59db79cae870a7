import { TimedLine } from "./types";

/**
 * Index of the last line whose start time is at or before `positionSeconds`,
 * or -1 when the position precedes every line. `lines` must be sorted by
 * timeSeconds.
 */
export function findActiveLineIndex(lines: readonly TimedLine[], positionSeconds: number): number {
  let low = 0;
  let high = lines.length - 1;
  let result = -1;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    if (lines[mid].timeSeconds <= positionSeconds) {
      result = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return result;
}
