import { ManifestError } from '../errors';

/**
 * Parse a comma-separated list of seconds, e.g. "13, 8,11.5" → [13, 8, 11.5].
 *
 * @param field - Name used in error messages (e.g. "beatDrops")
 * @throws ManifestError naming the first entry that is empty or not a finite number
 */
export function parseTimeList(input: string, field = 'times'): number[] {
  return input.split(',').map((raw, i) => {
    const item = raw.trim();
    const value = Number(item);
    if (item === '' || !Number.isFinite(value)) {
      throw new ManifestError(`Failed to parse ${field}: entry ${i + 1} ("${item}") is not a number`, [
        { path: `${field}[${i}]`, message: 'expected a number of seconds' },
      ]);
    }
    return value;
  });
}
