import type { Logger } from '../logger';
import type { Qualification } from '../types';

const MIN_WEIGHT = 1;
const MAX_WEIGHT = 10;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const coerceWeight = (value: unknown): number | undefined => {
  let numeric: number;

  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim()) {
    numeric = Number(value.trim());
  } else {
    return undefined;
  }

  if (!Number.isInteger(numeric) || numeric < MIN_WEIGHT || numeric > MAX_WEIGHT) {
    return undefined;
  }

  return numeric;
};

const toQualification = (entry: unknown): Qualification | undefined => {
  if (!isPlainObject(entry) || typeof entry.qualification !== 'string') {
    return undefined;
  }

  const { qualification } = entry;
  const weight = coerceWeight(entry.weight);

  if (!qualification.trim() || weight === undefined) {
    return undefined;
  }

  return { qualification, weight };
};

/**
 * Keeps the entries that carry a non-blank qualification and an integer weight
 * in [1, 10], in their original order and with the text untouched. Everything
 * else is dropped and logged.
 */
export const normalizeQualifications = (entries: readonly unknown[], log?: Logger): Qualification[] => {
  const kept: Qualification[] = [];

  entries.forEach((entry, index) => {
    const qualification = toQualification(entry);

    if (qualification) {
      kept.push(qualification);
      return;
    }

    log?.warn({ index, entry }, 'Dropping malformed qualification entry');
  });

  return kept;
};

export const rankByWeight = (qualifications: readonly Qualification[]): Qualification[] =>
  [...qualifications].sort((left, right) => right.weight - left.weight);
