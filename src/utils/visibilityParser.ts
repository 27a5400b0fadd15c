import type { Visibility } from '../types/metar';

// Capture groups: [1] M for "less than" [2] whole miles [3] numerator [4] denominator
const VISIBILITY_REGEX = /^(M)?(?:(\d{1,2})|(\d{1,2})\/(\d{1,2}))SM$/;
// Fraction half of a mixed group such as "1 1/2SM"
const FRACTION_REGEX = /^(\d)\/(\d{1,2})SM$/;
const WHOLE_MILES_REGEX = /^\d$/;

export const MAX_REPORTED_VISIBILITY_SM = 10;
export const UNKNOWN_VISIBILITY = 'visibility unknown';

function describe(text: string, statuteMiles: number, isMaximum: boolean, isLessThan: boolean): string {
  if (isMaximum) {
    return `${MAX_REPORTED_VISIBILITY_SM}+ miles visibility`;
  }
  const unit = statuteMiles > 0 && statuteMiles <= 1 ? 'mile' : 'miles';
  return `${isLessThan ? 'less than ' : ''}${text} ${unit} visibility`;
}

function build(text: string, statuteMiles: number, isLessThan: boolean): Visibility {
  const isMaximum = !isLessThan && statuteMiles >= MAX_REPORTED_VISIBILITY_SM;
  return {
    statuteMiles,
    isMaximum,
    isLessThan,
    text,
    description: describe(text, statuteMiles, isMaximum, isLessThan)
  };
}

/**
 * Decodes a single statute-mile visibility token: `10SM`, `3SM`, `1/2SM`, `M1/4SM`.
 */
export function parseVisibility(token: string): Visibility | undefined {
  const match = token.match(VISIBILITY_REGEX);
  if (!match) {
    return undefined;
  }

  const isLessThan = match[1] === 'M';
  if (match[2] !== undefined) {
    return build(match[2].replace(/^0(?=\d)/, ''), parseInt(match[2], 10), isLessThan);
  }

  const numerator = parseInt(match[3], 10);
  const denominator = parseInt(match[4], 10);
  if (denominator === 0) {
    return undefined;
  }
  return build(`${numerator}/${denominator}`, numerator / denominator, isLessThan);
}

/**
 * Decodes the two-token mixed form, e.g. `1` followed by `1/2SM`.
 * Returns undefined unless both tokens fit.
 */
export function parseMixedVisibility(whole: string, fraction: string): Visibility | undefined {
  if (!WHOLE_MILES_REGEX.test(whole)) {
    return undefined;
  }
  const match = fraction.match(FRACTION_REGEX);
  if (!match) {
    return undefined;
  }

  const numerator = parseInt(match[1], 10);
  const denominator = parseInt(match[2], 10);
  if (denominator === 0 || numerator >= denominator) {
    return undefined;
  }
  const miles = parseInt(whole, 10);
  return build(`${miles} ${numerator}/${denominator}`, miles + numerator / denominator, false);
}

export function describeVisibility(visibility: Visibility | undefined): string {
  return visibility ? visibility.description : UNKNOWN_VISIBILITY;
}
