import { GlobalAssumptions, Sex } from '../../data/parameters/types';
import { FieldReader, isObject, ParseResult } from '../../data/parameters/validation';
import { ConfigurationError } from '../calculate-pension/errors';
import { checkExists, load } from './io';

export const ASSUMPTIONS_FILE = 'assumptions.json';

export const DEFAULT_ASSUMPTIONS: GlobalAssumptions = {
  entryAge: 20,
  careerLength: 40,
  contributionDensity: 1,
  realWageGrowth: 0.02,
  discountRate: 0.02,
  dcNetReturn: 0.03,
  indexationRate: 0,
  lifeTableYear: 2020,
  maxAgeForWealth: 110,
  defaultRetirementAge: { male: 65, female: 65 },
  lifeExpectancyAtRetirement: { male: 20, female: 25 },
};

const SCALAR_FIELDS = [
  'entryAge',
  'careerLength',
  'contributionDensity',
  'realWageGrowth',
  'discountRate',
  'dcNetReturn',
  'indexationRate',
  'lifeTableYear',
  'maxAgeForWealth',
] as const;

const BY_SEX_FIELDS = ['defaultRetirementAge', 'lifeExpectancyAtRetirement'] as const;

const SEXES: readonly Sex[] = ['male', 'female'];

/**
 * Range checks on a complete set of assumptions
 * @returns Array of validation error messages, empty when valid
 */
export function validateAssumptions(assumptions: GlobalAssumptions): string[] {
  const errors: string[] = [];

  if (assumptions.entryAge < 0) {
    errors.push('entryAge must be >= 0');
  }
  if (assumptions.careerLength <= 0) {
    errors.push('careerLength must be > 0');
  }
  if (assumptions.contributionDensity <= 0 || assumptions.contributionDensity > 1) {
    errors.push('contributionDensity must be in (0, 1]');
  }
  for (const field of ['realWageGrowth', 'discountRate', 'dcNetReturn', 'indexationRate'] as const) {
    if (assumptions[field] <= -1) {
      errors.push(`${field} must be > -1`);
    }
  }
  if (!Number.isInteger(assumptions.lifeTableYear)) {
    errors.push('lifeTableYear must be a whole year');
  }
  if (assumptions.maxAgeForWealth < assumptions.entryAge + assumptions.careerLength) {
    errors.push('maxAgeForWealth must be >= entryAge + careerLength');
  }
  for (const sex of SEXES) {
    if (assumptions.lifeExpectancyAtRetirement[sex] <= 0) {
      errors.push(`lifeExpectancyAtRetirement.${sex} must be > 0`);
    }
  }

  return errors;
}

/**
 * Overlays user-supplied values on a base set of assumptions; unknown keys are ignored
 * @param base - Assumptions to start from
 * @param overrides - Untyped overrides (parsed JSON or a request body)
 */
export function mergeAssumptions(base: GlobalAssumptions, overrides: unknown): ParseResult<GlobalAssumptions> {
  if (overrides === undefined || overrides === null) {
    return { value: base, errors: [] };
  }
  if (!isObject(overrides)) {
    return { value: null, errors: ['assumptions must be an object'] };
  }

  const reader = new FieldReader();
  const merged: GlobalAssumptions = {
    ...base,
    defaultRetirementAge: { ...base.defaultRetirementAge },
    lifeExpectancyAtRetirement: { ...base.lifeExpectancyAtRetirement },
  };

  for (const field of SCALAR_FIELDS) {
    const value = reader.number(overrides, field, 'assumptions');
    if (value !== undefined) {
      merged[field] = value;
    }
  }
  for (const field of BY_SEX_FIELDS) {
    const bySex = reader.object(overrides, field, 'assumptions');
    if (bySex === undefined) {
      continue;
    }
    for (const sex of SEXES) {
      const value = reader.number(bySex, sex, `assumptions.${field}`);
      if (value !== undefined) {
        merged[field][sex] = value;
      }
    }
  }

  const errors = [...reader.errors, ...validateAssumptions(merged)];
  if (errors.length > 0) {
    return { value: null, errors };
  }
  return { value: merged, errors: [] };
}

/**
 * Loads the modelling assumptions, falling back to the defaults for any value the file leaves out
 * @throws ConfigurationError when the file holds invalid values
 */
export function loadAssumptions(): GlobalAssumptions {
  if (!checkExists(ASSUMPTIONS_FILE)) {
    return DEFAULT_ASSUMPTIONS;
  }
  const result = mergeAssumptions(DEFAULT_ASSUMPTIONS, load(ASSUMPTIONS_FILE));
  if (result.value === null) {
    throw new ConfigurationError(`Invalid ${ASSUMPTIONS_FILE}: ${result.errors.join('; ')}`);
  }
  return result.value;
}
