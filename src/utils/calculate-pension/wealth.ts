import { GlobalAssumptions, Sex } from '../../data/parameters/types';
import { EngineWarning } from './errors';
import { AnnuityFactor, LifeTableProvider } from './types';

/** Conditional survival below which the remaining stream is treated as exhausted */
export const SURVIVAL_EPSILON = 1e-9;

export type AnnuityRequest = {
  country: string;
  sex: Sex;
  retirementAge: number;
  assumptions: GlobalAssumptions;
};

/**
 * Conditional survival S(a+t)/S(a) for t = 0, 1, ... until it falls below SURVIVAL_EPSILON,
 * the table ends, or the maximum age is passed. Values are forced into [0, 1] and made non-increasing.
 * @returns null when the provider has no survivorship for the country and sex
 */
export function survivalWeights(
  provider: LifeTableProvider,
  country: string,
  sex: Sex,
  retirementAge: number,
  maxAge: number,
  warnings: EngineWarning[],
): number[] | null {
  const startAge = Math.floor(retirementAge);
  const base = provider.survivorship(country, sex, startAge);
  if (base === null || !Number.isFinite(base) || base <= 0) {
    return null;
  }

  const weights: number[] = [];
  let previous = 1;
  let corrected = false;
  for (let age = startAge; age <= maxAge; age++) {
    const survivorship = provider.survivorship(country, sex, age);
    if (survivorship === null) {
      break;
    }
    let weight = survivorship / base;
    if (!Number.isFinite(weight) || weight < 0 || weight > previous) {
      corrected = true;
      weight = Number.isFinite(weight) ? Math.min(previous, Math.max(0, weight)) : 0;
    }
    if (weight < SURVIVAL_EPSILON) {
      break;
    }
    weights.push(weight);
    previous = weight;
  }

  if (corrected) {
    warnings.push({
      kind: 'ComputationWarning',
      message: `Survivorship for ${country}/${sex} from age ${startAge} was outside [0, 1] or increasing; corrected`,
    });
  }
  return weights;
}

/**
 * Present value of 1 per year paid at the start of each year for `years` years
 */
export function fallbackAnnuityFactor(years: number, discountRate: number, indexationRate: number): number {
  const v = (1 + indexationRate) / (1 + discountRate);
  if (Math.abs(1 - v) < 1e-12) {
    return years;
  }
  return (1 - Math.pow(v, years)) / (1 - v);
}

/**
 * Survival-weighted present value of 1 per year from the retirement age onward.
 * Falls back to a closed-form annuity over the remaining life expectancy when no
 * survivorship curve is available, and flags the substitution as a warning.
 */
export function computeAnnuityFactor(
  request: AnnuityRequest,
  provider: LifeTableProvider | null,
  warnings: EngineWarning[],
): AnnuityFactor {
  const { country, sex, retirementAge, assumptions } = request;
  const growth = (1 + assumptions.indexationRate) / (1 + assumptions.discountRate);

  const weights =
    provider === null
      ? null
      : survivalWeights(provider, country, sex, retirementAge, assumptions.maxAgeForWealth, warnings);

  if (weights !== null && weights.length > 0) {
    const factor = weights.reduce((sum, weight, t) => sum + weight * Math.pow(growth, t), 0);
    return { factor, method: 'life-table', years: weights.length, lifeExpectancy: null };
  }

  const fromTable = provider?.remainingLifeExpectancy(country, sex, Math.floor(retirementAge)) ?? null;
  const lifeExpectancy = fromTable ?? assumptions.lifeExpectancyAtRetirement[sex];
  const reason =
    weights === null
      ? `No life table for ${country}/${sex}`
      : `Retirement age ${retirementAge} is above the maximum age ${assumptions.maxAgeForWealth} for ${country}/${sex}`;
  warnings.push({
    kind: 'ComputationWarning',
    message:
      `${reason}; pension wealth uses a closed-form annuity over ` +
      `${lifeExpectancy} years (${fromTable === null ? 'assumed' : 'tabulated'} life expectancy)`,
  });
  return {
    factor: fallbackAnnuityFactor(lifeExpectancy, assumptions.discountRate, assumptions.indexationRate),
    method: 'fallback',
    years: 0,
    lifeExpectancy,
  };
}

/**
 * Pension wealth as a multiple of the average wage
 */
export function computePensionWealth(annualBenefit: number, annuityFactor: number, averageWage: number): number {
  if (averageWage <= 0) {
    return 0;
  }
  return (annualBenefit * annuityFactor) / averageWage;
}
