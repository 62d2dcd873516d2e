import { CountryParameters } from '../../data/parameters/parameters';
import { GlobalAssumptions, PersonProfile, Sex } from '../../data/parameters/types';
import { computePension } from './engine';
import { ConfigurationError, EngineWarning } from './errors';
import { LifeTableProvider, WealthMethod } from './types';
import { computeAnnuityFactor } from './wealth';

/** Age from which claiming later is valued */
export const INCENTIVE_BASE_AGE = 60;
export const INCENTIVE_HORIZON = 5;
const MINIMUM_WINDOW_START = 50;

export type IncentiveInputs = {
  parameters: CountryParameters;
  assumptions: GlobalAssumptions;
  averageWage: number;
  lifeTables: LifeTableProvider | null;
  sex: Sex;
  workerTypeId: string;
};

export type WorkIncentive = {
  sex: Sex;
  normalRetirementAge: number;
  /** Gross pension wealth valued at 60 for each claiming age, as a multiple of the average wage */
  wealthAt60: Record<number, number>;
  /** Annualised change from claiming at 60 to claiming at 65, in % of the average wage */
  incentive6065: number;
  /** The same over the five years up to the country's own NRA */
  incentiveToNormalAge: number;
  mortality: Exclude<WealthMethod, 'none'>;
};

function normalRetirementAgeFor(inputs: IncentiveInputs): number {
  const { parameters, assumptions, sex, workerTypeId } = inputs;
  const override = parameters.resolveWorkerType(workerTypeId)?.eligibilityOverride?.normalRetirementAge?.[sex];
  if (override !== undefined) {
    return Math.floor(override);
  }
  const scheme = parameters.schemes.find(
    (candidate) => candidate.active && candidate.eligibility.normalRetirementAge?.[sex] !== undefined,
  );
  return Math.floor(scheme?.eligibility.normalRetirementAge?.[sex] ?? assumptions.defaultRetirementAge[sex]);
}

function survivalFromBaseAge(inputs: IncentiveInputs, age: number): number {
  const { lifeTables, parameters, sex } = inputs;
  if (lifeTables === null || age <= INCENTIVE_BASE_AGE) {
    return 1;
  }
  const base = lifeTables.survivorship(parameters.code, sex, INCENTIVE_BASE_AGE);
  const later = lifeTables.survivorship(parameters.code, sex, age);
  if (base === null || later === null || base <= 0) {
    return 1;
  }
  return later / base;
}

function grossBenefitAt(inputs: IncentiveInputs, age: number): number {
  const { parameters, assumptions, averageWage, lifeTables, sex, workerTypeId } = inputs;
  const profile: PersonProfile = {
    sex,
    age,
    serviceYears: Math.max(0, age - assumptions.entryAge),
    wage: 1,
    wageUnit: 'aw_multiple',
    workerTypeId,
  };
  try {
    return computePension({ parameters, profile, assumptions, averageWage, lifeTables }).grossBenefit;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return 0;
    }
    throw error;
  }
}

/**
 * Annualised change in gross pension wealth, valued at 60, from delaying the claim by five years.
 * An average earner with an uninterrupted career since the entry age claims at each age; a
 * negative value means delaying is penalised.
 */
export function computeWorkIncentive(inputs: IncentiveInputs): WorkIncentive {
  const { parameters, assumptions, averageWage, sex } = inputs;
  const normalRetirementAge = normalRetirementAgeFor(inputs);
  const windowStart = Math.max(normalRetirementAge - INCENTIVE_HORIZON, MINIMUM_WINDOW_START);
  const ages = [...new Set([INCENTIVE_BASE_AGE, INCENTIVE_BASE_AGE + INCENTIVE_HORIZON, windowStart, normalRetirementAge])].sort(
    (a, b) => a - b,
  );

  // Only the mortality source is reported
  const warnings: EngineWarning[] = [];
  let mortality: WorkIncentive['mortality'] = 'fallback';
  const wealthAt60: Record<number, number> = {};
  for (const age of ages) {
    const benefit = grossBenefitAt(inputs, age);
    const annuity = computeAnnuityFactor(
      { country: parameters.code, sex, retirementAge: age, assumptions },
      inputs.lifeTables,
      warnings,
    );
    if (age === INCENTIVE_BASE_AGE && annuity.method !== 'none') {
      mortality = annuity.method;
    }
    const discount = Math.pow(1 + assumptions.discountRate, age - INCENTIVE_BASE_AGE);
    wealthAt60[age] =
      averageWage > 0 ? ((benefit * annuity.factor) / discount) * survivalFromBaseAge(inputs, age) / averageWage : 0;
  }

  const change = (from: number, to: number) => ((wealthAt60[to] - wealthAt60[from]) / INCENTIVE_HORIZON) * 100;
  return {
    sex,
    normalRetirementAge,
    wealthAt60,
    incentive6065: change(INCENTIVE_BASE_AGE, INCENTIVE_BASE_AGE + INCENTIVE_HORIZON),
    incentiveToNormalAge: change(windowStart, normalRetirementAge),
    mortality,
  };
}
