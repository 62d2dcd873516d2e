import { CountryParameters } from '../../data/parameters/parameters';
import { CoverageStatus, GlobalAssumptions, PersonProfile, Sex } from '../../data/parameters/types';
import { EngineWarning } from './errors';
import { ReasoningStep } from './trace';

/**
 * Mortality data keyed by country, sex and age. Either method may report the data as unavailable.
 */
export interface LifeTableProvider {
  /** Probability of surviving from birth to `age` (lx / l0), or null when unavailable */
  survivorship(country: string, sex: Sex, age: number): number | null;
  /** Expected remaining years of life at `age`, or null when unavailable */
  remainingLifeExpectancy(country: string, sex: Sex, age: number): number | null;
}

export type EngineInputs = {
  parameters: CountryParameters;
  profile: PersonProfile;
  assumptions: GlobalAssumptions;
  /** Average wage for the reference year, already resolved by the caller */
  averageWage: number;
  lifeTables: LifeTableProvider | null;
};

export type FormulaContext = {
  profile: PersonProfile;
  /** Resolved individual wage in currency */
  individualWage: number;
  averageWage: number;
  assumptions: GlobalAssumptions;
};

export type ComponentResult = {
  amount: number;
  formula: string;
};

export type IneligibleScheme = {
  schemeId: string;
  reason: string;
};

export type EarlyRetirement = {
  earlyRetirementAge: number;
  monthsEarly: number;
  /** Factor applied to the sum of components */
  multiplier: number;
};

export type EligibilityOutcome = {
  status: 'eligible' | 'ineligible';
  /** Null when the worker type is not defined for the country */
  coverageStatus: CoverageStatus | null;
  eligibleSchemeIds: string[];
  ineligibleSchemes: IneligibleScheme[];
  normalRetirementAge: number | null;
  earlyRetirementAge: number | null;
  yearsToNormalRetirement: number | null;
  /** Set when the benefit is claimed between the early and the normal retirement age */
  earlyRetirement: EarlyRetirement | null;
};

export type AggregateResult = {
  grossBenefit: number;
  /** Gross amount credited to each scheme id, before the country cap */
  breakdown: Record<string, number>;
  floorTopUp: number;
  /** Amount removed from the sum of components by the early retirement reduction */
  earlyReduction: number;
  capReduction: number;
};

export type NetConversion = {
  gross: number;
  net: number;
  incomeTax: number;
  socialContribution: number;
  effectiveRate: number;
};

export type WealthMethod = 'life-table' | 'fallback' | 'none';

export type AnnuityFactor = {
  factor: number;
  method: WealthMethod;
  /** Number of annual payments summed in life-table mode */
  years: number;
  /** Life expectancy used in fallback mode */
  lifeExpectancy: number | null;
};

export type PensionResult = Readonly<{
  country: string;
  sex: Sex;
  workerTypeId: string;
  earningsMultiple: number;
  individualWage: number;
  averageWage: number;
  netWage: number;
  grossBenefit: number;
  netBenefit: number;
  grossReplacementRate: number;
  netReplacementRate: number;
  grossPensionLevel: number;
  netPensionLevel: number;
  /** Present value of the gross benefit stream as a multiple of the average wage */
  grossPensionWealth: number;
  netPensionWealth: number;
  annuityFactor: number;
  wealthMethod: WealthMethod;
  retirementAge: number;
  componentBreakdown: Readonly<Record<string, number>>;
  earlyReduction: number;
  capReduction: number;
  eligibility: EligibilityOutcome;
  reasoningTrace: readonly ReasoningStep[];
  warnings: readonly EngineWarning[];
}>;
