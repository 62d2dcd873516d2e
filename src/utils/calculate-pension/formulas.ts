import {
  BasicScheme,
  DbScheme,
  DcScheme,
  MinimumScheme,
  NdcScheme,
  PersonProfile,
  PointsScheme,
  SchemeComponent,
  TargetedScheme,
} from '../../data/parameters/types';
import { ComputationError, ConfigurationError } from './errors';
import { roundForTrace as round } from './trace';
import { ComponentResult, FormulaContext } from './types';

function requireNumber(value: number | undefined, field: string, scheme: SchemeComponent): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${scheme.id} (${scheme.type}): ${field} is missing or not a number`, scheme.id);
  }
  return value;
}

function optionalNumber(value: number | undefined, field: string, scheme: SchemeComponent): number | null {
  return value === undefined || value === null ? null : requireNumber(value, field, scheme);
}

/**
 * Combined employee and employer contribution rate; `totalRate` wins when set
 */
export function contributionRate(scheme: SchemeComponent): number {
  const contributions = scheme.contributions;
  if (!contributions) {
    return 0;
  }
  if (contributions.totalRate !== undefined) {
    return contributions.totalRate;
  }
  return (contributions.employeeRate ?? 0) + (contributions.employerRate ?? 0);
}

/**
 * Individual wage, capped at the scheme's contribution ceiling when one is defined
 */
export function referenceWage(scheme: SchemeComponent, context: FormulaContext): number {
  const ceiling = scheme.contributions?.ceilingAwMultiple;
  if (ceiling === undefined) {
    return context.individualWage;
  }
  return Math.min(context.individualWage, ceiling * context.averageWage);
}

export function contributionYears(profile: PersonProfile): number {
  return Math.max(0, profile.contributionYears ?? profile.serviceYears);
}

/**
 * Future value of a level annual contribution paid at the end of each year and compounded yearly
 */
export function accumulate(annualContribution: number, rate: number, years: number): number {
  if (years <= 0 || annualContribution === 0) {
    return 0;
  }
  if (Math.abs(rate) < 1e-12) {
    return annualContribution * years;
  }
  return (annualContribution * (Math.pow(1 + rate, years) - 1)) / rate;
}

function annuityDivisor(scheme: NdcScheme | DcScheme): number {
  const divisor = scheme.benefits.annuityDivisor;
  if (divisor === undefined || divisor === null || !Number.isFinite(divisor) || divisor <= 0) {
    throw new ComputationError(`${scheme.id} (${scheme.type}): annuity divisor at NRA is ${divisor ?? 'undefined'}`, scheme.id);
  }
  return divisor;
}

export function computeDb(scheme: DbScheme, context: FormulaContext): ComponentResult {
  const accrualRate = requireNumber(scheme.benefits.accrualRate, 'accrualRate', scheme);
  const maxAccrualYears = optionalNumber(scheme.benefits.maxAccrualYears, 'maxAccrualYears', scheme);
  const serviceYears = Math.max(0, context.profile.serviceYears);
  // Service beyond the accrual cap is ignored, not an error
  const years = maxAccrualYears === null ? serviceYears : Math.min(serviceYears, maxAccrualYears);
  const wage = referenceWage(scheme, context);
  return {
    amount: accrualRate * years * wage,
    formula: `${accrualRate} × ${years} years × ${round(wage)}`,
  };
}

export function computeNdc(scheme: NdcScheme, context: FormulaContext): ComponentResult {
  const override = context.profile.notionalBalance;
  if (override === undefined && !scheme.contributions) {
    throw new ConfigurationError(`${scheme.id} (NDC): no notional balance and no contribution rules`, scheme.id);
  }
  const divisor = annuityDivisor(scheme);

  let balance: number;
  if (override !== undefined) {
    balance = Math.max(0, override);
  } else {
    const notionalRate = scheme.benefits.notionalInterestRate ?? context.assumptions.realWageGrowth;
    const annual = contributionRate(scheme) * referenceWage(scheme, context);
    balance = accumulate(annual, notionalRate, contributionYears(context.profile));
  }
  return {
    amount: balance / divisor,
    formula: `notional balance ${round(balance)} / divisor ${divisor}`,
  };
}

export function computeDc(scheme: DcScheme, context: FormulaContext): ComponentResult {
  const divisor = annuityDivisor(scheme);

  let fund: number;
  if (context.profile.dcBalance !== undefined) {
    fund = Math.max(0, context.profile.dcBalance);
  } else {
    const annual = contributionRate(scheme) * referenceWage(scheme, context);
    fund = accumulate(annual, context.assumptions.dcNetReturn, contributionYears(context.profile));
  }
  return {
    amount: fund / divisor,
    formula: `fund ${round(fund)} / divisor ${divisor}`,
  };
}

export function computePoints(scheme: PointsScheme, context: FormulaContext): ComponentResult {
  const pointsPerYear = requireNumber(scheme.benefits.pointsPerYear, 'pointsPerYear', scheme);
  const pointValue = requireNumber(scheme.benefits.pointValue, 'pointValue', scheme);
  if (context.averageWage <= 0) {
    throw new ComputationError(`${scheme.id} (points): average wage must be positive`, scheme.id);
  }
  const relativeWage = referenceWage(scheme, context) / context.averageWage;
  const serviceYears = Math.max(0, context.profile.serviceYears);
  return {
    amount: relativeWage * pointsPerYear * serviceYears * pointValue,
    formula: `(${round(relativeWage)} × AW) × ${pointsPerYear} points × ${serviceYears} years × ${pointValue}`,
  };
}

export function computeBasic(scheme: BasicScheme, context: FormulaContext): ComponentResult {
  const flatAmount = optionalNumber(scheme.benefits.flatAmount, 'flatAmount', scheme);
  if (flatAmount !== null) {
    return { amount: flatAmount, formula: `flat amount ${flatAmount}` };
  }
  const multiple = optionalNumber(scheme.benefits.flatAwMultiple, 'flatAwMultiple', scheme);
  if (multiple !== null) {
    return { amount: multiple * context.averageWage, formula: `${multiple} × AW ${round(context.averageWage)}` };
  }
  throw new ConfigurationError(`${scheme.id} (basic): neither flatAmount nor flatAwMultiple is defined`, scheme.id);
}

export function computeTargeted(scheme: TargetedScheme, context: FormulaContext): ComponentResult {
  const { benefits } = scheme;
  const maxAbsolute = optionalNumber(benefits.maxBenefit, 'maxBenefit', scheme);
  const maxMultiple = optionalNumber(benefits.maxBenefitAwMultiple, 'maxBenefitAwMultiple', scheme);
  if (maxAbsolute === null && maxMultiple === null) {
    throw new ConfigurationError(`${scheme.id} (targeted): neither maxBenefit nor maxBenefitAwMultiple is defined`, scheme.id);
  }
  const maxBenefit = maxAbsolute ?? (maxMultiple ?? 0) * context.averageWage;
  const taperRate = requireNumber(benefits.taperRate, 'taperRate', scheme);
  const thresholdAbsolute = optionalNumber(benefits.incomeThreshold, 'incomeThreshold', scheme);
  const thresholdMultiple = optionalNumber(benefits.incomeThresholdAwMultiple, 'incomeThresholdAwMultiple', scheme);
  const threshold = thresholdAbsolute ?? (thresholdMultiple ?? 0) * context.averageWage;

  // Income below the threshold does not raise the benefit above its maximum
  const excess = Math.max(0, context.individualWage - threshold);
  return {
    amount: Math.max(0, maxBenefit - taperRate * excess),
    formula: `max(0, ${round(maxBenefit)} − ${taperRate} × (${round(context.individualWage)} − ${round(threshold)}))`,
  };
}

/**
 * Floor guaranteed by a minimum-pension scheme, in currency
 */
export function minimumFloor(scheme: MinimumScheme, averageWage: number): number {
  return requireNumber(scheme.benefits.floorAwMultiple, 'floorAwMultiple', scheme) * averageWage;
}

function unsupportedScheme(scheme: never): never {
  const value: unknown = scheme;
  let type = 'unknown';
  let id: string | null = null;
  if (typeof value === 'object' && value !== null) {
    if ('type' in value) {
      type = String(value.type);
    }
    if ('id' in value) {
      id = String(value.id);
    }
  }
  throw new ConfigurationError(`Unsupported scheme type '${type}'`, id);
}

/**
 * Computes one scheme's gross annual benefit component.
 * Minimum schemes contribute nothing here; their floor is applied by the aggregator.
 * @throws ConfigurationError for a missing formula field or an unknown scheme type
 * @throws ComputationError for arithmetic failures such as a zero annuity divisor
 */
export function computeComponent(scheme: SchemeComponent, context: FormulaContext): ComponentResult {
  switch (scheme.type) {
    case 'DB':
      return computeDb(scheme, context);
    case 'NDC':
      return computeNdc(scheme, context);
    case 'DC':
      return computeDc(scheme, context);
    case 'points':
      return computePoints(scheme, context);
    case 'basic':
      return computeBasic(scheme, context);
    case 'targeted':
      return computeTargeted(scheme, context);
    case 'minimum':
      return { amount: 0, formula: 'floor applied after aggregation' };
    default:
      return unsupportedScheme(scheme);
  }
}
