import { TaxRules } from '../../data/parameters/types';
import { EngineWarning } from './errors';
import { NetConversion } from './types';

export type FlatTaxStrategy = {
  method: 'flat';
  rate: number;
};

export type TaxBand = {
  lower: number;
  upper: number;
  rate: number;
};

export type BracketTaxStrategy = {
  method: 'bracket';
  basicAllowance: number;
  bands: TaxBand[];
  socialContributionRate: number;
};

export type TaxStrategy = FlatTaxStrategy | BracketTaxStrategy;

function clampRate(rate: number, max: number, field: string, warnings: EngineWarning[]): number {
  if (!Number.isFinite(rate) || rate < 0 || rate > max) {
    const clamped = Number.isFinite(rate) ? Math.min(max, Math.max(0, rate)) : 0;
    warnings.push({ kind: 'ComputationWarning', message: `${field} ${rate} is outside [0, ${max}]; using ${clamped}` });
    return clamped;
  }
  return rate;
}

/**
 * Builds the tax strategy selected by a country's configuration.
 * Rates are forced into a range that keeps net income non-decreasing in gross and never above it.
 */
export function createTaxStrategy(rules: TaxRules, warnings: EngineWarning[]): TaxStrategy {
  if (rules.method === 'flat') {
    return { method: 'flat', rate: clampRate(rules.simplifiedNetRate, 1, 'simplifiedNetRate', warnings) };
  }

  const socialContributionRate = clampRate(rules.socialContributionRate ?? 0, 1, 'socialContributionRate', warnings);
  const maxMarginal = 1 - socialContributionRate;

  // Ascending by threshold, the unbounded band last
  const sorted = [...rules.brackets].sort((a, b) => (a.upTo ?? Infinity) - (b.upTo ?? Infinity));
  const bands: TaxBand[] = [];
  let lower = 0;
  for (const bracket of sorted) {
    const upper = bracket.upTo ?? Infinity;
    bands.push({ lower, upper, rate: clampRate(bracket.rate, maxMarginal, 'marginal rate', warnings) });
    lower = Math.max(lower, upper);
  }

  return {
    method: 'bracket',
    basicAllowance: Math.max(0, rules.basicAllowance),
    bands,
    socialContributionRate,
  };
}

/**
 * Marginal income tax over the bands; income above a bounded top band is untaxed
 */
export function incomeTax(bands: readonly TaxBand[], taxableIncome: number): number {
  let tax = 0;
  for (const band of bands) {
    if (taxableIncome <= band.lower) {
      break;
    }
    const width = Math.min(taxableIncome, band.upper) - band.lower;
    tax += width * band.rate;
  }
  return tax;
}

/**
 * Converts a gross annual amount (benefit or wage) to net
 */
export function convertToNet(strategy: TaxStrategy, gross: number): NetConversion {
  const amount = Math.max(0, gross);
  let tax = 0;
  let socialContribution = 0;

  switch (strategy.method) {
    case 'flat':
      tax = amount * strategy.rate;
      break;
    case 'bracket': {
      const taxable = Math.max(0, amount - strategy.basicAllowance);
      tax = incomeTax(strategy.bands, taxable);
      socialContribution = amount * strategy.socialContributionRate;
      break;
    }
  }

  const net = Math.max(0, amount - tax - socialContribution);
  return {
    gross: amount,
    net,
    incomeTax: tax,
    socialContribution,
    effectiveRate: amount > 0 ? (amount - net) / amount : 0,
  };
}
