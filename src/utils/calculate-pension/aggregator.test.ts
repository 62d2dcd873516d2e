import { describe, it, expect } from 'vitest';
import { BasicScheme, DcScheme, MinimumScheme, NdcScheme, SchemeComponent } from '../../data/parameters/types';
import { baseScheme, createMockContext } from '../test/mockData';
import { aggregateComponents } from './aggregator';
import { EngineWarning } from './errors';
import { ReasoningTrace } from './trace';
import { EarlyRetirement } from './types';

function flat(id: string, flatAmount: number, payout?: BasicScheme['payout']): BasicScheme {
  const scheme: BasicScheme = { ...baseScheme(id), type: 'basic', benefits: { flatAmount } };
  if (payout) {
    scheme.payout = payout;
  }
  return scheme;
}

function floor(id: string, floorAwMultiple: number): MinimumScheme {
  return { ...baseScheme(id), type: 'minimum', benefits: { floorAwMultiple } };
}

function aggregate(
  schemes: SchemeComponent[],
  maximumBenefitAwMultiple: number | null = null,
  earlyRetirement: EarlyRetirement | null = null,
) {
  const trace = new ReasoningTrace();
  const warnings: EngineWarning[] = [];
  const result = aggregateComponents(
    schemes,
    createMockContext(),
    maximumBenefitAwMultiple,
    trace,
    warnings,
    earlyRetirement,
  );
  return { result, trace, warnings };
}

describe('aggregateComponents', () => {
  it('should sum the components', () => {
    const { result, warnings } = aggregate([flat('a', 1000), flat('b', 500)]);

    expect(result).toEqual({
      grossBenefit: 1500,
      breakdown: { a: 1000, b: 500 },
      floorTopUp: 0,
      earlyReduction: 0,
      capReduction: 0,
    });
    expect(warnings).toEqual([]);
  });

  it('should top up to the minimum floor and credit the minimum scheme', () => {
    const { result, trace } = aggregate([flat('a', 1000), flat('b', 500), floor('min', 0.1)]);

    expect(result.grossBenefit).toBe(2000);
    expect(result.floorTopUp).toBe(500);
    expect(result.breakdown).toEqual({ a: 1000, b: 500, min: 500 });
    expect(trace.steps()[trace.length - 1]).toEqual({
      stage: 'aggregate',
      label: 'Minimum pension top-up',
      formula: 'floor 2000 − sum 1500',
      value: 500,
      schemeId: 'min',
    });
  });

  it('should leave a sum above the floor unchanged', () => {
    const { result } = aggregate([flat('a', 2500), floor('min', 0.1)]);

    expect(result.grossBenefit).toBe(2500);
    expect(result.floorTopUp).toBe(0);
    expect(result.breakdown).toEqual({ a: 2500, min: 0 });
  });

  it('should never fall below the floor of any eligible minimum scheme', () => {
    for (const amount of [0, 400, 1999, 2000, 3500]) {
      const { result } = aggregate([flat('a', amount), floor('low', 0.05), floor('high', 0.1)]);
      expect(result.grossBenefit).toBeGreaterThanOrEqual(2000);
    }
  });

  it('should apply the largest floor and credit it to the first minimum scheme', () => {
    const { result } = aggregate([flat('a', 1500), floor('low', 0.05), floor('high', 0.1)]);

    expect(result.grossBenefit).toBe(2000);
    expect(result.breakdown).toEqual({ a: 1500, low: 500, high: 0 });
  });

  it('should cap the aggregate at the country maximum', () => {
    const { result, warnings, trace } = aggregate([flat('a', 1000), flat('b', 500)], 0.05);

    expect(result.grossBenefit).toBe(1000);
    expect(result.capReduction).toBe(500);
    expect(result.breakdown).toEqual({ a: 1000, b: 500 });
    expect(warnings).toEqual([
      { kind: 'ComputationWarning', message: 'Aggregate benefit capped at 1000 (0.05 × AW); 500 clamped' },
    ]);
    expect(trace.steps()[trace.length - 1]).toEqual({
      stage: 'aggregate',
      label: 'Maximum benefit cap',
      formula: 'min(total 1500, 0.05 × AW)',
      value: 1000,
    });
  });

  it('should let the cap win over a higher minimum floor', () => {
    const { result, warnings } = aggregate([flat('a', 500), floor('min', 0.1)], 0.05);

    expect(result.floorTopUp).toBe(1500);
    expect(result.grossBenefit).toBe(1000);
    expect(result.capReduction).toBe(1000);
    expect(result.breakdown).toEqual({ a: 500, min: 1500 });
    expect(warnings).toEqual([
      { kind: 'ComputationWarning', message: 'Aggregate benefit capped at 1000 (0.05 × AW); 1000 clamped' },
    ]);
  });

  it('should reduce every component for early retirement', () => {
    const { result, trace } = aggregate([flat('a', 1000), flat('b', 500)], null, {
      earlyRetirementAge: 60,
      monthsEarly: 40,
      multiplier: 0.8,
    });

    expect(result.grossBenefit).toBe(1200);
    expect(result.earlyReduction).toBe(300);
    expect(result.breakdown).toEqual({ a: 800, b: 400 });
    expect(trace.steps()[3]).toEqual({
      stage: 'aggregate',
      label: 'Early retirement reduction',
      formula: 'sum 1500 × 0.8',
      value: 1200,
    });
  });

  it('should top up a reduced early pension to the minimum floor', () => {
    const { result } = aggregate([flat('a', 2100), floor('min', 0.1)], null, {
      earlyRetirementAge: 60,
      monthsEarly: 40,
      multiplier: 0.8,
    });

    expect(result.grossBenefit).toBe(2000);
    expect(result.breakdown.a).toBeCloseTo(1680, 8);
    expect(result.floorTopUp).toBeCloseTo(320, 8);
  });

  it('should clamp a component to its own payout limits before summing', () => {
    const { result, warnings } = aggregate([
      flat('low', 100, { minimumBenefitAwMultiple: 0.01 }),
      flat('high', 5000, { maximumBenefitAwMultiple: 0.1 }),
    ]);

    expect(result.breakdown).toEqual({ low: 200, high: 2000 });
    expect(result.grossBenefit).toBe(2200);
    expect(warnings.map((warning) => warning.message)).toEqual([
      'low: raised from 100 to scheme minimum 200',
      'high: clamped from 5000 to scheme maximum 2000',
    ]);
  });

  it('should count a failing scheme as zero and record why', () => {
    const dc: DcScheme = { ...baseScheme('dc'), type: 'DC', contributions: { totalRate: 0.1 }, benefits: {} };
    const { result, warnings, trace } = aggregate([flat('a', 1000), dc]);

    expect(result.grossBenefit).toBe(1000);
    expect(result.breakdown).toEqual({ a: 1000, dc: 0 });
    expect(warnings).toEqual([
      { kind: 'ComputationError', message: 'dc (DC): annuity divisor at NRA is undefined', schemeId: 'dc' },
    ]);
    expect(trace.steps()[1]).toEqual({
      stage: 'dispatch',
      label: 'Scheme dc',
      formula: 'ComputationError',
      value: 'contributes 0: dc (DC): annuity divisor at NRA is undefined',
      schemeId: 'dc',
    });
  });

  it('should throw when every scheme fails on its configuration', () => {
    const ndc: NdcScheme = { ...baseScheme('ndc'), type: 'NDC', benefits: { annuityDivisor: 14 } };

    expect(() => aggregate([ndc])).toThrow('No eligible scheme in ndc produced a usable result');
  });

  it('should keep a usable floor when the only other scheme is misconfigured', () => {
    const ndc: NdcScheme = { ...baseScheme('ndc'), type: 'NDC', benefits: { annuityDivisor: 14 } };
    const { result } = aggregate([ndc, floor('min', 0.1)]);

    expect(result.grossBenefit).toBe(2000);
    expect(result.breakdown).toEqual({ ndc: 0, min: 2000 });
  });

  it('should return zero without throwing when every failure is arithmetic', () => {
    const dc: DcScheme = { ...baseScheme('dc'), type: 'DC', benefits: { annuityDivisor: 0 } };
    const { result } = aggregate([dc]);

    expect(result.grossBenefit).toBe(0);
  });

  it('should record every step in the order applied', () => {
    const { trace } = aggregate([flat('a', 1000), flat('b', 500), floor('min', 0.1)], 0.09);

    expect(trace.steps().map((step) => step.label)).toEqual([
      'Scheme a',
      'Scheme b',
      'Sum of components',
      'Minimum pension top-up',
      'Maximum benefit cap',
    ]);
  });
});
