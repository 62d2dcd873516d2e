import { describe, it, expect } from 'vitest';
import { BracketTaxRules } from '../../data/parameters/types';
import { EngineWarning } from './errors';
import { convertToNet, createTaxStrategy, incomeTax } from './tax';

const progressive: BracketTaxRules = {
  method: 'bracket',
  basicAllowance: 10000,
  brackets: [
    { upTo: null, rate: 0.2 },
    { upTo: 30000, rate: 0.1 },
  ],
  socialContributionRate: 0.05,
};

describe('createTaxStrategy', () => {
  it('should build a flat strategy', () => {
    const warnings: EngineWarning[] = [];

    expect(createTaxStrategy({ method: 'flat', simplifiedNetRate: 0.1 }, warnings)).toEqual({ method: 'flat', rate: 0.1 });
    expect(warnings).toEqual([]);
  });

  it('should sort brackets into contiguous bands with the open band last', () => {
    const strategy = createTaxStrategy(progressive, []);

    expect(strategy).toEqual({
      method: 'bracket',
      basicAllowance: 10000,
      bands: [
        { lower: 0, upper: 30000, rate: 0.1 },
        { lower: 30000, upper: Infinity, rate: 0.2 },
      ],
      socialContributionRate: 0.05,
    });
  });

  it('should clamp a flat rate above one', () => {
    const warnings: EngineWarning[] = [];

    expect(createTaxStrategy({ method: 'flat', simplifiedNetRate: 1.5 }, warnings)).toEqual({ method: 'flat', rate: 1 });
    expect(warnings).toEqual([
      { kind: 'ComputationWarning', message: 'simplifiedNetRate 1.5 is outside [0, 1]; using 1' },
    ]);
  });

  it('should keep marginal rates plus contributions below one', () => {
    const warnings: EngineWarning[] = [];
    const strategy = createTaxStrategy({ ...progressive, brackets: [{ upTo: null, rate: 0.99 }] }, warnings);

    expect(strategy.method === 'bracket' && strategy.bands[0].rate).toBe(0.95);
    expect(warnings.map((warning) => warning.message)).toEqual(['marginal rate 0.99 is outside [0, 0.95]; using 0.95']);
  });
});

describe('incomeTax', () => {
  it('should leave income above a bounded top band untaxed', () => {
    expect(incomeTax([{ lower: 0, upper: 10000, rate: 0.2 }], 15000)).toBe(2000);
  });

  it('should return zero for no income', () => {
    expect(incomeTax([{ lower: 0, upper: Infinity, rate: 0.2 }], 0)).toBe(0);
  });
});

describe('convertToNet', () => {
  it('should apply a flat rate', () => {
    const strategy = createTaxStrategy({ method: 'flat', simplifiedNetRate: 0.1 }, []);

    expect(convertToNet(strategy, 1000)).toEqual({
      gross: 1000,
      net: 900,
      incomeTax: 100,
      socialContribution: 0,
      effectiveRate: 0.1,
    });
  });

  it('should tax income above the allowance by bracket and charge contributions on the gross', () => {
    const strategy = createTaxStrategy(progressive, []);

    expect(convertToNet(strategy, 50000)).toEqual({
      gross: 50000,
      net: 42500,
      incomeTax: 5000,
      socialContribution: 2500,
      effectiveRate: 0.15,
    });
  });

  it('should not tax income inside the allowance', () => {
    const strategy = createTaxStrategy({ ...progressive, socialContributionRate: 0 }, []);

    expect(convertToNet(strategy, 8000).net).toBe(8000);
  });

  it('should treat a negative amount as zero', () => {
    const strategy = createTaxStrategy(progressive, []);

    expect(convertToNet(strategy, -500)).toEqual({
      gross: 0,
      net: 0,
      incomeTax: 0,
      socialContribution: 0,
      effectiveRate: 0,
    });
  });

  it('should keep net income non-decreasing and never above gross', () => {
    const strategy = createTaxStrategy(
      { ...progressive, brackets: [{ upTo: 20000, rate: 0.3 }, { upTo: null, rate: 0.6 }] },
      [],
    );
    let previous = 0;
    for (let gross = 0; gross <= 100000; gross += 2500) {
      const { net } = convertToNet(strategy, gross);
      expect(net).toBeLessThanOrEqual(gross);
      expect(net).toBeGreaterThanOrEqual(previous);
      previous = net;
    }
  });
});
