import { describe, it, expect } from 'vitest';
import { StaticLifeTableProvider } from './lifeTable';
import { LifeTableData } from './types';

const table: LifeTableData = {
  code: 'tst',
  year: 2020,
  startAge: 60,
  survivorship: { male: [1, 0.5, 0.25], female: [1, 0.8] },
  lifeExpectancy: { female: [30, 29] },
};

describe('StaticLifeTableProvider', () => {
  const provider = new StaticLifeTableProvider([table]);

  it('should key tables by upper-case country code', () => {
    expect(provider.countries).toEqual(['TST']);
    expect(provider.hasCountry('tst')).toBe(true);
    expect(provider.hasCountry('NRL')).toBe(false);
  });

  it('should read survivorship by age', () => {
    expect(provider.survivorship('TST', 'male', 61)).toBe(0.5);
    expect(provider.survivorship('tst', 'female', 60)).toBe(1);
  });

  it('should report ages outside the table, fractional ages and unknown countries as unavailable', () => {
    expect(provider.survivorship('TST', 'male', 59)).toBeNull();
    expect(provider.survivorship('TST', 'male', 63)).toBeNull();
    expect(provider.survivorship('TST', 'male', 60.5)).toBeNull();
    expect(provider.survivorship('NRL', 'male', 60)).toBeNull();
  });

  it('should prefer the tabulated life expectancy', () => {
    expect(provider.remainingLifeExpectancy('TST', 'female', 60)).toBe(30);
    expect(provider.remainingLifeExpectancy('TST', 'female', 61)).toBe(29);
  });

  it('should derive the life expectancy from the survivorship curve otherwise', () => {
    expect(provider.remainingLifeExpectancy('TST', 'male', 60)).toBe(1.25);
    expect(provider.remainingLifeExpectancy('TST', 'male', 61)).toBe(1);
    expect(provider.remainingLifeExpectancy('TST', 'male', 62)).toBe(0.5);
    expect(provider.remainingLifeExpectancy('TST', 'male', 70)).toBeNull();
  });

  it('should serialize the tables it holds', () => {
    expect(provider.serialize()).toEqual([table]);
  });
});
