import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StaticLifeTableProvider } from '../../data/lifeTables/lifeTable';
import { BasicScheme, TargetedScheme } from '../../data/parameters/types';
import { loadAssumptions } from '../io/assumptions';
import { listCountryCodes, loadCountryParameters, resolveAverageWage } from '../io/countries';
import { loadLifeTables } from '../io/lifeTables';
import { incrementProgressBar, initProgressBar, stopProgressBar } from '../log';
import { err } from '../logger';
import { baseScheme, createMockParameters, TEST_ASSUMPTIONS } from '../test/mockData';
import { averageIndicators, IndicatorSummary, runCountry, runPanorama, UnknownCountryError } from './runner';

vi.mock('../io/countries', () => ({
  listCountryCodes: vi.fn(),
  loadCountryParameters: vi.fn(),
  resolveAverageWage: vi.fn(),
}));

vi.mock('../io/assumptions', () => ({
  loadAssumptions: vi.fn(),
}));

vi.mock('../io/lifeTables', () => ({
  loadLifeTables: vi.fn(),
}));

vi.mock('../log', () => ({
  initProgressBar: vi.fn(),
  incrementProgressBar: vi.fn(),
  stopProgressBar: vi.fn(),
  showProgressBar: vi.fn(() => false),
}));

vi.mock('../logger', () => ({
  debug: vi.fn(),
  log: vi.fn(),
  warn: vi.fn(),
  err: vi.fn(),
}));

const basic: BasicScheme = { ...baseScheme('basic'), type: 'basic', benefits: { flatAmount: 4000 } };
// Payable to women at 60, to men only from 65
const targeted: TargetedScheme = {
  ...baseScheme('targeted', { normalRetirementAge: { male: 65, female: 60 } }),
  type: 'targeted',
  benefits: { maxBenefit: 5000, taperRate: 0.5, incomeThreshold: 2000 },
};
const parameters = createMockParameters({
  schemes: [basic, targeted],
  workerTypes: { private_employee: { label: 'Employee', coverageStatus: 'covered', schemeIds: [] } },
});

describe('runCountry', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadCountryParameters).mockReturnValue(parameters);
    vi.mocked(resolveAverageWage).mockReturnValue(20000);
    vi.mocked(loadAssumptions).mockReturnValue(TEST_ASSUMPTIONS);
    vi.mocked(loadLifeTables).mockReturnValue(new StaticLifeTableProvider([]));
  });

  it('should evaluate the standard worker at every earnings multiple', () => {
    const run = runCountry('tst', { lifeTables: null });

    expect(run).toMatchObject({
      country: 'TST',
      countryName: 'Testland',
      currencyCode: 'TSD',
      referenceYear: 2024,
      sex: 'male',
      workerTypeId: 'private_employee',
      averageWage: 20000,
    });
    expect(run.indicators.map((indicator) => indicator.earningsMultiple)).toEqual([0.5, 0.75, 1, 1.5, 2, 2.5]);
    expect(run.indicators[0]).toEqual({
      earningsMultiple: 0.5,
      individualWage: 10000,
      grossBenefit: 4000,
      netBenefit: 4000,
      grossReplacementRate: 0.4,
      netReplacementRate: 0.4,
      grossPensionLevel: 0.2,
      netPensionLevel: 0.2,
      grossPensionWealth: 4,
      netPensionWealth: 4,
    });
    expect(Object.keys(run.runs)).toEqual(['male']);
    expect(Object.keys(run.workIncentive)).toEqual(['male']);
    expect(run.workIncentive.male?.normalRetirementAge).toBe(65);
    expect(loadAssumptions).toHaveBeenCalledTimes(1);
    expect(loadLifeTables).not.toHaveBeenCalled();
  });

  it('should average separate male and female runs for the total', () => {
    const run = runCountry('tst', { sex: 'total', assumptions: TEST_ASSUMPTIONS, lifeTables: null });

    expect(run.runs.male).toHaveLength(6);
    expect(run.runs.female).toHaveLength(6);
    expect(run.runs.female?.[0].grossBenefit).toBe(5000);
    expect(run.workIncentive.male?.normalRetirementAge).toBe(65);
    expect(run.workIncentive.female?.normalRetirementAge).toBe(60);
    expect(run.indicators[0]).toEqual({
      earningsMultiple: 0.5,
      individualWage: 10000,
      grossBenefit: 4500,
      netBenefit: 4500,
      grossReplacementRate: 0.45,
      netReplacementRate: 0.45,
      grossPensionLevel: 0.225,
      netPensionLevel: 0.225,
      grossPensionWealth: 5.125,
      netPensionWealth: 5.125,
    });
    expect(loadAssumptions).not.toHaveBeenCalled();
  });

  it('should load life tables of the assumed vintage when none are passed in', () => {
    runCountry('tst', { assumptions: { ...TEST_ASSUMPTIONS, lifeTableYear: 2015 } });

    expect(loadLifeTables).toHaveBeenCalledTimes(1);
    expect(loadLifeTables).toHaveBeenCalledWith(2015);
  });

  it('should throw UnknownCountryError for a country without parameters', () => {
    vi.mocked(loadCountryParameters).mockReturnValue(null);

    expect(() => runCountry('xyz')).toThrow(UnknownCountryError);
    expect(() => runCountry('xyz')).toThrow('Country XYZ not found');
  });
});

describe('averageIndicators', () => {
  it('should average every indicator but keep the earnings multiple', () => {
    const first: IndicatorSummary = {
      earningsMultiple: 1,
      individualWage: 100,
      grossBenefit: 50,
      netBenefit: 40,
      grossReplacementRate: 0.5,
      netReplacementRate: 0.4,
      grossPensionLevel: 0.5,
      netPensionLevel: 0.4,
      grossPensionWealth: 8,
      netPensionWealth: 6,
    };
    const second: IndicatorSummary = { ...first, grossBenefit: 70, grossPensionWealth: 10 };

    expect(averageIndicators([first], [second])).toEqual([{ ...first, grossBenefit: 60, grossPensionWealth: 9 }]);
  });
});

describe('runPanorama', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadCountryParameters).mockImplementation((code: string) => (code === 'TST' ? parameters : null));
    vi.mocked(resolveAverageWage).mockReturnValue(20000);
    vi.mocked(loadAssumptions).mockReturnValue(TEST_ASSUMPTIONS);
    vi.mocked(loadLifeTables).mockReturnValue(new StaticLifeTableProvider([]));
    vi.mocked(listCountryCodes).mockReturnValue(['TST']);
  });

  it('should record failing countries without stopping the run', () => {
    const run = runPanorama(['tst', 'xyz'], { progress: false });

    expect(run.results.map((result) => result.country)).toEqual(['TST']);
    expect(run.failures).toEqual([{ country: 'XYZ', error: 'Country XYZ not found' }]);
    expect(err).toHaveBeenCalledWith('Country run failed', 'XYZ', { error: 'Country XYZ not found' });
  });

  it('should run every country with a parameter file by default', () => {
    const run = runPanorama(undefined, { progress: false });

    expect(run.results.map((result) => result.country)).toEqual(['TST']);
    expect(run.sex).toBe('male');
    expect(run.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(Number.isNaN(Date.parse(run.generatedAt))).toBe(false);
  });

  it('should load assumptions and life tables once per run', () => {
    runPanorama(['tst', 'tst'], { progress: false });

    expect(loadAssumptions).toHaveBeenCalledTimes(1);
    expect(loadLifeTables).toHaveBeenCalledTimes(1);
  });

  it('should report progress per country when asked', () => {
    const run = runPanorama(['tst', 'xyz'], { progress: true });

    expect(initProgressBar).toHaveBeenCalledWith(2, run.runId.slice(0, 8));
    expect(incrementProgressBar).toHaveBeenNthCalledWith(1, 'TST');
    expect(incrementProgressBar).toHaveBeenNthCalledWith(2, 'XYZ');
    expect(stopProgressBar).toHaveBeenCalledTimes(1);
  });

  it('should not draw a progress bar when disabled', () => {
    runPanorama(['tst'], { progress: false });

    expect(initProgressBar).not.toHaveBeenCalled();
  });
});
