import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigurationError } from '../calculate-pension/errors';
import { createMockParameters } from '../test/mockData';
import { listCountryCodes, loadCountryParameters, resetParametersCache, resolveAverageWage } from './countries';
import { checkExists, listJsonFiles, load } from './io';

vi.mock('./io', () => ({
  checkExists: vi.fn(),
  listJsonFiles: vi.fn(),
  load: vi.fn(),
}));

const rawParameters = {
  code: 'TST',
  metadata: { countryName: 'Testland', currencyCode: 'TSD', referenceYear: 2024 },
  schemes: [{ id: 'basic', type: 'basic', benefits: { flatAwMultiple: 0.2 } }],
  workerTypes: { private_employee: { label: 'Employee', coverageStatus: 'covered', schemeIds: [] } },
  taxes: { method: 'flat', simplifiedNetRate: 0.1 },
  averageEarnings: { manualValue: 40000, year: 2024 },
};

describe('Country parameter loading', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    resetParametersCache();
  });

  it('should list country codes in upper case', () => {
    vi.mocked(listJsonFiles).mockReturnValue(['nrl', 'spt']);

    expect(listCountryCodes()).toEqual(['NRL', 'SPT']);
    expect(listJsonFiles).toHaveBeenCalledWith('params');
  });

  it('should return null for a country without a parameter file', () => {
    vi.mocked(checkExists).mockReturnValue(false);

    expect(loadCountryParameters('xyz')).toBeNull();
    expect(checkExists).toHaveBeenCalledWith('params/xyz.json');
  });

  it('should not touch the file system for a code that is not a country code', () => {
    vi.mocked(checkExists).mockReturnValue(true);
    vi.mocked(load).mockReturnValue(rawParameters);

    expect(loadCountryParameters('../assumptions')).toBeNull();
    expect(loadCountryParameters('..%2Fassumptions')).toBeNull();
    expect(loadCountryParameters('tst/../../x')).toBeNull();
    expect(loadCountryParameters('')).toBeNull();
    expect(checkExists).not.toHaveBeenCalled();
    expect(load).not.toHaveBeenCalled();
  });

  it('should load and cache a valid parameter file', () => {
    vi.mocked(checkExists).mockReturnValue(true);
    vi.mocked(load).mockReturnValue(rawParameters);

    const parameters = loadCountryParameters('tst');

    expect(parameters?.code).toBe('TST');
    expect(parameters?.metadata.countryName).toBe('Testland');
    expect(parameters?.averageEarnings).toEqual({ manualValue: 40000, year: 2024 });
    expect(loadCountryParameters('TST')).toBe(parameters);
    expect(load).toHaveBeenCalledTimes(1);
    expect(load).toHaveBeenCalledWith('params/tst.json');
  });

  it('should throw ConfigurationError listing every problem in an invalid file', () => {
    vi.mocked(checkExists).mockReturnValue(true);
    vi.mocked(load).mockReturnValue({});

    expect(() => loadCountryParameters('bad')).toThrow(ConfigurationError);
    expect(() => loadCountryParameters('bad')).toThrow(
      'Invalid parameters for BAD: metadata.referenceYear is required; taxes is required',
    );
  });
});

describe('resolveAverageWage', () => {
  it('should return the manual value from the parameter file', () => {
    expect(resolveAverageWage(createMockParameters({ averageEarnings: { manualValue: 40000 } }))).toBe(40000);
  });

  it('should throw when no usable average wage is recorded', () => {
    expect(() => resolveAverageWage(createMockParameters())).toThrow(
      'No average wage for TST; set averageEarnings.manualValue in its parameter file',
    );
    expect(() => resolveAverageWage(createMockParameters({ averageEarnings: { manualValue: 0 } }))).toThrow(
      ConfigurationError,
    );
  });
});
