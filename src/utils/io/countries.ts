import { CountryParameters } from '../../data/parameters/parameters';
import { parseCountryParameters } from '../../data/parameters/validation';
import { ConfigurationError } from '../calculate-pension/errors';
import { warn } from '../logger';
import { checkExists, listJsonFiles, load } from './io';

export const PARAMS_DIR = 'params';

/** Two- or three-letter country codes; anything else never names a parameter file */
const COUNTRY_CODE = /^[A-Za-z]{2,3}$/;

let parametersCache: Map<string, CountryParameters> = new Map();

export function resetParametersCache() {
  parametersCache = new Map();
}

function parametersFile(code: string) {
  return `${PARAMS_DIR}/${code.toLowerCase()}.json`;
}

/**
 * Country codes that have a parameter file, upper-cased and sorted
 */
export function listCountryCodes(): string[] {
  return listJsonFiles(PARAMS_DIR).map((name) => name.toUpperCase());
}

/**
 * Loads and validates a country's parameter file, caching the result per data directory read
 * @returns The parameters, or null when the code is malformed or has no parameter file
 * @throws ConfigurationError listing every validation problem in the file
 */
export function loadCountryParameters(code: string): CountryParameters | null {
  if (!COUNTRY_CODE.test(code)) {
    return null;
  }
  const key = code.toUpperCase();
  const cached = parametersCache.get(key);
  if (cached) {
    return cached;
  }

  const fn = parametersFile(code);
  if (!checkExists(fn)) {
    return null;
  }
  const result = parseCountryParameters(load(fn), key);
  if (result.value === null) {
    throw new ConfigurationError(`Invalid parameters for ${key}: ${result.errors.join('; ')}`);
  }

  const parameters = new CountryParameters(result.value);
  const dangling = parameters.checkReferences();
  if (dangling.length > 0) {
    warn('Dangling worker-type references', key, { references: dangling });
  }
  parametersCache.set(key, parameters);
  return parameters;
}

/**
 * Average wage for the parameter set's reference year, taken from the manual value in the file
 * @throws ConfigurationError when the file records no usable average wage
 */
export function resolveAverageWage(parameters: CountryParameters): number {
  const value = parameters.averageEarnings?.manualValue;
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `No average wage for ${parameters.code}; set averageEarnings.manualValue in its parameter file`,
    );
  }
  return value;
}
