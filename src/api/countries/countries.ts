import { Request } from 'express';
import { CountryParameterSet, ResolvedWorkerType } from '../../data/parameters/types';
import { ConfigurationError } from '../../utils/calculate-pension/errors';
import { listCountryCodes, loadCountryParameters } from '../../utils/io/countries';
import { ApiError } from '../errors';

export type CountrySummary = {
  code: string;
  countryName: string | null;
  currencyCode: string | null;
  referenceYear: number | null;
  schemeIds: string[];
  workerTypeIds: string[];
  /** Set when the parameter file failed validation */
  error?: string;
};

export type CountryDetail = {
  parameters: CountryParameterSet;
  /** Every worker type with its inheritance chain merged */
  workerTypes: Record<string, ResolvedWorkerType>;
};

/**
 * Lists every country with a parameter file. A file that fails validation is listed with its error.
 *
 * @param _request - Express request object (unused)
 */
export function getCountries(_request: Request): CountrySummary[] {
  return listCountryCodes().map((code) => {
    try {
      const parameters = loadCountryParameters(code);
      if (parameters === null) {
        throw new ConfigurationError(`Parameter file for ${code} disappeared`);
      }
      return {
        code: parameters.code,
        countryName: parameters.metadata.countryName,
        currencyCode: parameters.metadata.currencyCode,
        referenceYear: parameters.metadata.referenceYear,
        schemeIds: parameters.schemes.map((scheme) => scheme.id),
        workerTypeIds: Object.keys(parameters.workerTypes),
      };
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      return {
        code,
        countryName: null,
        currencyCode: null,
        referenceYear: null,
        schemeIds: [],
        workerTypeIds: [],
        error: error.message,
      };
    }
  });
}

/**
 * Retrieves a country's parameter set and its resolved worker types
 *
 * @param request - Express request object with code param
 * @throws ApiError 404 if the country has no parameter file
 */
export function getCountry(request: Request): CountryDetail {
  const code = request.params.code;
  const parameters = loadCountryParameters(code);
  if (parameters === null) {
    throw new ApiError(`Country ${code.toUpperCase()} not found`, 404);
  }

  const workerTypes: Record<string, ResolvedWorkerType> = {};
  for (const workerTypeId of Object.keys(parameters.workerTypes)) {
    const resolved = parameters.resolveWorkerType(workerTypeId);
    if (resolved !== null) {
      workerTypes[workerTypeId] = resolved;
    }
  }
  return { parameters: parameters.serialize(), workerTypes };
}
