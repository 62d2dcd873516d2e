import { Request } from 'express';
import { getSex, getWorkerTypeId } from '../../utils/net/request';
import { CountryRun, runCountry, UnknownCountryError } from '../../utils/panorama/runner';
import { ApiError } from '../errors';

/**
 * Evaluates the standard worker at every earnings multiple for one country
 *
 * @param request - Express request object with code param and optional sex and workerType query
 * @throws ApiError 404 if the country has no parameter file
 */
export function getCountryResults(request: Request): CountryRun {
  const sex = getSex(request);
  const workerTypeId = getWorkerTypeId(request);
  try {
    return runCountry(request.params.code, { sex, workerTypeId });
  } catch (error) {
    if (error instanceof UnknownCountryError) {
      throw new ApiError(error.message, 404);
    }
    throw error;
  }
}
