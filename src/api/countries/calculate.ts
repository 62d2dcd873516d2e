import { Request } from 'express';
import { computePension } from '../../utils/calculate-pension/engine';
import { PensionResult } from '../../utils/calculate-pension/types';
import { loadAssumptions } from '../../utils/io/assumptions';
import { loadCountryParameters, resolveAverageWage } from '../../utils/io/countries';
import { loadLifeTables } from '../../utils/io/lifeTables';
import { parseCalculationRequest } from '../../utils/net/request';
import { ApiError } from '../errors';

/**
 * Computes the pension of the person described in the request body under a country's rules
 *
 * @param request - Express request object with code param and a profile body
 * @throws ApiError 404 if the country has no parameter file, 400 if the body is invalid
 */
export function calculatePension(request: Request): PensionResult {
  const code = request.params.code;
  const parameters = loadCountryParameters(code);
  if (parameters === null) {
    throw new ApiError(`Country ${code.toUpperCase()} not found`, 404);
  }

  const { profile, assumptions } = parseCalculationRequest(request.body, loadAssumptions());
  return computePension({
    parameters,
    profile,
    assumptions,
    averageWage: resolveAverageWage(parameters),
    lifeTables: loadLifeTables(assumptions.lifeTableYear),
  });
}
