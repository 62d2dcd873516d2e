import { Request } from 'express';
import { getCountryCodes, getSex, getWorkerTypeId } from '../../utils/net/request';
import { PanoramaRun, runPanorama } from '../../utils/panorama/runner';

/**
 * Runs the selected countries (all by default) for the standard worker
 *
 * @param request - Express request object with optional countries, sex and workerType query
 */
export function getPanorama(request: Request): PanoramaRun {
  return runPanorama(getCountryCodes(request), {
    sex: getSex(request),
    workerTypeId: getWorkerTypeId(request),
    progress: false,
  });
}
