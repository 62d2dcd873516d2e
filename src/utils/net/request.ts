import { Request } from 'express';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { ApiError } from '../../api/errors';
import { DEFAULT_WORKER_TYPE, GlobalAssumptions, PersonProfile, Sex } from '../../data/parameters/types';
import { FieldReader, isObject } from '../../data/parameters/validation';
import { mergeAssumptions } from '../io/assumptions';
import { RUN_SEXES, RunSex } from '../panorama/runner';

dayjs.extend(utc);

export type CalculationRequest = {
  profile: PersonProfile;
  assumptions: GlobalAssumptions;
};

function queryString(request: Request, key: string): string | undefined {
  const value = request.query[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Extracts the modelled sex from the request query parameters
 * @param request - Express request object
 * @param defaultSex - Sex to use if none specified
 * @throws ApiError 400 for anything other than male, female or total
 */
export function getSex(request: Request, defaultSex: RunSex = 'male'): RunSex {
  const value = queryString(request, 'sex');
  if (value === undefined) {
    return defaultSex;
  }
  const sex = RUN_SEXES.find((candidate) => candidate === value.toLowerCase());
  if (sex === undefined) {
    throw new ApiError(`sex must be one of: ${RUN_SEXES.join(', ')}`, 400);
  }
  return sex;
}

/**
 * Extracts selected countries from the comma-separated `countries` query parameter
 * @returns Upper-cased codes, or an empty list when none were given
 */
export function getCountryCodes(request: Request): string[] {
  const value = queryString(request, 'countries');
  if (value === undefined) {
    return [];
  }
  return value
    .split(',')
    .map((code) => code.trim().toUpperCase())
    .filter((code) => code !== '');
}

export function getWorkerTypeId(request: Request): string {
  return queryString(request, 'workerType') ?? DEFAULT_WORKER_TYPE;
}

/**
 * Whole years between two dates; the retirement date defaults to today
 */
export function ageAt(birthDate: string, retirementDate?: string): number {
  const birth = dayjs.utc(birthDate);
  const retirement = retirementDate === undefined ? dayjs.utc() : dayjs.utc(retirementDate);
  return retirement.diff(birth, 'year');
}

function isDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}/.test(value) && dayjs.utc(value).isValid();
}

/**
 * Validates a personal calculation request body. The age is taken directly or derived from
 * `birthDate` and `retirementDate`; assumption overrides are applied over `baseAssumptions`.
 *
 * @throws ApiError 400 listing every problem in the body
 */
export function parseCalculationRequest(body: unknown, baseAssumptions: GlobalAssumptions): CalculationRequest {
  if (!isObject(body)) {
    throw new ApiError('Request body must be an object', 400);
  }

  const reader = new FieldReader();
  const sex = reader.oneOf<Sex>(body, 'sex', ['male', 'female'], 'body');
  if (body.sex === undefined) {
    reader.errors.push('body.sex is required');
  }

  let age = reader.number(body, 'age', 'body');
  const birthDate = reader.string(body, 'birthDate', 'body');
  const retirementDate = reader.string(body, 'retirementDate', 'body');
  if (age === undefined && birthDate !== undefined) {
    if (!isDate(birthDate)) {
      reader.errors.push('body.birthDate must be a date (YYYY-MM-DD)');
    } else if (retirementDate !== undefined && !isDate(retirementDate)) {
      reader.errors.push('body.retirementDate must be a date (YYYY-MM-DD)');
    } else {
      age = ageAt(birthDate, retirementDate);
    }
  } else if (age === undefined && body.age === undefined) {
    reader.errors.push('body.age or body.birthDate is required');
  }
  if (age !== undefined && age < 0) {
    reader.errors.push('body.age must be >= 0');
  }

  const serviceYears = reader.requiredNumber(body, 'serviceYears', 'body');
  if (serviceYears !== undefined && serviceYears < 0) {
    reader.errors.push('body.serviceYears must be >= 0');
  }
  const wage = reader.requiredNumber(body, 'wage', 'body');
  if (wage !== undefined && wage < 0) {
    reader.errors.push('body.wage must be >= 0');
  }
  const wageUnit = reader.oneOf(body, 'wageUnit', ['currency', 'aw_multiple'] as const, 'body') ?? 'currency';
  const workerTypeId = reader.string(body, 'workerTypeId', 'body') ?? DEFAULT_WORKER_TYPE;

  const balances: Pick<PersonProfile, 'dcBalance' | 'notionalBalance' | 'contributionYears'> = {};
  for (const field of ['dcBalance', 'notionalBalance', 'contributionYears'] as const) {
    const value = reader.number(body, field, 'body');
    if (value !== undefined) {
      balances[field] = value;
    }
  }

  const merged = mergeAssumptions(baseAssumptions, body.assumptions);
  const errors = [...reader.errors, ...merged.errors];
  if (
    errors.length > 0 ||
    sex === undefined ||
    age === undefined ||
    serviceYears === undefined ||
    wage === undefined ||
    merged.value === null
  ) {
    throw new ApiError(`Invalid calculation request: ${errors.join('; ')}`, 400);
  }

  const profile: PersonProfile = { sex, age, serviceYears, wage, wageUnit, workerTypeId, ...balances };
  return { profile, assumptions: merged.value };
}
