import {
  AverageEarnings,
  BracketTaxRules,
  ContributionRules,
  CountryMetadata,
  CountryParameterSet,
  COVERAGE_STATUSES,
  EligibilityRules,
  PayoutRules,
  REFORM_STATUSES,
  SCHEME_TIERS,
  SCHEME_TYPES,
  SchemeComponent,
  TaxBracket,
  TaxRules,
  WorkerTypeRule,
} from './types';

export type JsonObject = Record<string, unknown>;

export type ParseResult<T> = { value: T; errors: [] } | { value: null; errors: string[] };

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects validation errors while reading fields out of untyped JSON
 */
export class FieldReader {
  readonly errors: string[] = [];

  number(source: JsonObject, key: string, path: string): number | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.errors.push(`${path}.${key} must be a number`);
      return undefined;
    }
    return value;
  }

  requiredNumber(source: JsonObject, key: string, path: string): number | undefined {
    if (source[key] === undefined || source[key] === null) {
      this.errors.push(`${path}.${key} is required`);
      return undefined;
    }
    return this.number(source, key, path);
  }

  string(source: JsonObject, key: string, path: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      this.errors.push(`${path}.${key} must be a string`);
      return undefined;
    }
    return value;
  }

  requiredString(source: JsonObject, key: string, path: string): string | undefined {
    const present = source[key] !== undefined && source[key] !== null;
    const value = this.string(source, key, path);
    if (!present || value === '') {
      this.errors.push(`${path}.${key} is required`);
      return undefined;
    }
    return value;
  }

  boolean(source: JsonObject, key: string, path: string, fallback: boolean): boolean {
    const value = source[key];
    if (value === undefined || value === null) {
      return fallback;
    }
    if (typeof value !== 'boolean') {
      this.errors.push(`${path}.${key} must be true or false`);
      return fallback;
    }
    return value;
  }

  oneOf<T extends string>(source: JsonObject, key: string, allowed: readonly T[], path: string): T | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.errors.push(`${path}.${key} must be one of: ${allowed.join(', ')}`);
    }
    return match;
  }

  object(source: JsonObject, key: string, path: string): JsonObject | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isObject(value)) {
      this.errors.push(`${path}.${key} must be an object`);
      return undefined;
    }
    return value;
  }

  array(source: JsonObject, key: string, path: string): unknown[] | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      this.errors.push(`${path}.${key} must be a list`);
      return undefined;
    }
    return value;
  }

  stringList(source: JsonObject, key: string, path: string): string[] {
    const values = this.array(source, key, path) ?? [];
    const strings = values.filter((value): value is string => typeof value === 'string');
    if (strings.length !== values.length) {
      this.errors.push(`${path}.${key} must contain only strings`);
    }
    return strings;
  }
}

/**
 * Copies the listed numeric fields that are present, recording errors for non-numbers
 */
function numbers<K extends string>(reader: FieldReader, source: JsonObject, keys: readonly K[], path: string) {
  const result: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = reader.number(source, key, path);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function parseEligibility(reader: FieldReader, source: JsonObject | undefined, path: string): EligibilityRules {
  if (source === undefined) {
    return {};
  }
  const rules: EligibilityRules = {};
  const nra = reader.object(source, 'normalRetirementAge', path);
  if (nra !== undefined) {
    rules.normalRetirementAge = numbers(reader, nra, ['male', 'female'], `${path}.normalRetirementAge`);
  }
  const era = reader.object(source, 'earlyRetirementAge', path);
  if (era !== undefined) {
    rules.earlyRetirementAge = numbers(reader, era, ['male', 'female'], `${path}.earlyRetirementAge`);
    for (const sex of ['male', 'female'] as const) {
      const early = rules.earlyRetirementAge[sex];
      const normal = rules.normalRetirementAge?.[sex];
      if (early !== undefined && normal !== undefined && early > normal) {
        reader.errors.push(`${path}.earlyRetirementAge.${sex} must not exceed normalRetirementAge.${sex}`);
      }
    }
  }
  const minimumServiceYears = reader.number(source, 'minimumServiceYears', path);
  if (minimumServiceYears !== undefined) {
    rules.minimumServiceYears = minimumServiceYears;
  }
  return rules;
}

function parseScheme(reader: FieldReader, raw: unknown, path: string): SchemeComponent | null {
  if (!isObject(raw)) {
    reader.errors.push(`${path} must be an object`);
    return null;
  }
  const id = reader.requiredString(raw, 'id', path);
  const type = reader.oneOf(raw, 'type', SCHEME_TYPES, path);
  if (raw.type === undefined) {
    reader.errors.push(`${path}.type is required`);
  }
  const base = {
    id: id ?? '',
    name: reader.string(raw, 'name', path) ?? id ?? '',
    tier: reader.oneOf(raw, 'tier', SCHEME_TIERS, path) ?? 'first',
    active: reader.boolean(raw, 'active', path, true),
    reformStatus: reader.oneOf(raw, 'reformStatus', REFORM_STATUSES, path) ?? 'current',
    eligibility: parseEligibility(reader, reader.object(raw, 'eligibility', path), `${path}.eligibility`),
  };

  const contributionsSource = reader.object(raw, 'contributions', path);
  const contributions: ContributionRules | undefined =
    contributionsSource === undefined
      ? undefined
      : numbers(
          reader,
          contributionsSource,
          ['employeeRate', 'employerRate', 'totalRate', 'ceilingAwMultiple'],
          `${path}.contributions`,
        );
  const payoutSource = reader.object(raw, 'payout', path);
  const payout: PayoutRules | undefined =
    payoutSource === undefined
      ? undefined
      : numbers(reader, payoutSource, ['minimumBenefitAwMultiple', 'maximumBenefitAwMultiple'], `${path}.payout`);
  const extras = {
    ...(contributions === undefined ? {} : { contributions }),
    ...(payout === undefined ? {} : { payout }),
  };

  if (id === undefined || type === undefined) {
    return null;
  }
  const benefitsSource = reader.object(raw, 'benefits', path) ?? {};
  const benefitsPath = `${path}.benefits`;

  // Rebuilt per variant so each scheme keeps its own benefits shape
  switch (type) {
    case 'DB': {
      const accrualRate = reader.requiredNumber(benefitsSource, 'accrualRate', benefitsPath);
      if (accrualRate === undefined) {
        return null;
      }
      return {
        ...base,
        ...extras,
        type,
        benefits: { accrualRate, ...numbers(reader, benefitsSource, ['maxAccrualYears'], benefitsPath) },
      };
    }
    case 'NDC':
      return {
        ...base,
        ...extras,
        type,
        benefits: numbers(reader, benefitsSource, ['annuityDivisor', 'notionalInterestRate'], benefitsPath),
      };
    case 'DC':
      return { ...base, ...extras, type, benefits: numbers(reader, benefitsSource, ['annuityDivisor'], benefitsPath) };
    case 'points': {
      const pointsPerYear = reader.requiredNumber(benefitsSource, 'pointsPerYear', benefitsPath);
      const pointValue = reader.requiredNumber(benefitsSource, 'pointValue', benefitsPath);
      if (pointsPerYear === undefined || pointValue === undefined) {
        return null;
      }
      return { ...base, ...extras, type, benefits: { pointsPerYear, pointValue } };
    }
    case 'basic': {
      const benefits = numbers(reader, benefitsSource, ['flatAmount', 'flatAwMultiple'], benefitsPath);
      if (benefits.flatAmount === undefined && benefits.flatAwMultiple === undefined) {
        reader.errors.push(`${benefitsPath} needs flatAmount or flatAwMultiple`);
      }
      return { ...base, ...extras, type, benefits };
    }
    case 'targeted': {
      const taperRate = reader.requiredNumber(benefitsSource, 'taperRate', benefitsPath);
      const rest = numbers(
        reader,
        benefitsSource,
        ['maxBenefit', 'maxBenefitAwMultiple', 'incomeThreshold', 'incomeThresholdAwMultiple'],
        benefitsPath,
      );
      if (rest.maxBenefit === undefined && rest.maxBenefitAwMultiple === undefined) {
        reader.errors.push(`${benefitsPath} needs maxBenefit or maxBenefitAwMultiple`);
      }
      if (taperRate === undefined) {
        return null;
      }
      return { ...base, ...extras, type, benefits: { taperRate, ...rest } };
    }
    case 'minimum': {
      const floorAwMultiple = reader.requiredNumber(benefitsSource, 'floorAwMultiple', benefitsPath);
      if (floorAwMultiple === undefined) {
        return null;
      }
      return { ...base, ...extras, type, benefits: { floorAwMultiple } };
    }
  }
}

function parseWorkerType(reader: FieldReader, raw: unknown, path: string): WorkerTypeRule | null {
  if (!isObject(raw)) {
    reader.errors.push(`${path} must be an object`);
    return null;
  }
  const inherit = reader.string(raw, 'inherit', path);
  const coverageStatus = reader.oneOf(raw, 'coverageStatus', COVERAGE_STATUSES, path);
  const rule: WorkerTypeRule = {
    label: reader.string(raw, 'label', path) ?? '',
    schemeIds: reader.stringList(raw, 'schemeIds', path),
  };
  if (coverageStatus !== undefined) {
    rule.coverageStatus = coverageStatus;
  }
  if (inherit !== undefined) {
    rule.inherit = inherit;
  }
  const override = reader.object(raw, 'eligibilityOverride', path);
  if (override !== undefined) {
    rule.eligibilityOverride = parseEligibility(reader, override, `${path}.eligibilityOverride`);
  }
  const notes = reader.string(raw, 'notes', path);
  if (notes !== undefined) {
    rule.notes = notes;
  }
  return rule;
}

function parseTaxes(reader: FieldReader, raw: JsonObject | undefined): TaxRules | null {
  if (raw === undefined) {
    reader.errors.push('taxes is required');
    return null;
  }
  const method = reader.oneOf(raw, 'method', ['flat', 'bracket'] as const, 'taxes');
  if (method === 'flat') {
    const simplifiedNetRate = reader.requiredNumber(raw, 'simplifiedNetRate', 'taxes');
    return simplifiedNetRate === undefined ? null : { method, simplifiedNetRate };
  }
  if (method === 'bracket') {
    const brackets: TaxBracket[] = [];
    (reader.array(raw, 'brackets', 'taxes') ?? []).forEach((entry, index) => {
      const path = `taxes.brackets[${index}]`;
      if (!isObject(entry)) {
        reader.errors.push(`${path} must be an object`);
        return;
      }
      const rate = reader.requiredNumber(entry, 'rate', path);
      const upTo = reader.number(entry, 'upTo', path) ?? null;
      if (rate !== undefined) {
        brackets.push({ upTo, rate });
      }
    });
    const rules: BracketTaxRules = {
      method,
      basicAllowance: reader.number(raw, 'basicAllowance', 'taxes') ?? 0,
      brackets,
    };
    const socialContributionRate = reader.number(raw, 'socialContributionRate', 'taxes');
    if (socialContributionRate !== undefined) {
      rules.socialContributionRate = socialContributionRate;
    }
    return rules;
  }
  if (raw.method === undefined) {
    reader.errors.push('taxes.method is required');
  }
  return null;
}

function parseMetadata(reader: FieldReader, raw: JsonObject | undefined, code: string): CountryMetadata {
  const source = raw ?? {};
  const metadata: CountryMetadata = {
    countryName: reader.string(source, 'countryName', 'metadata') ?? code,
    currencyCode: reader.string(source, 'currencyCode', 'metadata') ?? '',
    referenceYear: reader.requiredNumber(source, 'referenceYear', 'metadata') ?? 0,
  };
  const lastReviewed = reader.string(source, 'lastReviewed', 'metadata');
  if (lastReviewed !== undefined) {
    metadata.lastReviewed = lastReviewed;
  }
  return metadata;
}

/**
 * Validates a raw country parameter file. Scheme references from worker types and
 * duplicate scheme ids are reported here, before anything reaches the engine.
 *
 * @param raw - Parsed JSON
 * @param code - Country code the file was requested under
 */
export function parseCountryParameters(raw: unknown, code: string): ParseResult<CountryParameterSet> {
  const reader = new FieldReader();
  if (!isObject(raw)) {
    return { value: null, errors: [`Parameters for ${code} must be an object`] };
  }

  const fileCode = reader.string(raw, 'code', 'parameters');
  if (fileCode !== undefined && fileCode.toUpperCase() !== code.toUpperCase()) {
    reader.errors.push(`parameters.code ${fileCode} does not match ${code}`);
  }

  const metadata = parseMetadata(reader, reader.object(raw, 'metadata', 'parameters'), code);

  const schemes: SchemeComponent[] = [];
  (reader.array(raw, 'schemes', 'parameters') ?? []).forEach((entry, index) => {
    const scheme = parseScheme(reader, entry, `schemes[${index}]`);
    if (scheme !== null) {
      schemes.push(scheme);
    }
  });
  const schemeIds = new Set<string>();
  for (const scheme of schemes) {
    if (schemeIds.has(scheme.id)) {
      reader.errors.push(`Duplicate scheme id '${scheme.id}'`);
    }
    schemeIds.add(scheme.id);
  }

  const workerTypes: Record<string, WorkerTypeRule> = {};
  for (const [id, entry] of Object.entries(reader.object(raw, 'workerTypes', 'parameters') ?? {})) {
    const rule = parseWorkerType(reader, entry, `workerTypes.${id}`);
    if (rule === null) {
      continue;
    }
    for (const schemeId of rule.schemeIds) {
      if (!schemeIds.has(schemeId)) {
        reader.errors.push(`workerTypes.${id} references unknown scheme '${schemeId}'`);
      }
    }
    workerTypes[id] = rule;
  }
  for (const [id, rule] of Object.entries(workerTypes)) {
    if (rule.inherit !== undefined && workerTypes[rule.inherit] === undefined) {
      reader.errors.push(`workerTypes.${id} inherits from unknown worker type '${rule.inherit}'`);
    }
  }

  const taxes = parseTaxes(reader, reader.object(raw, 'taxes', 'parameters'));

  const payoutSource = reader.object(raw, 'payout', 'parameters');
  const averageEarningsSource = reader.object(raw, 'averageEarnings', 'parameters');

  if (reader.errors.length > 0 || taxes === null) {
    return { value: null, errors: reader.errors.length > 0 ? reader.errors : ['taxes is invalid'] };
  }

  const parameters: CountryParameterSet = {
    code: code.toUpperCase(),
    metadata,
    schemes,
    workerTypes,
    taxes,
  };
  if (payoutSource !== undefined) {
    parameters.payout = numbers(reader, payoutSource, ['maximumBenefitAwMultiple'], 'payout');
  }
  if (averageEarningsSource !== undefined) {
    const averageEarnings: AverageEarnings = numbers(reader, averageEarningsSource, ['manualValue', 'year'], 'averageEarnings');
    const source = reader.string(averageEarningsSource, 'source', 'averageEarnings');
    if (source !== undefined) {
      averageEarnings.source = source;
    }
    parameters.averageEarnings = averageEarnings;
  }
  if (reader.errors.length > 0) {
    return { value: null, errors: reader.errors };
  }
  return { value: parameters, errors: [] };
}
