import { CountryParameters } from '../../data/parameters/parameters';
import {
  DEFAULT_WORKER_TYPE,
  EligibilityRules,
  PersonProfile,
  ResolvedWorkerType,
  SchemeComponent,
} from '../../data/parameters/types';
import { ConfigurationError, EngineWarning } from './errors';
import { ReasoningTrace, roundForTrace } from './trace';
import { EarlyRetirement, EligibilityOutcome, IneligibleScheme } from './types';

/** Reduction per month of claiming before the normal retirement age */
export const EARLY_RETIREMENT_PENALTY_PER_MONTH = 0.005;

export type EligibilityResolution = {
  outcome: EligibilityOutcome;
  /** Schemes that passed eligibility, in declaration order */
  eligibleSchemes: SchemeComponent[];
};

type SchemeCheck = { eligible: true; basis: string } | { eligible: false; reason: string };

const ELIGIBILITY_FORMULA = 'age >= NRA[sex] (or ERA[sex]) or service_years >= minimum_service_years';

/**
 * A scheme's thresholds with the worker type's override laid over them
 */
export function effectiveRules(scheme: SchemeComponent, override?: EligibilityRules): EligibilityRules {
  return override === undefined ? scheme.eligibility : { ...scheme.eligibility, ...override };
}

/**
 * Checks one scheme's age and service thresholds. Either satisfied threshold is sufficient,
 * and a scheme without any threshold is always payable. Reaching the early retirement age
 * satisfies the age threshold at a reduced rate.
 */
export function checkSchemeEligibility(
  scheme: SchemeComponent,
  profile: PersonProfile,
  override?: EligibilityRules,
): SchemeCheck {
  const rules = effectiveRules(scheme, override);
  const nra = rules.normalRetirementAge?.[profile.sex];
  const era = rules.earlyRetirementAge?.[profile.sex];
  const minimumService = rules.minimumServiceYears;

  if (nra === undefined && minimumService === undefined) {
    return { eligible: true, basis: 'no threshold defined' };
  }
  if (nra !== undefined && profile.age >= nra) {
    return { eligible: true, basis: `age ${profile.age} >= NRA ${nra}` };
  }
  if (nra !== undefined && era !== undefined && profile.age >= era) {
    return { eligible: true, basis: `age ${profile.age} >= ERA ${era} (early)` };
  }
  if (minimumService !== undefined && profile.serviceYears >= minimumService) {
    return { eligible: true, basis: `service ${profile.serviceYears} >= minimum ${minimumService}` };
  }

  const missing: string[] = [];
  if (nra !== undefined) {
    missing.push(`age ${profile.age} < NRA ${nra}`);
  }
  if (minimumService !== undefined) {
    missing.push(`service ${profile.serviceYears} < minimum ${minimumService}`);
  }
  return { eligible: false, reason: missing.join('; ') };
}

/**
 * Reduction for claiming between the early and the normal retirement age
 * @returns null when the age is outside [ERA, NRA)
 */
export function earlyRetirementReduction(
  age: number,
  normalRetirementAge: number | null,
  earlyRetirementAge: number | null,
): EarlyRetirement | null {
  if (normalRetirementAge === null || earlyRetirementAge === null) {
    return null;
  }
  if (age < earlyRetirementAge || age >= normalRetirementAge) {
    return null;
  }
  const monthsEarly = (normalRetirementAge - age) * 12;
  return {
    earlyRetirementAge,
    monthsEarly,
    multiplier: Math.max(0, 1 - EARLY_RETIREMENT_PENALTY_PER_MONTH * monthsEarly),
  };
}

function schemesOf(parameters: CountryParameters, rule: ResolvedWorkerType) {
  if (rule.schemeIds.length === 0) {
    return [...parameters.schemes];
  }
  const assigned = new Set(rule.schemeIds);
  return parameters.schemes.filter((scheme) => assigned.has(scheme.id));
}

function candidateSchemes(parameters: CountryParameters, rule: ResolvedWorkerType | null, workerTypeId: string) {
  if (rule === null) {
    return [...parameters.schemes];
  }
  for (const schemeId of rule.schemeIds) {
    if (parameters.getScheme(schemeId) === null) {
      throw new ConfigurationError(
        `Worker type '${workerTypeId}' references unknown scheme '${schemeId}' in ${parameters.code}`,
      );
    }
  }
  return schemesOf(parameters, rule);
}

/**
 * Determines which schemes apply to the profile's worker type and which of those are payable.
 * @throws ConfigurationError if the worker type references a scheme missing from the parameter set
 */
export function resolveEligibility(
  profile: PersonProfile,
  parameters: CountryParameters,
  trace: ReasoningTrace,
  warnings: EngineWarning[],
): EligibilityResolution {
  const workerTypeId = profile.workerTypeId;
  const rule = parameters.resolveWorkerType(workerTypeId);

  if (rule === null) {
    if (workerTypeId !== DEFAULT_WORKER_TYPE) {
      warnings.push({
        kind: 'EligibilityWarning',
        message: `Worker type '${workerTypeId}' is not defined for ${parameters.code}; all active schemes apply`,
      });
    }
  } else if (rule.coverageStatus === 'excluded') {
    warnings.push({
      kind: 'EligibilityWarning',
      message: `Worker type '${workerTypeId}' is excluded from pension coverage; benefit is zero`,
    });
    trace.add({ stage: 'eligibility', label: 'Coverage', formula: 'coverage status', value: 'excluded' });
    return {
      outcome: {
        status: 'ineligible',
        coverageStatus: 'excluded',
        eligibleSchemeIds: [],
        ineligibleSchemes: schemesOf(parameters, rule).map((scheme) => ({
          schemeId: scheme.id,
          reason: 'worker type is excluded from coverage',
        })),
        normalRetirementAge: null,
        earlyRetirementAge: null,
        yearsToNormalRetirement: null,
        earlyRetirement: null,
      },
      eligibleSchemes: [],
    };
  } else if (rule.coverageStatus === 'unknown' || rule.coverageStatus === 'partial') {
    warnings.push({
      kind: 'EligibilityWarning',
      message: `Coverage of worker type '${workerTypeId}' is ${rule.coverageStatus}`,
    });
  }

  trace.add({
    stage: 'eligibility',
    label: 'Coverage',
    formula: 'coverage status',
    value: rule?.coverageStatus ?? 'undefined worker type',
  });

  const eligibleSchemes: SchemeComponent[] = [];
  const ineligibleSchemes: IneligibleScheme[] = [];
  const override = rule?.eligibilityOverride;
  let normalRetirementAge: number | null = override?.normalRetirementAge?.[profile.sex] ?? null;
  let earlyRetirementAge: number | null = override?.earlyRetirementAge?.[profile.sex] ?? null;
  let firstActive = true;

  for (const scheme of candidateSchemes(parameters, rule, workerTypeId)) {
    if (!scheme.active) {
      ineligibleSchemes.push({ schemeId: scheme.id, reason: 'scheme is inactive' });
      trace.add({ stage: 'eligibility', label: `Skip ${scheme.id}`, formula: 'active', value: 'inactive', schemeId: scheme.id });
      continue;
    }

    // The first active scheme supplies whatever ages the override leaves open
    if (firstActive) {
      firstActive = false;
      const rules = effectiveRules(scheme, override);
      normalRetirementAge = normalRetirementAge ?? rules.normalRetirementAge?.[profile.sex] ?? null;
      earlyRetirementAge = earlyRetirementAge ?? rules.earlyRetirementAge?.[profile.sex] ?? null;
    }

    const check = checkSchemeEligibility(scheme, profile, override);
    if (check.eligible) {
      eligibleSchemes.push(scheme);
      trace.add({
        stage: 'eligibility',
        label: `Scheme ${scheme.id}`,
        formula: ELIGIBILITY_FORMULA,
        value: `ELIGIBLE (${check.basis})`,
        schemeId: scheme.id,
      });
    } else {
      ineligibleSchemes.push({ schemeId: scheme.id, reason: check.reason });
      trace.add({
        stage: 'eligibility',
        label: `Scheme ${scheme.id}`,
        formula: ELIGIBILITY_FORMULA,
        value: `NOT ELIGIBLE (${check.reason})`,
        schemeId: scheme.id,
      });
    }
  }

  if (eligibleSchemes.length === 0) {
    warnings.push({
      kind: 'EligibilityWarning',
      message: `No eligible schemes for worker type '${workerTypeId}'; benefit is zero`,
    });
  }

  const earlyRetirement =
    eligibleSchemes.length > 0 ? earlyRetirementReduction(profile.age, normalRetirementAge, earlyRetirementAge) : null;
  if (earlyRetirement !== null) {
    trace.add({
      stage: 'eligibility',
      label: 'Early retirement adjustment',
      formula: `1 − ${EARLY_RETIREMENT_PENALTY_PER_MONTH * 100}%/month × ${roundForTrace(earlyRetirement.monthsEarly, 1)} months early`,
      value: roundForTrace(earlyRetirement.multiplier, 4),
    });
  }

  return {
    outcome: {
      status: eligibleSchemes.length > 0 ? 'eligible' : 'ineligible',
      coverageStatus: rule?.coverageStatus ?? null,
      eligibleSchemeIds: eligibleSchemes.map((scheme) => scheme.id),
      ineligibleSchemes,
      normalRetirementAge,
      earlyRetirementAge,
      yearsToNormalRetirement: normalRetirementAge === null ? null : normalRetirementAge - profile.age,
      earlyRetirement,
    },
    eligibleSchemes,
  };
}
