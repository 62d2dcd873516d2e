import { DEFAULT_WORKER_TYPE, GlobalAssumptions, PersonProfile, Sex } from '../../data/parameters/types';
import { debug } from '../logger';
import { aggregateComponents } from './aggregator';
import { resolveEligibility } from './eligibility';
import { ConfigurationError, EngineWarning } from './errors';
import { convertToNet, createTaxStrategy } from './tax';
import { ReasoningTrace, roundForTrace } from './trace';
import { AggregateResult, AnnuityFactor, EngineInputs, PensionResult } from './types';
import { computeAnnuityFactor, computePensionWealth } from './wealth';

/**
 * The synthetic full-career worker evaluated at each earnings multiple
 */
export function standardProfile(
  assumptions: GlobalAssumptions,
  earningsMultiple: number,
  sex: Sex,
  workerTypeId: string = DEFAULT_WORKER_TYPE,
): PersonProfile {
  return {
    sex,
    age: assumptions.entryAge + assumptions.careerLength,
    serviceYears: assumptions.careerLength * assumptions.contributionDensity,
    wage: earningsMultiple,
    wageUnit: 'aw_multiple',
    workerTypeId,
  };
}

function resolveIndividualWage(
  profile: PersonProfile,
  averageWage: number,
  trace: ReasoningTrace,
  warnings: EngineWarning[],
): number {
  const wage = profile.wageUnit === 'aw_multiple' ? profile.wage * averageWage : profile.wage;
  if (!Number.isFinite(wage) || wage < 0) {
    warnings.push({ kind: 'ComputationWarning', message: `Individual wage ${wage} is not a non-negative amount; using 0` });
    trace.add({ stage: 'wage', label: 'Reference wage', formula: 'clamped to 0', value: 0 });
    return 0;
  }
  trace.add({
    stage: 'wage',
    label: 'Reference wage',
    formula: profile.wageUnit === 'aw_multiple' ? `${profile.wage} × AW ${roundForTrace(averageWage)}` : 'individual wage (provided)',
    value: roundForTrace(wage),
  });
  return wage;
}

const NO_BENEFIT: AggregateResult = {
  grossBenefit: 0,
  breakdown: {},
  floorTopUp: 0,
  earlyReduction: 0,
  capReduction: 0,
};
const NO_ANNUITY: AnnuityFactor = { factor: 0, method: 'none', years: 0, lifeExpectancy: null };

/**
 * Computes every indicator for one profile: eligibility, per-scheme components,
 * aggregation, net conversion and pension wealth, in that order.
 *
 * When `earningsMultiple` is given, it replaces the profile's wage as a multiple of the average wage.
 *
 * @throws ConfigurationError when the parameters are inconsistent or leave no usable scheme
 */
export function computePension(inputs: EngineInputs, earningsMultiple?: number): PensionResult {
  const { parameters, assumptions, averageWage, lifeTables } = inputs;
  const profile: PersonProfile =
    earningsMultiple === undefined ? inputs.profile : { ...inputs.profile, wage: earningsMultiple, wageUnit: 'aw_multiple' };

  if (!Number.isFinite(averageWage) || averageWage <= 0) {
    throw new ConfigurationError(`Average wage for ${parameters.code} must be positive, got ${averageWage}`);
  }

  const trace = new ReasoningTrace();
  const warnings: EngineWarning[] = [];

  const individualWage = resolveIndividualWage(profile, averageWage, trace, warnings);
  const multiple = earningsMultiple ?? individualWage / averageWage;

  const { outcome, eligibleSchemes } = resolveEligibility(profile, parameters, trace, warnings);

  const aggregate =
    eligibleSchemes.length > 0
      ? aggregateComponents(
          eligibleSchemes,
          { profile, individualWage, averageWage, assumptions },
          parameters.maximumBenefitAwMultiple,
          trace,
          warnings,
          outcome.earlyRetirement,
        )
      : NO_BENEFIT;
  const grossBenefit = aggregate.grossBenefit;

  const strategy = createTaxStrategy(parameters.taxes, warnings);
  const netBenefit = convertToNet(strategy, grossBenefit);
  const netWage = convertToNet(strategy, individualWage);
  trace.add({
    stage: 'tax',
    label: 'Net pension',
    formula: `gross ${roundForTrace(grossBenefit)} − tax ${roundForTrace(netBenefit.incomeTax)} − contributions ${roundForTrace(netBenefit.socialContribution)} (${strategy.method})`,
    value: roundForTrace(netBenefit.net),
  });

  const retirementAge =
    outcome.normalRetirementAge === null || outcome.earlyRetirement !== null
      ? profile.age
      : Math.max(profile.age, outcome.normalRetirementAge);
  const annuity =
    grossBenefit > 0
      ? computeAnnuityFactor({ country: parameters.code, sex: profile.sex, retirementAge, assumptions }, lifeTables, warnings)
      : NO_ANNUITY;
  if (annuity.method !== 'none') {
    trace.add({
      stage: 'wealth',
      label: 'Annuity factor',
      formula:
        annuity.method === 'life-table'
          ? `Σ S(${retirementAge}+t)/S(${retirementAge}) × ((1+g)/(1+r))^t over ${annuity.years} years`
          : `closed-form annuity over ${annuity.lifeExpectancy} years`,
      value: roundForTrace(annuity.factor, 4),
    });
  }

  if (warnings.length > 0) {
    debug('Pension computed with warnings', {
      country: parameters.code,
      workerType: profile.workerTypeId,
      multiple,
      warnings: warnings.length,
    });
  }

  return Object.freeze({
    country: parameters.code,
    sex: profile.sex,
    workerTypeId: profile.workerTypeId,
    earningsMultiple: multiple,
    individualWage,
    averageWage,
    netWage: netWage.net,
    grossBenefit,
    netBenefit: netBenefit.net,
    grossReplacementRate: individualWage > 0 ? grossBenefit / individualWage : 0,
    netReplacementRate: individualWage > 0 ? netBenefit.net / individualWage : 0,
    grossPensionLevel: grossBenefit / averageWage,
    netPensionLevel: netBenefit.net / averageWage,
    grossPensionWealth: computePensionWealth(grossBenefit, annuity.factor, averageWage),
    netPensionWealth: computePensionWealth(netBenefit.net, annuity.factor, averageWage),
    annuityFactor: annuity.factor,
    wealthMethod: annuity.method,
    retirementAge,
    componentBreakdown: Object.freeze({ ...aggregate.breakdown }),
    earlyReduction: aggregate.earlyReduction,
    capReduction: aggregate.capReduction,
    eligibility: outcome,
    reasoningTrace: trace.steps(),
    warnings: Object.freeze([...warnings]),
  });
}
