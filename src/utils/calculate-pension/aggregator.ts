import { MinimumScheme, SchemeComponent } from '../../data/parameters/types';
import { ComputationError, ConfigurationError, EngineWarning, toWarning } from './errors';
import { computeComponent, minimumFloor } from './formulas';
import { ReasoningTrace, roundForTrace } from './trace';
import { AggregateResult, EarlyRetirement, FormulaContext } from './types';

function isScopedError(error: unknown): error is ConfigurationError | ComputationError {
  return error instanceof ConfigurationError || error instanceof ComputationError;
}

/**
 * Clamps a component to its scheme's own payout minimum and maximum
 */
function applySchemeLimits(
  scheme: SchemeComponent,
  amount: number,
  averageWage: number,
  trace: ReasoningTrace,
  warnings: EngineWarning[],
): number {
  const minimumMultiple = scheme.payout?.minimumBenefitAwMultiple;
  const maximumMultiple = scheme.payout?.maximumBenefitAwMultiple;
  let clamped = amount;

  if (minimumMultiple !== undefined && clamped < minimumMultiple * averageWage) {
    const minimum = minimumMultiple * averageWage;
    warnings.push({
      kind: 'ComputationWarning',
      message: `${scheme.id}: raised from ${roundForTrace(clamped)} to scheme minimum ${roundForTrace(minimum)}`,
      schemeId: scheme.id,
    });
    trace.add({
      stage: 'aggregate',
      label: `Scheme minimum ${scheme.id}`,
      formula: `max(component, ${minimumMultiple} × AW)`,
      value: roundForTrace(minimum),
      schemeId: scheme.id,
    });
    clamped = minimum;
  }
  if (maximumMultiple !== undefined && clamped > maximumMultiple * averageWage) {
    const maximum = maximumMultiple * averageWage;
    warnings.push({
      kind: 'ComputationWarning',
      message: `${scheme.id}: clamped from ${roundForTrace(clamped)} to scheme maximum ${roundForTrace(maximum)}`,
      schemeId: scheme.id,
    });
    trace.add({
      stage: 'aggregate',
      label: `Scheme maximum ${scheme.id}`,
      formula: `min(component, ${maximumMultiple} × AW)`,
      value: roundForTrace(maximum),
      schemeId: scheme.id,
    });
    clamped = maximum;
  }
  return clamped;
}

/**
 * Sums the eligible schemes' components, reduces the sum for early retirement, then applies
 * the minimum-pension floor and the country-wide maximum, recording each step in the trace
 * in the order applied.
 *
 * A scheme that fails contributes zero and is recorded as a warning. If every eligible scheme
 * fails and at least one failure is a configuration problem, the aggregate is unusable.
 *
 * @throws ConfigurationError when no eligible scheme produced a usable result
 */
export function aggregateComponents(
  schemes: readonly SchemeComponent[],
  context: FormulaContext,
  maximumBenefitAwMultiple: number | null,
  trace: ReasoningTrace,
  warnings: EngineWarning[],
  earlyRetirement: EarlyRetirement | null = null,
): AggregateResult {
  const breakdown: Record<string, number> = {};
  const minimumSchemes: MinimumScheme[] = [];
  let total = 0;
  let usable = 0;
  let configurationFailures = 0;

  for (const scheme of schemes) {
    if (scheme.type === 'minimum') {
      minimumSchemes.push(scheme);
      breakdown[scheme.id] = 0;
      continue;
    }

    try {
      const component = computeComponent(scheme, context);
      const amount = Math.max(0, component.amount);
      trace.add({
        stage: 'dispatch',
        label: `Scheme ${scheme.id}`,
        formula: `${scheme.type}: ${component.formula}`,
        value: roundForTrace(amount),
        schemeId: scheme.id,
      });
      const limited = applySchemeLimits(scheme, amount, context.averageWage, trace, warnings);
      breakdown[scheme.id] = limited;
      total += limited;
      usable++;
    } catch (error) {
      if (!isScopedError(error)) {
        throw error;
      }
      if (error instanceof ConfigurationError) {
        configurationFailures++;
      }
      warnings.push(toWarning(error));
      trace.add({
        stage: 'dispatch',
        label: `Scheme ${scheme.id}`,
        formula: error.name,
        value: `contributes 0: ${error.message}`,
        schemeId: scheme.id,
      });
      breakdown[scheme.id] = 0;
    }
  }

  trace.add({ stage: 'aggregate', label: 'Sum of components', formula: 'Σ components', value: roundForTrace(total) });

  let earlyReduction = 0;
  if (earlyRetirement !== null && earlyRetirement.multiplier < 1) {
    const reduced = total * earlyRetirement.multiplier;
    earlyReduction = total - reduced;
    for (const schemeId of Object.keys(breakdown)) {
      breakdown[schemeId] *= earlyRetirement.multiplier;
    }
    trace.add({
      stage: 'aggregate',
      label: 'Early retirement reduction',
      formula: `sum ${roundForTrace(total)} × ${roundForTrace(earlyRetirement.multiplier, 4)}`,
      value: roundForTrace(reduced),
    });
    total = reduced;
  }

  let floor = 0;
  let floorSchemeId: string | null = null;
  for (const scheme of minimumSchemes) {
    try {
      const schemeFloor = minimumFloor(scheme, context.averageWage);
      usable++;
      // The top-up is credited to the first minimum scheme; the highest floor binds
      if (floorSchemeId === null) {
        floorSchemeId = scheme.id;
        floor = schemeFloor;
      } else {
        floor = Math.max(floor, schemeFloor);
      }
    } catch (error) {
      if (!isScopedError(error)) {
        throw error;
      }
      configurationFailures++;
      warnings.push(toWarning(error));
      trace.add({
        stage: 'aggregate',
        label: `Minimum ${scheme.id}`,
        formula: error.name,
        value: `ignored: ${error.message}`,
        schemeId: scheme.id,
      });
    }
  }

  if (schemes.length > 0 && usable === 0 && configurationFailures > 0) {
    throw new ConfigurationError(`No eligible scheme in ${schemes.map((s) => s.id).join(', ')} produced a usable result`);
  }

  let floorTopUp = 0;
  if (floorSchemeId !== null) {
    if (total < floor) {
      floorTopUp = floor - total;
      breakdown[floorSchemeId] = floorTopUp;
      trace.add({
        stage: 'aggregate',
        label: 'Minimum pension top-up',
        formula: `floor ${roundForTrace(floor)} − sum ${roundForTrace(total)}`,
        value: roundForTrace(floorTopUp),
        schemeId: floorSchemeId,
      });
      total = floor;
    } else {
      trace.add({
        stage: 'aggregate',
        label: 'Minimum pension top-up',
        formula: `sum ${roundForTrace(total)} >= floor ${roundForTrace(floor)}`,
        value: 0,
        schemeId: floorSchemeId,
      });
    }
  }

  let capReduction = 0;
  if (maximumBenefitAwMultiple !== null) {
    const cap = maximumBenefitAwMultiple * context.averageWage;
    if (total > cap) {
      capReduction = total - cap;
      warnings.push({
        kind: 'ComputationWarning',
        message: `Aggregate benefit capped at ${roundForTrace(cap)} (${maximumBenefitAwMultiple} × AW); ${roundForTrace(capReduction)} clamped`,
      });
      trace.add({
        stage: 'aggregate',
        label: 'Maximum benefit cap',
        formula: `min(total ${roundForTrace(total)}, ${maximumBenefitAwMultiple} × AW)`,
        value: roundForTrace(cap),
      });
      total = cap;
    }
  }

  return { grossBenefit: total, breakdown, floorTopUp, earlyReduction, capReduction };
}
