export type TraceStage = 'wage' | 'eligibility' | 'dispatch' | 'aggregate' | 'tax' | 'wealth';

export type ReasoningStep = {
  stage: TraceStage;
  label: string;
  formula: string;
  value: number | string;
  schemeId?: string;
};

/**
 * Append-only audit log of every decision taken while computing one result
 */
export class ReasoningTrace {
  private readonly entries: ReasoningStep[] = [];

  add(step: ReasoningStep): void {
    this.entries.push(Object.freeze({ ...step }));
  }

  get length(): number {
    return this.entries.length;
  }

  steps(): readonly ReasoningStep[] {
    return Object.freeze([...this.entries]);
  }
}

/**
 * Rounds a value for display in a trace step; results keep full precision
 */
export function roundForTrace(value: number, digits: number = 2): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}
