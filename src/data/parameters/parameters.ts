import {
  AverageEarnings,
  CountryMetadata,
  CountryParameterSet,
  ResolvedWorkerType,
  SchemeComponent,
  TaxRules,
  WorkerTypeRule,
} from './types';

/**
 * A missing reference from a worker type to a scheme
 */
export type DanglingReference = {
  workerTypeId: string;
  schemeId: string;
};

/**
 * Read-only view over a validated country parameter set with worker-type resolution
 */
export class CountryParameters {
  /** Country code the parameter file is keyed by */
  readonly code: string;
  /** Descriptive metadata (currency, reference year) */
  readonly metadata: CountryMetadata;
  /** Scheme components in declaration order */
  readonly schemes: readonly SchemeComponent[];
  /** Worker-type rules keyed by worker-type id */
  readonly workerTypes: Readonly<Record<string, WorkerTypeRule>>;
  /** Tax strategy parameters */
  readonly taxes: TaxRules;
  /** Country-wide cap on the aggregate benefit, as a multiple of the average wage */
  readonly maximumBenefitAwMultiple: number | null;
  /** Reference-year average wage as recorded in the parameter file */
  readonly averageEarnings: AverageEarnings | null;

  private readonly data: CountryParameterSet;
  private readonly schemesById: Map<string, SchemeComponent>;

  /**
   * @param data - Parameter set as produced by the upstream validation layer
   */
  constructor(data: CountryParameterSet) {
    this.data = data;
    this.code = data.code;
    this.metadata = data.metadata;
    this.schemes = data.schemes;
    this.workerTypes = data.workerTypes;
    this.taxes = data.taxes;
    this.maximumBenefitAwMultiple = data.payout?.maximumBenefitAwMultiple ?? null;
    this.averageEarnings = data.averageEarnings ?? null;
    this.schemesById = new Map(data.schemes.map((scheme) => [scheme.id, scheme]));
  }

  getScheme(schemeId: string): SchemeComponent | null {
    return this.schemesById.get(schemeId) ?? null;
  }

  hasWorkerType(workerTypeId: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.workerTypes, workerTypeId);
  }

  /**
   * Resolves a worker type, overlaying each child on its `inherit` ancestors.
   * Scalar fields on the child win when set; a non-empty `schemeIds` list and an
   * `eligibilityOverride` replace the parent's whole.
   * @returns The merged rule, or null if the id is unknown
   */
  resolveWorkerType(workerTypeId: string): ResolvedWorkerType | null {
    if (!this.hasWorkerType(workerTypeId)) {
      return null;
    }

    // Root ancestor first
    const chain: WorkerTypeRule[] = [];
    const seen = new Set<string>();
    let current: string | undefined = workerTypeId;
    while (current !== undefined && this.hasWorkerType(current) && !seen.has(current)) {
      seen.add(current);
      const rule: WorkerTypeRule = this.workerTypes[current];
      chain.unshift(rule);
      current = rule.inherit;
    }

    let resolved: ResolvedWorkerType = { label: '', coverageStatus: 'unknown', schemeIds: [] };
    for (const rule of chain) {
      resolved = {
        label: rule.label || resolved.label,
        coverageStatus: rule.coverageStatus ?? resolved.coverageStatus,
        schemeIds: rule.schemeIds.length > 0 ? [...rule.schemeIds] : resolved.schemeIds,
        eligibilityOverride: rule.eligibilityOverride ?? resolved.eligibilityOverride,
        notes: rule.notes ?? resolved.notes,
      };
    }
    if (resolved.eligibilityOverride === undefined) {
      delete resolved.eligibilityOverride;
    }
    if (resolved.notes === undefined) {
      delete resolved.notes;
    }
    return resolved;
  }

  /**
   * Re-checks that every scheme id referenced by a worker type exists in this set.
   * Upstream validation should already guarantee this.
   */
  checkReferences(): DanglingReference[] {
    const dangling: DanglingReference[] = [];
    for (const [workerTypeId, rule] of Object.entries(this.workerTypes)) {
      for (const schemeId of rule.schemeIds) {
        if (!this.schemesById.has(schemeId)) {
          dangling.push({ workerTypeId, schemeId });
        }
      }
    }
    return dangling;
  }

  serialize(): CountryParameterSet {
    return this.data;
  }
}
