export type Sex = 'male' | 'female';

export const SCHEME_TIERS = ['zero', 'first', 'second', 'third', 'fourth'] as const;
export type SchemeTier = (typeof SCHEME_TIERS)[number];

export const SCHEME_TYPES = ['DB', 'NDC', 'DC', 'points', 'basic', 'targeted', 'minimum'] as const;
export type SchemeType = (typeof SCHEME_TYPES)[number];

export const REFORM_STATUSES = ['current', 'legacy', 'transitional', 'reformed'] as const;
export type ReformStatus = (typeof REFORM_STATUSES)[number];

export const COVERAGE_STATUSES = ['covered', 'excluded', 'partial', 'unknown'] as const;
export type CoverageStatus = (typeof COVERAGE_STATUSES)[number];

export type WageUnit = 'currency' | 'aw_multiple';

/** Individual wages expressed as multiples of the average wage, in evaluation order */
export const EARNINGS_MULTIPLES = [0.5, 0.75, 1.0, 1.5, 2.0, 2.5] as const;

export type EarningsMultiple = (typeof EARNINGS_MULTIPLES)[number];

export type EligibilityRules = {
  /** Normal retirement age by sex; a missing entry means no age threshold */
  normalRetirementAge?: Partial<Record<Sex, number>>;
  /** Earliest claiming age by sex; benefits claimed before the NRA are reduced */
  earlyRetirementAge?: Partial<Record<Sex, number>>;
  /** Minimum years of service that make the scheme payable */
  minimumServiceYears?: number;
};

export type ContributionRules = {
  employeeRate?: number;
  employerRate?: number;
  /** Takes precedence over employee + employer when present */
  totalRate?: number;
  /** Contribution ceiling as a multiple of the average wage */
  ceilingAwMultiple?: number;
};

export type PayoutRules = {
  minimumBenefitAwMultiple?: number;
  maximumBenefitAwMultiple?: number;
};

type SchemeBase = {
  id: string;
  name: string;
  tier: SchemeTier;
  active: boolean;
  reformStatus: ReformStatus;
  eligibility: EligibilityRules;
  contributions?: ContributionRules;
  payout?: PayoutRules;
};

export type DbScheme = SchemeBase & {
  type: 'DB';
  benefits: {
    accrualRate: number;
    maxAccrualYears?: number;
  };
};

export type NdcScheme = SchemeBase & {
  type: 'NDC';
  benefits: {
    annuityDivisor?: number;
    /** Notional return credited to the account; defaults to real wage growth */
    notionalInterestRate?: number;
  };
};

export type DcScheme = SchemeBase & {
  type: 'DC';
  benefits: {
    annuityDivisor?: number;
  };
};

export type PointsScheme = SchemeBase & {
  type: 'points';
  benefits: {
    pointsPerYear: number;
    /** Currency value of one point at retirement */
    pointValue: number;
  };
};

export type BasicScheme = SchemeBase & {
  type: 'basic';
  benefits: {
    flatAmount?: number;
    flatAwMultiple?: number;
  };
};

export type TargetedScheme = SchemeBase & {
  type: 'targeted';
  benefits: {
    maxBenefit?: number;
    maxBenefitAwMultiple?: number;
    taperRate: number;
    incomeThreshold?: number;
    incomeThresholdAwMultiple?: number;
  };
};

export type MinimumScheme = SchemeBase & {
  type: 'minimum';
  benefits: {
    floorAwMultiple: number;
  };
};

export type SchemeComponent =
  | DbScheme
  | NdcScheme
  | DcScheme
  | PointsScheme
  | BasicScheme
  | TargetedScheme
  | MinimumScheme;

export const DEFAULT_WORKER_TYPE = 'private_employee';

export type WorkerTypeRule = {
  label: string;
  /** Taken from the inherited worker type when unset; 'unknown' at the root */
  coverageStatus?: CoverageStatus;
  /** Empty means every active scheme applies */
  schemeIds: string[];
  /** Thresholds that replace the schemes' own for this worker type */
  eligibilityOverride?: EligibilityRules;
  /** Worker type to inherit unset fields from */
  inherit?: string;
  notes?: string;
};

/** A worker type with its `inherit` chain merged in */
export type ResolvedWorkerType = {
  label: string;
  coverageStatus: CoverageStatus;
  schemeIds: string[];
  eligibilityOverride?: EligibilityRules;
  notes?: string;
};

export type TaxBracket = {
  /** Upper bound of the band; null is an unbounded top band */
  upTo: number | null;
  rate: number;
};

export type FlatTaxRules = {
  method: 'flat';
  simplifiedNetRate: number;
};

export type BracketTaxRules = {
  method: 'bracket';
  basicAllowance: number;
  brackets: TaxBracket[];
  socialContributionRate?: number;
};

export type TaxRules = FlatTaxRules | BracketTaxRules;

export type CountryMetadata = {
  countryName: string;
  currencyCode: string;
  referenceYear: number;
  lastReviewed?: string;
};

export type AverageEarnings = {
  manualValue?: number;
  year?: number;
  source?: string;
};

export type CountryParameterSet = {
  code: string;
  metadata: CountryMetadata;
  schemes: SchemeComponent[];
  workerTypes: Record<string, WorkerTypeRule>;
  taxes: TaxRules;
  payout?: {
    maximumBenefitAwMultiple?: number;
  };
  averageEarnings?: AverageEarnings;
};

export type GlobalAssumptions = {
  entryAge: number;
  careerLength: number;
  contributionDensity: number;
  realWageGrowth: number;
  discountRate: number;
  dcNetReturn: number;
  /** Real post-retirement indexation of benefits in payment */
  indexationRate: number;
  lifeTableYear: number;
  maxAgeForWealth: number;
  defaultRetirementAge: Record<Sex, number>;
  /** Remaining years of life at retirement, used when no life table is available */
  lifeExpectancyAtRetirement: Record<Sex, number>;
};

export type PersonProfile = {
  sex: Sex;
  age: number;
  serviceYears: number;
  wage: number;
  wageUnit: WageUnit;
  workerTypeId: string;
  dcBalance?: number;
  notionalBalance?: number;
  contributionYears?: number;
};
