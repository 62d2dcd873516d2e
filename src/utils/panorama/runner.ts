import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_WORKER_TYPE, EARNINGS_MULTIPLES, GlobalAssumptions, Sex } from '../../data/parameters/types';
import { computePension, standardProfile } from '../calculate-pension/engine';
import { computeWorkIncentive, WorkIncentive } from '../calculate-pension/incentive';
import { LifeTableProvider, PensionResult } from '../calculate-pension/types';
import { loadAssumptions } from '../io/assumptions';
import { listCountryCodes, loadCountryParameters, resolveAverageWage } from '../io/countries';
import { loadLifeTables } from '../io/lifeTables';
import { initProgressBar, incrementProgressBar, showProgressBar, stopProgressBar } from '../log';
import { err, log } from '../logger';

dayjs.extend(utc);

export type RunSex = Sex | 'total';

export const RUN_SEXES: readonly RunSex[] = ['male', 'female', 'total'];

/**
 * The headline indicators for one earnings multiple
 */
export type IndicatorSummary = {
  earningsMultiple: number;
  individualWage: number;
  grossBenefit: number;
  netBenefit: number;
  grossReplacementRate: number;
  netReplacementRate: number;
  grossPensionLevel: number;
  netPensionLevel: number;
  grossPensionWealth: number;
  netPensionWealth: number;
};

const INDICATOR_FIELDS = [
  'individualWage',
  'grossBenefit',
  'netBenefit',
  'grossReplacementRate',
  'netReplacementRate',
  'grossPensionLevel',
  'netPensionLevel',
  'grossPensionWealth',
  'netPensionWealth',
] as const;

export type CountryRun = {
  country: string;
  countryName: string;
  currencyCode: string;
  referenceYear: number;
  sex: RunSex;
  workerTypeId: string;
  averageWage: number;
  /** One entry per earnings multiple; for 'total', the mean of the male and female runs */
  indicators: IndicatorSummary[];
  /** Full results of each underlying run, keyed by sex */
  runs: Partial<Record<Sex, PensionResult[]>>;
  /** Incentive to keep working from 60 to 65, for each underlying run */
  workIncentive: Partial<Record<Sex, WorkIncentive>>;
};

export type CountryRunOptions = {
  sex?: RunSex;
  workerTypeId?: string;
  assumptions?: GlobalAssumptions;
  lifeTables?: LifeTableProvider | null;
};

export type PanoramaFailure = {
  country: string;
  error: string;
};

export type PanoramaRun = {
  runId: string;
  generatedAt: string;
  sex: RunSex;
  results: CountryRun[];
  failures: PanoramaFailure[];
};

export type PanoramaOptions = CountryRunOptions & {
  /** Draw a progress bar; defaults to PROGRESS_BAR */
  progress?: boolean;
};

export class UnknownCountryError extends Error {
  country: string;
  constructor(country: string) {
    super(`Country ${country} not found`);
    this.name = 'UnknownCountryError';
    this.country = country;
  }
}

export function summarize(result: PensionResult): IndicatorSummary {
  return {
    earningsMultiple: result.earningsMultiple,
    individualWage: result.individualWage,
    grossBenefit: result.grossBenefit,
    netBenefit: result.netBenefit,
    grossReplacementRate: result.grossReplacementRate,
    netReplacementRate: result.netReplacementRate,
    grossPensionLevel: result.grossPensionLevel,
    netPensionLevel: result.netPensionLevel,
    grossPensionWealth: result.grossPensionWealth,
    netPensionWealth: result.netPensionWealth,
  };
}

/**
 * Field-by-field mean of two independent runs over the same multiples
 */
export function averageIndicators(first: IndicatorSummary[], second: IndicatorSummary[]): IndicatorSummary[] {
  return first.map((a, index) => {
    const b = second[index];
    const averaged: IndicatorSummary = { ...a };
    for (const field of INDICATOR_FIELDS) {
      averaged[field] = (a[field] + b[field]) / 2;
    }
    return averaged;
  });
}

/**
 * Evaluates the standard full-career worker at every earnings multiple for one country.
 * A 'total' run is the average of separate male and female runs.
 *
 * @throws UnknownCountryError when the country has no parameter file
 * @throws ConfigurationError when its parameters cannot be evaluated
 */
export function runCountry(code: string, options: CountryRunOptions = {}): CountryRun {
  const parameters = loadCountryParameters(code);
  if (parameters === null) {
    throw new UnknownCountryError(code.toUpperCase());
  }

  const sex = options.sex ?? 'male';
  const workerTypeId = options.workerTypeId ?? DEFAULT_WORKER_TYPE;
  const assumptions = options.assumptions ?? loadAssumptions();
  const lifeTables = options.lifeTables === undefined ? loadLifeTables(assumptions.lifeTableYear) : options.lifeTables;
  const averageWage = resolveAverageWage(parameters);

  const runFor = (runSex: Sex) =>
    EARNINGS_MULTIPLES.map((multiple) =>
      computePension(
        {
          parameters,
          profile: standardProfile(assumptions, multiple, runSex, workerTypeId),
          assumptions,
          averageWage,
          lifeTables,
        },
        multiple,
      ),
    );

  const runs: Partial<Record<Sex, PensionResult[]>> = {};
  const workIncentive: Partial<Record<Sex, WorkIncentive>> = {};
  const runSexes: Sex[] = sex === 'total' ? ['male', 'female'] : [sex];
  for (const runSex of runSexes) {
    runs[runSex] = runFor(runSex);
    workIncentive[runSex] = computeWorkIncentive({
      parameters,
      assumptions,
      averageWage,
      lifeTables,
      sex: runSex,
      workerTypeId,
    });
  }

  let indicators: IndicatorSummary[];
  if (sex === 'total') {
    indicators = averageIndicators((runs.male ?? []).map(summarize), (runs.female ?? []).map(summarize));
  } else {
    indicators = (runs[sex] ?? []).map(summarize);
  }

  return {
    country: parameters.code,
    countryName: parameters.metadata.countryName,
    currencyCode: parameters.metadata.currencyCode,
    referenceYear: parameters.metadata.referenceYear,
    sex,
    workerTypeId,
    averageWage,
    indicators,
    runs,
    workIncentive,
  };
}

/**
 * Runs every requested country (all with a parameter file by default). A country that fails is
 * recorded under `failures` and does not stop the run.
 */
export function runPanorama(codes?: string[], options: PanoramaOptions = {}): PanoramaRun {
  const runId = uuidv4();
  const countries = codes && codes.length > 0 ? codes.map((code) => code.toUpperCase()) : listCountryCodes();
  const assumptions = options.assumptions ?? loadAssumptions();
  const lifeTables = options.lifeTables === undefined ? loadLifeTables(assumptions.lifeTableYear) : options.lifeTables;
  const sex = options.sex ?? 'male';
  const progress = options.progress ?? showProgressBar();

  log('Starting panorama run', { runId, countries: countries.length, sex });
  if (progress) {
    initProgressBar(countries.length, runId.slice(0, 8));
  }

  const results: CountryRun[] = [];
  const failures: PanoramaFailure[] = [];
  for (const country of countries) {
    try {
      results.push(runCountry(country, { ...options, sex, assumptions, lifeTables }));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      err('Country run failed', country, { error: message });
      failures.push({ country, error: message });
    }
    if (progress) {
      incrementProgressBar(country);
    }
  }
  if (progress) {
    stopProgressBar();
  }

  log('Finished panorama run', { runId, succeeded: results.length, failed: failures.length });
  return {
    runId,
    generatedAt: dayjs.utc().toISOString(),
    sex,
    results,
    failures,
  };
}
