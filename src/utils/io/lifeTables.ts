import { StaticLifeTableProvider } from '../../data/lifeTables/lifeTable';
import { LifeTableData } from '../../data/lifeTables/types';
import { Sex } from '../../data/parameters/types';
import { FieldReader, isObject, JsonObject, ParseResult } from '../../data/parameters/validation';
import { warn } from '../logger';
import { listJsonFiles, load } from './io';

export const LIFE_TABLES_DIR = 'lifeTables';

const SEXES: readonly Sex[] = ['male', 'female'];

function readCurves(
  reader: FieldReader,
  source: JsonObject | undefined,
  path: string,
): Partial<Record<Sex, number[]>> | undefined {
  if (source === undefined) {
    return undefined;
  }
  const curves: Partial<Record<Sex, number[]>> = {};
  for (const sex of SEXES) {
    const values = reader.array(source, sex, path);
    if (values === undefined) {
      continue;
    }
    const curve = values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
    if (curve.length !== values.length) {
      reader.errors.push(`${path}.${sex} must contain only numbers`);
      continue;
    }
    curves[sex] = curve;
  }
  return curves;
}

/**
 * Validates one life-table file
 */
export function parseLifeTable(raw: unknown, name: string): ParseResult<LifeTableData> {
  if (!isObject(raw)) {
    return { value: null, errors: [`${name} must be an object`] };
  }
  const reader = new FieldReader();
  const table: LifeTableData = {
    code: (reader.string(raw, 'code', name) ?? name).toUpperCase(),
    year: reader.requiredNumber(raw, 'year', name) ?? 0,
    startAge: reader.requiredNumber(raw, 'startAge', name) ?? 0,
  };
  const source = reader.string(raw, 'source', name);
  if (source !== undefined) {
    table.source = source;
  }
  const survivorship = readCurves(reader, reader.object(raw, 'survivorship', name), `${name}.survivorship`);
  if (survivorship !== undefined) {
    table.survivorship = survivorship;
  }
  const lifeExpectancy = readCurves(reader, reader.object(raw, 'lifeExpectancy', name), `${name}.lifeExpectancy`);
  if (lifeExpectancy !== undefined) {
    table.lifeExpectancy = lifeExpectancy;
  }
  if (!Number.isInteger(table.startAge)) {
    reader.errors.push(`${name}.startAge must be a whole age`);
  }
  if (reader.errors.length > 0) {
    return { value: null, errors: reader.errors };
  }
  return { value: table, errors: [] };
}

/**
 * Reads every table of the requested vintage under the life-table directory. Invalid files and
 * tables for another year are skipped with a warning, so their countries fall back to the
 * closed-form annuity.
 *
 * @param lifeTableYear - Year the tables must describe (the `lifeTableYear` assumption)
 */
export function loadLifeTables(lifeTableYear: number): StaticLifeTableProvider {
  const tables: LifeTableData[] = [];
  for (const name of listJsonFiles(LIFE_TABLES_DIR)) {
    const result = parseLifeTable(load(`${LIFE_TABLES_DIR}/${name}.json`), name);
    if (result.value === null) {
      warn('Skipping invalid life table', name, { errors: result.errors });
      continue;
    }
    if (result.value.year !== lifeTableYear) {
      warn('Skipping life table for another year', name, { year: result.value.year, expected: lifeTableYear });
      continue;
    }
    tables.push(result.value);
  }
  return new StaticLifeTableProvider(tables);
}
