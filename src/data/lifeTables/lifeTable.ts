import { LifeTableProvider } from '../../utils/calculate-pension/types';
import { Sex } from '../parameters/types';
import { LifeTableData } from './types';

/**
 * Serves survivorship and life expectancy from tables held in memory, keyed by country code.
 * Ages outside a table, fractional ages and missing sexes are reported as unavailable.
 */
export class StaticLifeTableProvider implements LifeTableProvider {
  private readonly tables: Map<string, LifeTableData>;

  /**
   * @param tables - One table per country
   */
  constructor(tables: LifeTableData[]) {
    this.tables = new Map(tables.map((table) => [table.code.toUpperCase(), table]));
  }

  get countries(): string[] {
    return [...this.tables.keys()].sort((a, b) => a.localeCompare(b));
  }

  hasCountry(country: string): boolean {
    return this.tables.has(country.toUpperCase());
  }

  private lookup(curve: number[] | undefined, startAge: number, age: number): number | null {
    if (curve === undefined || !Number.isInteger(age)) {
      return null;
    }
    const index = age - startAge;
    if (index < 0 || index >= curve.length) {
      return null;
    }
    return curve[index];
  }

  survivorship(country: string, sex: Sex, age: number): number | null {
    const table = this.tables.get(country.toUpperCase());
    if (!table) {
      return null;
    }
    return this.lookup(table.survivorship?.[sex], table.startAge, age);
  }

  /**
   * Tabulated value when the table carries one, otherwise Σ S(age+t)/S(age) for t >= 1 plus half a year
   */
  remainingLifeExpectancy(country: string, sex: Sex, age: number): number | null {
    const table = this.tables.get(country.toUpperCase());
    if (!table) {
      return null;
    }
    const tabulated = this.lookup(table.lifeExpectancy?.[sex], table.startAge, age);
    if (tabulated !== null) {
      return tabulated;
    }

    const base = this.survivorship(country, sex, age);
    if (base === null || base <= 0) {
      return null;
    }
    let years = 0.5;
    for (let next = age + 1; ; next++) {
      const survivorship = this.survivorship(country, sex, next);
      if (survivorship === null) {
        break;
      }
      years += survivorship / base;
    }
    return years;
  }

  serialize(): LifeTableData[] {
    return [...this.tables.values()];
  }
}
