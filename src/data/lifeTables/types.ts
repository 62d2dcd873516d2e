import { Sex } from '../parameters/types';

export type LifeTableData = {
  /** Country code the table belongs to */
  code: string;
  /** Period the mortality rates describe */
  year: number;
  source?: string;
  /** Age of the first entry in every curve */
  startAge: number;
  /** lx / l0 for consecutive ages from `startAge` */
  survivorship?: Partial<Record<Sex, number[]>>;
  /** Tabulated remaining life expectancy for consecutive ages from `startAge` */
  lifeExpectancy?: Partial<Record<Sex, number[]>>;
};
