#!/usr/bin/env node

/**
 * Panorama run
 *
 * Evaluates the standard worker for the requested countries and prints the run as JSON.
 *
 * Usage: run-panorama [--sex male|female|total] [--countries CODE,CODE] [--worker-type ID]
 */

import 'dotenv/config';
import { RUN_SEXES, runPanorama } from '../utils/panorama/runner';

type Arguments = {
  sex: (typeof RUN_SEXES)[number];
  countries: string[];
  workerTypeId?: string;
};

const OPTIONS = ['--sex', '--countries', '--worker-type'];

export function parseArguments(argv: string[]): Arguments {
  const args: Arguments = { sex: 'male', countries: [] };
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (!OPTIONS.includes(flag)) {
      throw new Error(`Unknown option ${flag}`);
    }
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}`);
    }
    switch (flag) {
      case '--sex': {
        const sex = RUN_SEXES.find((candidate) => candidate === value.toLowerCase());
        if (sex === undefined) {
          throw new Error(`--sex must be one of: ${RUN_SEXES.join(', ')}`);
        }
        args.sex = sex;
        break;
      }
      case '--countries':
        args.countries = value
          .split(',')
          .map((code) => code.trim().toUpperCase())
          .filter((code) => code !== '');
        break;
      case '--worker-type':
        args.workerTypeId = value;
        break;
    }
    i++;
  }
  return args;
}

function main(): void {
  let args: Arguments;
  try {
    args = parseArguments(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 2;
    return;
  }

  const run = runPanorama(args.countries, { sex: args.sex, workerTypeId: args.workerTypeId });
  console.log(JSON.stringify(run, null, 2));
  if (run.failures.length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
