#!/usr/bin/env node

import * as dotenv from 'dotenv';
import * as path from 'path';
import { hideBin } from 'yargs/helpers';

import { runCli } from './cli';
import { printErrorAndExit } from './utils/utils';

const envFiles = [
  '.env.local',
  `.env.${process.env.NODE_ENV}`,
  '.env'
];

envFiles.forEach(file => {
  const envPath = path.resolve(process.cwd(), file);
  dotenv.config({ path: envPath });
});

runCli(hideBin(process.argv)).catch((error) => {
  printErrorAndExit(error instanceof Error ? error.message : `${error}`, 1);
});
