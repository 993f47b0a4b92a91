#!/usr/bin/env node

import dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';

import { runCli } from './cli/runCli';
import { toErrorMessage } from './lib/errors';

dotenv.config();

void runCli(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(toErrorMessage(error));
    process.exit(1);
  });
