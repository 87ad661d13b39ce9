#!/usr/bin/env node
import 'dotenv/config';
import { log } from './logger.js';
import { errorMessage } from './errors.js';
import { run } from './cli.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log.error(errorMessage(err));
    process.exitCode = 1;
  });
