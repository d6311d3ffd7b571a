#!/usr/bin/env node

import { logger } from '@switchboard/core';
import { runCli } from '../cli.js';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    logger.fatal({ err }, '[cli] Unhandled failure');
    process.exitCode = 1;
  });
