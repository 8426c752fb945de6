#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import reportCmd from './commands/report.js';
import configCmd from './commands/config.js';

void yargs(hideBin(process.argv))
  .command(reportCmd)
  .command(configCmd)
  .scriptName('capex-report')
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
