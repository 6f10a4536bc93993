#!/usr/bin/env node
import { program } from './cli/index.js';
import { exitWithError } from './cli/ui.js';

program.parseAsync(process.argv).catch(exitWithError);
