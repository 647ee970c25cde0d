#!/usr/bin/env node
/**
 * instance-metadata executable
 */

import { main } from './cli.js';

process.exitCode = main();
