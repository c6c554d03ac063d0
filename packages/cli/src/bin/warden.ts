#!/usr/bin/env node
/**
 * bin/warden.ts — entry point for the `warden` CLI command.
 */

import { createProgram } from '../commands/index.js';

createProgram().parse();
