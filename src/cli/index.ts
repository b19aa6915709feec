#!/usr/bin/env node
/**
 * TodoList CLI entry point
 */

import { createProgram } from './program.js';

createProgram().parse();
