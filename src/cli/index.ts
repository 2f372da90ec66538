#!/usr/bin/env node
import { createProgram, fail } from './program.js';

createProgram()
    .parseAsync()
    .catch((error: unknown) => fail(error, 'Command failed'));
