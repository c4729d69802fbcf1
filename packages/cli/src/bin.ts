#!/usr/bin/env -S node --import tsx
// flatlog command-line entry point

import { run } from './program.js';

process.exitCode = await run(process.argv.slice(2));
