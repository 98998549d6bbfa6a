#!/usr/bin/env node
import { run } from '../cli/index.js';

run().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
