#!/usr/bin/env node
import { run } from './cli/main.js';

run(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
