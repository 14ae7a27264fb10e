#!/usr/bin/env tsx

import { run } from './index';

const result = await run(process.argv.slice(2), {
  logOutput: (entry) => {
    process.stderr.write(JSON.stringify(entry) + '\n');
  },
});

if (result.stdout) process.stdout.write(result.stdout + '\n');
if (result.stderr) process.stderr.write(result.stderr + '\n');
process.exitCode = result.exitCode;
