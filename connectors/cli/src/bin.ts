#!/usr/bin/env -S node --import tsx
// SPDX-License-Identifier: Apache-2.0

import { run } from './cli.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
