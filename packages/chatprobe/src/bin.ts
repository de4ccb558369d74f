#!/usr/bin/env tsx
import { config } from 'dotenv';

import { main } from './cli/main';

config();

main(process.argv.slice(2), { env: process.env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
