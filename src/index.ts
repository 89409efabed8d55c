#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { main } from './main.js';

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
