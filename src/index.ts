#!/usr/bin/env node
import { main } from './main.js';

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('[main] Fatal error:', error);
    process.exit(1);
  });
