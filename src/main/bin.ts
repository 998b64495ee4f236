#!/usr/bin/env node
import { main } from './index';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = 1;
  });
