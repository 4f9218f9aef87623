#!/usr/bin/env node
import { main } from './index';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[ariachat][cli] fatal', error);
    process.exitCode = 1;
  });
