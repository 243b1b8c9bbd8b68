#!/usr/bin/env node
import { main } from '../src/cli/index.js';

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
