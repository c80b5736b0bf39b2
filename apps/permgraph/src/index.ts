#!/usr/bin/env tsx
/**
 * permgraph CLI - Entry Point
 */

import { createCli } from './cli';
import { SnapshotError } from './snapshot/snapshot-loader';

const program = createCli();

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : String(err));
  if (err instanceof SnapshotError) {
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
  }
  process.exit(1);
});
