/**
 * Main Entry
 *
 * Dedicated entry file that unconditionally runs the CLI; cli.ts stays
 * importable by tests without side effects.
 */

import { run } from './cli';

run(process.argv.slice(2)).then(
  (code) => {
    process.exit(code);
  },
  (err: unknown) => {
    console.error('gpu-coordinator error:', err);
    process.exit(1);
  },
);
