#!/usr/bin/env node
/**
 * mediasync CLI entry point
 *
 * Compiled to dist/bin/mediasync.js by TypeScript.
 * Registered as the `mediasync` binary in package.json.
 */

import dotenv from 'dotenv';
import { MediaSyncCLI } from '../cli/cli.js';

dotenv.config();

const cli = new MediaSyncCLI();
cli.run(process.argv).catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
