#!/usr/bin/env node
/**
 * tabular-ingest - CLI entry point
 *
 * Usage:
 *   tabular-ingest process ./customers.csv --db main --table customers
 *   tabular-ingest errors <file-id> --db main
 *
 * @module bin
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { runCli } from './cli.js';

// Load .env from multiple candidate locations (first found wins):
// 1. TABULAR_INGEST_ENV_FILE env var (explicit override)
// 2. CWD/.env (project-local)
// 3. Package root/.env (development)
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.TABULAR_INGEST_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

let activeRun: { cancel: () => boolean } | null = null;

function handleShutdown(signal: string): void {
  if (activeRun?.cancel()) {
    console.error(`[Shutdown] Received ${signal}, cancelling run at the next batch boundary`);
    activeRun = null;
    return;
  }
  console.error(`[Shutdown] Received ${signal}, exiting`);
  process.exit(130);
}

process.on('SIGTERM', () => handleShutdown('SIGTERM'));
process.on('SIGINT', () => handleShutdown('SIGINT'));

runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  onOrchestrator: (orchestrator, fileId) => {
    activeRun = { cancel: () => orchestrator.cancel(fileId, 'Cancelled by signal') };
  },
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exitCode = 1;
  });
