#!/usr/bin/env node
import { runCli } from './cli.js';

runCli(process.argv).catch((error: unknown) => {
  console.error('weather-ingest failed', error);
  process.exitCode = 1;
});
