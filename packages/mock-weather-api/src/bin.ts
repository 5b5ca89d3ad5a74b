#!/usr/bin/env node
import { startServer } from './cli.js';

startServer().catch((error: unknown) => {
  console.error('mock-weather-api failed to start', error);
  process.exitCode = 1;
});
