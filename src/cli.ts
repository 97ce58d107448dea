#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { runProgram } from './program';

dotenv.config();

const controller = new AbortController();

// Graceful shutdown: finish the position being evaluated, then stop the engine
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    console.error(`[fenprobe] ${signal} received, shutting down after the current position...`);
    controller.abort();
  });
}

runProgram(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
  signal: controller.signal,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[fenprobe] Fatal:', error);
    process.exitCode = 1;
  },
);
