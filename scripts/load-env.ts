/**
 * Environment for scripts: reads .env.local, then .env, into process.env.
 * Variables already set keep their values. Import this before anything that reads env.
 */

import { config } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const ENV_FILES = ['.env.local', '.env'];

export function loadEnv(cwd: string = process.cwd()): void {
  for (const candidate of ENV_FILES) {
    const path = resolve(cwd, candidate);
    if (existsSync(path)) {
      config({ path, override: false });
    }
  }
}

loadEnv();
