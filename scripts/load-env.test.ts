import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnv } from './load-env';

const KEYS = ['PORTFOLIO_TEST_SOURCE', 'PORTFOLIO_TEST_BASE_ONLY'];

describe('loadEnv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'load-env-'));
    for (const key of KEYS) delete process.env[key];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    for (const key of KEYS) delete process.env[key];
  });

  it('prefers .env.local over .env', () => {
    writeFileSync(join(dir, '.env.local'), 'PORTFOLIO_TEST_SOURCE=local\n');
    writeFileSync(
      join(dir, '.env'),
      'PORTFOLIO_TEST_SOURCE=base\nPORTFOLIO_TEST_BASE_ONLY=base\n'
    );

    loadEnv(dir);

    expect(process.env.PORTFOLIO_TEST_SOURCE).toBe('local');
    expect(process.env.PORTFOLIO_TEST_BASE_ONLY).toBe('base');
  });

  it('does not override values already set', () => {
    process.env.PORTFOLIO_TEST_SOURCE = 'shell';
    writeFileSync(join(dir, '.env'), 'PORTFOLIO_TEST_SOURCE=base\n');

    loadEnv(dir);

    expect(process.env.PORTFOLIO_TEST_SOURCE).toBe('shell');
  });

  it('ignores missing files', () => {
    loadEnv(dir);
    expect(process.env.PORTFOLIO_TEST_SOURCE).toBeUndefined();
  });
});
