/**
 * Shared fixtures for tests
 */

import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { MemorySettingsStore } from '../src/config/settings.js';
import { createContext, type AppContext } from '../src/services/context.js';
import type { TimeLedgerConfig } from '../src/types/index.js';

// 2023-11-14T22:13:20Z
export const T0 = 1_700_000_000;

/**
 * Hand-driven wall clock in epoch seconds
 */
export class FakeClock {
  constructor(public current: number = T0) {}

  readonly now = (): number => this.current;

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function makeTempDir(prefix = 'timeledger-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function testConfig(overrides: Partial<TimeLedgerConfig> = {}): TimeLedgerConfig {
  return {
    dataDir: tmpdir(),
    dbPath: ':memory:',
    logLevel: 'error',
    tickIntervalMs: 1000,
    busyTimeoutMs: 0,
    ...overrides,
  };
}

export function createTestContext(
  options: { config?: Partial<TimeLedgerConfig>; clock?: FakeClock; settings?: MemorySettingsStore } = {}
): AppContext {
  const clock = options.clock ?? new FakeClock();
  return createContext(testConfig(options.config), {
    settings: options.settings ?? new MemorySettingsStore(),
    now: clock.now,
  });
}
