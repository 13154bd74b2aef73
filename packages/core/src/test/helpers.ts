/**
 * Test helpers for store tests
 *
 * Every store lives in its own temp directory with a manual clock and
 * sequential record ids, so timestamps and ids can be asserted exactly.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type Logger } from '@stockbook/observability';
import { Stockbook } from '../stockbook.js';

export interface TestClock {
  clock: () => Date;
  /** Move the clock forward, one second by default */
  advance(seconds?: number): void;
  set(date: Date): void;
}

export function createTestClock(start = new Date(2026, 0, 11, 9, 0, 0)): TestClock {
  let current = start.getTime();
  return {
    clock: () => new Date(current),
    advance(seconds = 1) {
      current += seconds * 1000;
    },
    set(date) {
      current = date.getTime();
    },
  };
}

export function sequentialIds(): (prefix: string) => string {
  const counters = new Map<string, number>();
  return (prefix) => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}_${String(next).padStart(4, '0')}`;
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

export interface TestWorkspace {
  dir: string;
  path: string;
  cleanup(): void;
}

export function createWorkspace(): TestWorkspace {
  const dir = mkdtempSync(join(tmpdir(), 'stockbook-'));
  return {
    dir,
    path: join(dir, 'stockbook.json'),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export interface TestBook {
  book: Stockbook;
  time: TestClock;
  workspace: TestWorkspace;
  /** Open a second handle on the same snapshot file */
  reopen(): Stockbook;
}

export function openTestBook(): TestBook {
  const workspace = createWorkspace();
  const time = createTestClock();
  const options = { clock: time.clock, newId: sequentialIds(), logger: silentLogger };
  const book = Stockbook.open(workspace.path, options);

  return {
    book,
    time,
    workspace,
    reopen: () => Stockbook.open(workspace.path, { clock: time.clock, logger: silentLogger }),
  };
}
