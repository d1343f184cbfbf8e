import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ResourceHub } from '@ephemera/core';
import type { Result, StorageError } from '@ephemera/storage';
import { USAGE, parseArgs, runCleanup, type CleanupIO } from '../scripts/cleanup.js';

const T0 = Date.parse('2024-03-01T00:00:00.000Z');
const HOUR = 3_600_000;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

function unwrap(result: Result<string, StorageError>): string {
  if (!result.ok) throw new Error(`store failed: ${result.error.type}`);
  return result.value;
}

describe('parseArgs', () => {
  it('parses each mode', () => {
    expect(parseArgs(['--type', 'all', '--force'])).toEqual({
      command: 'cleanup',
      options: { mode: 'all', force: true },
    });
    expect(parseArgs(['-t', 'by_type', '--resource-type', 'chart'])).toEqual({
      command: 'cleanup',
      options: { mode: 'by_type', resourceType: 'chart', force: false },
    });
    expect(parseArgs(['--type', 'specific', '--resource-uri', 'resource://charts/abc', '-f'])).toEqual({
      command: 'cleanup',
      options: { mode: 'specific', resourceUri: 'resource://charts/abc', force: true },
    });
  });

  it('recognises help', () => {
    expect(parseArgs(['--type', 'all', '-h'])).toEqual({ command: 'help' });
  });

  it('shows usage through the npm script', () => {
    const lines = USAGE.split('\n');
    expect(lines[1]).toBe('Usage: npm run cleanup -- --type <mode> [options]');
    expect(lines.filter((line) => line.startsWith('  npm run cleanup -- --type '))).toHaveLength(4);
  });

  it('reports argument errors', () => {
    expect(parseArgs([])).toEqual({ command: 'error', message: '--type is required' });
    expect(parseArgs(['--verbose'])).toEqual({ command: 'error', message: 'Unknown argument "--verbose"' });
    expect(parseArgs(['--type', 'some'])).toEqual({
      command: 'error',
      message: 'Invalid --type "some" (expected all, expired, by_type, specific)',
    });
    expect(parseArgs(['--type', 'by_type'])).toEqual({
      command: 'error',
      message: "--resource-type is required for 'by_type' cleanup",
    });
    expect(parseArgs(['--type', 'by_type', '--resource-type', 'video'])).toEqual({
      command: 'error',
      message: 'Invalid --resource-type "video" (expected table, chart, ml, schema)',
    });
    expect(parseArgs(['--type', 'specific'])).toEqual({
      command: 'error',
      message: "--resource-uri is required for 'specific' cleanup",
    });
  });
});

describe('runCleanup', () => {
  let dir: string;
  let hub: ResourceHub;
  let now: number;
  let lines: string[];
  let confirm: Mock<(question: string) => Promise<boolean>>;
  let io: CleanupIO;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hub-cleanup-test-'));
    now = T0;
    hub = new ResourceHub({ storagePath: dir, logger: mockLogger, clock: () => new Date(now) });
    lines = [];
    confirm = vi.fn<(question: string) => Promise<boolean>>(async () => true);
    io = {
      print: (line: string) => {
        lines.push(line);
      },
      confirm,
    };
  });

  afterEach(async () => {
    await hub.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('deletes everything without asking when forced', async () => {
    const chart = unwrap(await hub.storeChart({}, 'bar'));

    const code = await runCleanup(hub, { mode: 'all', force: true }, io);

    expect(code).toBe(0);
    expect(confirm).not.toHaveBeenCalled();
    expect(lines).toEqual([
      'Resource cleanup - mode: all',
      `  Deleted: ${chart}`,
      'Deleted 1 resources.',
      'Remaining resources: 0',
    ]);
  });

  it('keeps everything when the prompt is declined', async () => {
    unwrap(await hub.storeChart({}, 'bar'));
    confirm.mockResolvedValue(false);

    const code = await runCleanup(hub, { mode: 'all', force: false }, io);

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledWith('This will delete ALL resources. Are you sure? (y/N): ');
    expect(lines).toEqual(['Resource cleanup - mode: all', 'Cleanup cancelled.']);
    expect(hub.store.size).toBe(1);
  });

  it('sweeps only expired resources', async () => {
    const old = unwrap(await hub.storeChart({}, 'bar'));
    now = T0 + 23 * HOUR;
    const fresh = unwrap(await hub.storeMl({}, 'regression'));
    now = T0 + 25 * HOUR;

    const code = await runCleanup(hub, { mode: 'expired', force: false }, io);

    expect(code).toBe(0);
    expect(lines).toEqual([
      'Resource cleanup - mode: expired',
      `  Deleted: ${old}`,
      'Cleaned 1 expired resources.',
      'Remaining resources: 1',
      `  - ${fresh} (Regression Model Results)`,
    ]);
  });

  it('deletes one type after confirmation', async () => {
    const chart = unwrap(await hub.storeChart({}, 'line'));
    const ml = unwrap(await hub.storeMl({}, 'forecast'));

    const code = await runCleanup(hub, { mode: 'by_type', resourceType: 'chart', force: false }, io);

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledWith("This will delete all 'chart' resources. Are you sure? (y/N): ");
    expect(lines).toEqual([
      'Resource cleanup - mode: by_type',
      `  Deleted: ${chart}`,
      "Deleted 1 'chart' resources.",
      'Remaining resources: 1',
      `  - ${ml} (Forecast Model Results)`,
    ]);
  });

  it('deletes a specific resource', async () => {
    const chart = unwrap(await hub.storeChart({}, 'pie'));

    const code = await runCleanup(hub, { mode: 'specific', resourceUri: chart, force: true }, io);

    expect(code).toBe(0);
    expect(lines).toEqual(['Resource cleanup - mode: specific', `Deleted: ${chart}`, 'Remaining resources: 0']);
  });

  it('fails on an unknown specific resource', async () => {
    const code = await runCleanup(
      hub,
      { mode: 'specific', resourceUri: 'resource://charts/missing', force: true },
      io
    );

    expect(code).toBe(1);
    expect(lines).toEqual([
      'Resource cleanup - mode: specific',
      "Error: Resource 'resource://charts/missing' not found.",
    ]);
  });
});
