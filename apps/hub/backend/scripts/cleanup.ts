#!/usr/bin/env node

/**
 * CLI tool for manual resource cleanup
 */

import 'dotenv/config';
import readline from 'readline/promises';
import { pathToFileURL } from 'url';
import { ResourceHub } from '@ephemera/core';
import { RESOURCE_TYPES, describeStorageError, type DeletionReport, type ResourceType } from '@ephemera/storage';

export type CleanupMode = 'all' | 'expired' | 'by_type' | 'specific';

const CLEANUP_MODES: readonly CleanupMode[] = ['all', 'expired', 'by_type', 'specific'];

export interface CleanupOptions {
  mode: CleanupMode;
  resourceType?: ResourceType;
  resourceUri?: string;
  force: boolean;
}

export type ParsedArgs =
  | { command: 'help' }
  | { command: 'cleanup'; options: CleanupOptions }
  | { command: 'error'; message: string };

/**
 * Console hooks, replaceable in tests
 */
export interface CleanupIO {
  print(line: string): void;
  confirm(question: string): Promise<boolean>;
}

function isMode(value: string): value is CleanupMode {
  return CLEANUP_MODES.some((mode) => mode === value);
}

function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((type) => type === value);
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  let mode: string | undefined;
  let resourceType: string | undefined;
  let resourceUri: string | undefined;
  let force = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { command: 'help' };
      case '--type':
      case '-t':
        mode = args[++i];
        break;
      case '--resource-type':
        resourceType = args[++i];
        break;
      case '--resource-uri':
        resourceUri = args[++i];
        break;
      case '--force':
      case '-f':
        force = true;
        break;
      default:
        return { command: 'error', message: `Unknown argument "${arg}"` };
    }
  }

  if (mode === undefined) {
    return { command: 'error', message: '--type is required' };
  }
  if (!isMode(mode)) {
    return { command: 'error', message: `Invalid --type "${mode}" (expected ${CLEANUP_MODES.join(', ')})` };
  }

  const options: CleanupOptions = { mode, force };

  if (resourceType !== undefined) {
    if (!isResourceType(resourceType)) {
      return {
        command: 'error',
        message: `Invalid --resource-type "${resourceType}" (expected ${RESOURCE_TYPES.join(', ')})`,
      };
    }
    options.resourceType = resourceType;
  }
  if (mode === 'by_type' && !options.resourceType) {
    return { command: 'error', message: "--resource-type is required for 'by_type' cleanup" };
  }

  if (resourceUri !== undefined) {
    options.resourceUri = resourceUri;
  }
  if (mode === 'specific' && !options.resourceUri) {
    return { command: 'error', message: "--resource-uri is required for 'specific' cleanup" };
  }

  return { command: 'cleanup', options };
}

/**
 * Usage information
 */
export const USAGE = `
Usage: npm run cleanup -- --type <mode> [options]

Modes:
  all                 Delete every resource
  expired             Delete resources older than the TTL
  by_type             Delete every resource of one type (needs --resource-type)
  specific            Delete one resource (needs --resource-uri)

Options:
  --resource-type     table, chart, ml or schema
  --resource-uri      URI of the resource to delete
  --force, -f         Skip confirmation prompts

Environment Variables:
  RESOURCE_STORAGE_PATH   Storage directory (default ./data/resources)
  RESOURCE_EXPIRY_HOURS   Time-to-live in hours (default 24)

Examples:
  npm run cleanup -- --type all --force
  npm run cleanup -- --type expired
  npm run cleanup -- --type by_type --resource-type table --force
  npm run cleanup -- --type specific --resource-uri resource://tables/abc123
`;

function showHelp(): void {
  console.log(USAGE);
}

function printReport(io: CleanupIO, report: DeletionReport): void {
  for (const uri of report.deleted) {
    io.print(`  Deleted: ${uri}`);
  }
  for (const failure of report.errors) {
    io.print(`  Failed: ${failure.uri} (${describeStorageError(failure.error)})`);
  }
}

/**
 * Run one cleanup against a hub. Resolves to the process exit code.
 */
export async function runCleanup(hub: ResourceHub, options: CleanupOptions, io: CleanupIO): Promise<number> {
  const loaded = await hub.init();
  if (!loaded.ok) {
    io.print(`Error: ${describeStorageError(loaded.error)}`);
    return 1;
  }

  io.print(`Resource cleanup - mode: ${options.mode}`);
  let exitCode = 0;

  switch (options.mode) {
    case 'all': {
      if (!options.force && !(await io.confirm('This will delete ALL resources. Are you sure? (y/N): '))) {
        io.print('Cleanup cancelled.');
        return 0;
      }
      const report = await hub.deleteAll();
      printReport(io, report);
      io.print(`Deleted ${report.deleted.length} resources.`);
      exitCode = report.errors.length > 0 ? 1 : 0;
      break;
    }

    case 'expired': {
      const report = await hub.sweepExpired();
      printReport(io, report);
      io.print(`Cleaned ${report.deleted.length} expired resources.`);
      exitCode = report.errors.length > 0 ? 1 : 0;
      break;
    }

    case 'by_type': {
      const type = options.resourceType;
      if (!type) {
        io.print("Error: --resource-type is required for 'by_type' cleanup.");
        return 1;
      }
      if (!options.force && !(await io.confirm(`This will delete all '${type}' resources. Are you sure? (y/N): `))) {
        io.print('Cleanup cancelled.');
        return 0;
      }
      const report = await hub.deleteByType(type);
      printReport(io, report);
      io.print(`Deleted ${report.deleted.length} '${type}' resources.`);
      exitCode = report.errors.length > 0 ? 1 : 0;
      break;
    }

    case 'specific': {
      const uri = options.resourceUri;
      if (!uri) {
        io.print("Error: --resource-uri is required for 'specific' cleanup.");
        return 1;
      }
      if (!hub.store.get(uri)) {
        io.print(`Error: Resource '${uri}' not found.`);
        return 1;
      }
      if (!options.force && !(await io.confirm(`This will delete resource '${uri}'. Are you sure? (y/N): `))) {
        io.print('Cleanup cancelled.');
        return 0;
      }
      const result = await hub.delete(uri);
      if (!result.ok) {
        io.print(`Error: ${describeStorageError(result.error)}`);
        return 1;
      }
      io.print(`Deleted: ${uri}`);
      break;
    }
  }

  const remaining = await hub.list();
  io.print(`Remaining resources: ${remaining.length}`);
  for (const resource of remaining) {
    io.print(`  - ${resource.uri} (${resource.name})`);
  }

  return exitCode;
}

/**
 * Console-backed IO with a y/N prompt on stdin
 */
function consoleIO(): CleanupIO {
  return {
    print: (line) => console.log(line),
    confirm: async (question) => {
      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      try {
        const answer = await rl.question(question);
        return answer.trim().toLowerCase() === 'y';
      } finally {
        rl.close();
      }
    },
  };
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.command === 'help') {
    showHelp();
    return;
  }

  if (parsed.command === 'error') {
    console.error(`Error: ${parsed.message}`);
    console.error('Run "npm run cleanup -- --help" for usage information');
    process.exit(1);
  }

  const hub = ResourceHub.fromEnv();
  const exitCode = await runCleanup(hub, parsed.options, consoleIO());
  const flushed = await hub.close();
  if (!flushed.ok) {
    console.error(`Error: ${describeStorageError(flushed.error)}`);
    process.exit(1);
  }
  process.exit(exitCode);
}

// Run the CLI when invoked directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
}
