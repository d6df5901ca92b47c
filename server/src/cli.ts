#!/usr/bin/env node
/**
 * Command line entry point
 *
 * Usage:
 *   statuswatch check                      - Run one check cycle and write status files
 *   statuswatch check --output-dir=DIR     - Write status files to DIR
 *   statuswatch check --no-files --quiet   - Only set the exit code
 *   statuswatch migrate                    - Run pending migrations
 *   statuswatch rollback [id]              - Rollback migrations (optionally to specific id)
 *   statuswatch status                     - Show migration status
 *
 * `check` exits 0 when the application is UP and 1 otherwise.
 */

import dotenv from 'dotenv';
import { loadConfig } from './config';
import { openDatabase, closeDatabase, runMigrations, rollbackMigration, getMigrationStatus } from './db';
import { IServiceStateProvider, ServiceChecker, SystemctlStateProvider } from './services/checker';
import { StatusFileWriter } from './services/export/StatusFileWriter';
import { StatusQueryService } from './services/status/StatusQueryService';
import type { CheckCycleResult } from './services/status/types';
import { StoreRegistry } from './stores';

const COMMANDS = ['check', 'migrate', 'rollback', 'status'] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(command => command === value);
}

export interface CliOptions {
  env?: Record<string, string | undefined>;
  print?: (line: string) => void;
  /** Replaces systemctl, mainly for tests */
  stateProvider?: IServiceStateProvider;
}

interface CommandContext {
  flags: Record<string, string>;
  positional: string[];
  env: Record<string, string | undefined>;
  print: (line: string) => void;
  stateProvider?: IServiceStateProvider;
}

// Parse --key=value arguments; a bare --flag is "true"
export function parseArgs(args: readonly string[]): { flags: Record<string, string>; positional: string[] } {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (const arg of args) {
    if (arg.startsWith('--')) {
      const separator = arg.indexOf('=');
      if (separator === -1) {
        flags[arg.slice(2)] = 'true';
      } else {
        flags[arg.slice(2, separator)] = arg.slice(separator + 1);
      }
    } else {
      positional.push(arg);
    }
  }

  return { flags, positional };
}

export function usage(): string {
  return `
statuswatch

Commands:
  check [--output-dir=DIR] [--no-files] [--quiet]
                       Run one check cycle, write status files, print a summary.
                       Exits 0 when the application is UP, 1 otherwise.
  migrate              Run pending migrations
  rollback [id]        Rollback migrations (optionally to specific id)
  status               Show migration status
  `;
}

/**
 * Human-readable report of one check cycle
 */
export function formatCycleReport(result: CheckCycleResult): string[] {
  const width = Math.max(0, ...result.dependencies.map(record => record.service_name.length));

  return [
    `${result.application.service_name}: ${result.application.status}`,
    ...result.dependencies.map(record => `  ${record.service_name.padEnd(width)}  ${record.status}`),
  ];
}

async function runCheck(context: CommandContext): Promise<number> {
  const config = loadConfig(context.env);
  const db = openDatabase(config.databasePath);

  try {
    const stores = StoreRegistry.create(db);
    const checker = new ServiceChecker(context.stateProvider ?? new SystemctlStateProvider(), {
      timeoutMs: config.probeTimeoutMs,
    });
    const statusService = new StatusQueryService(config, stores.statusRecords, checker);

    const result = await statusService.runCheckCycle({
      signal: AbortSignal.timeout(config.cycleTimeoutMs),
    });

    const quiet = context.flags.quiet === 'true';
    if (!quiet) {
      formatCycleReport(result).forEach(line => context.print(line));
    }

    if (context.flags['no-files'] !== 'true') {
      const outputDir = context.flags['output-dir'] || config.statusFileDir;
      const written = new StatusFileWriter(outputDir).writeAll([...result.dependencies, result.application]);
      if (!quiet) {
        context.print(`Status files written: ${written.length} (${outputDir})`);
      }
    }

    return result.application.status === 'UP' ? 0 : 1;
  } finally {
    closeDatabase(db);
  }
}

function runMigrationCommand(command: Exclude<Command, 'check'>, context: CommandContext): number {
  const config = loadConfig(context.env);
  const db = openDatabase(config.databasePath, { migrate: false });

  try {
    switch (command) {
      case 'migrate': {
        const applied = runMigrations(db);
        context.print(applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Nothing to migrate');
        break;
      }

      case 'rollback': {
        const rolledBack = rollbackMigration(db, context.positional[0]);
        context.print(rolledBack.length > 0 ? `Rolled back: ${rolledBack.join(', ')}` : 'Nothing to roll back');
        break;
      }

      case 'status': {
        context.print('Migration Status:');
        context.print('─'.repeat(50));
        for (const m of getMigrationStatus(db)) {
          const icon = m.applied ? '✓' : '○';
          context.print(`  ${icon} ${m.id}: ${m.name}`);
        }
        break;
      }
    }
    return 0;
  } finally {
    closeDatabase(db);
  }
}

/**
 * Run one CLI invocation.
 * @param argv arguments after the executable and script name
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const [command, ...rest] = argv;
  const print = options.print ?? ((line: string) => console.log(line));

  if (!isCommand(command)) {
    print(usage());
    return 1;
  }

  const { flags, positional } = parseArgs(rest);
  const context: CommandContext = {
    flags,
    positional,
    env: options.env ?? process.env,
    print,
    stateProvider: options.stateProvider,
  };

  if (command === 'check') {
    return runCheck(context);
  }
  return runMigrationCommand(command, context);
}

if (require.main === module) {
  dotenv.config();

  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('Error:', err instanceof Error ? err.message : err);
      process.exitCode = 1;
    });
}
