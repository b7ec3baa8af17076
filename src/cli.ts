#!/usr/bin/env node
/**
 * fieldcalc CLI Entry Point
 *
 * Implements main() and parseArgs() for the fieldcalc binary.
 * Results go to stdout, errors and --verbose traces to stderr.
 */

import { loadConfig, createDefaultConfig } from './cli-config.js';
import { parseFieldAssignment, runEval } from './cli-eval.js';
import { loadEntity, runEntity } from './cli-exec.js';
import { explainError, listErrors } from './cli-explain.js';
import {
  createVerboseCallbacks,
  formatError,
  isOutputFormat,
  readVersion,
  type CommandOptions,
  type CommandResult,
  type OutputFormat,
} from './cli-shared.js';
import type { FormulaValue } from './index.js';
import { createRecord } from './records.js';

/** Flags shared by eval and exec; undefined means "use the config file" */
export interface SharedFlags {
  format: OutputFormat | undefined;
  budgetMs: number | undefined;
  verbose: boolean;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'eval';
      formula: string;
      fields: Record<string, FormulaValue>;
      flags: SharedFlags;
    }
  | { mode: 'exec'; file: string; flags: SharedFlags }
  | { mode: 'explain'; errorId: string | undefined }
  | { mode: 'help' | 'version' };

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error for unknown options, missing values or a missing command
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainAt = argv.indexOf('--explain');
  if (explainAt !== -1) {
    return { mode: 'explain', errorId: argv[explainAt + 1] };
  }

  const flags: SharedFlags = { format: undefined, budgetMs: undefined, verbose: false };
  const fields = createRecord<FormulaValue>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--') {
      // Everything after is positional, e.g. a formula starting with '-'
      positional.push(...argv.slice(i + 1));
      break;
    }

    switch (arg) {
      case '--verbose':
        flags.verbose = true;
        break;
      case '--format': {
        const value = takeValue(argv, i, arg);
        if (!isOutputFormat(value)) {
          throw new Error(`Invalid format: ${value} (expected human or json)`);
        }
        flags.format = value;
        i++;
        break;
      }
      case '--budget': {
        const value = Number(takeValue(argv, i, arg));
        if (!Number.isFinite(value) || value <= 0) {
          throw new Error('--budget must be a positive number of milliseconds');
        }
        flags.budgetMs = value;
        i++;
        break;
      }
      case '--field': {
        const [name, value] = parseFieldAssignment(takeValue(argv, i, arg));
        fields[name] = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [command, target, ...extra] = positional;
  if (command === undefined) {
    return { mode: 'help' };
  }
  if (command !== 'eval' && command !== 'exec') {
    throw new Error(`Unknown command: ${command}`);
  }
  if (target === undefined) {
    throw new Error(
      command === 'eval' ? 'Missing formula argument' : 'Missing file argument'
    );
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }

  if (command === 'eval') {
    return { mode: 'eval', formula: target, fields, flags };
  }
  if (Object.keys(fields).length > 0) {
    throw new Error('--field is only valid with eval');
  }
  return { mode: 'exec', file: target, flags };
}

/**
 * Combine the config file in `cwd` with command-line flags; flags win.
 */
export function resolveOptions(
  flags: SharedFlags,
  cwd: string,
  writeTrace: (line: string) => void
): CommandOptions {
  const config = loadConfig(cwd) ?? createDefaultConfig();
  return {
    format: flags.format ?? config.format,
    budgetMs: flags.budgetMs ?? config.budgetMs,
    observability: flags.verbose ? createVerboseCallbacks(writeTrace) : undefined,
  };
}

const HELP = `Usage:
  fieldcalc eval <formula> [--field name=value ...]   Evaluate one formula
  fieldcalc exec <entity.yaml>                        Evaluate an entity file
  fieldcalc --explain [errorId]                       Explain an error id
  fieldcalc --help                                    Show this help message
  fieldcalc --version                                 Show version information

Options:
  --format human|json   Output style (default from .fieldcalc.json, else human)
  --budget <ms>         Per-field evaluation budget
  --verbose             Trace evaluation to stderr

Examples:
  fieldcalc eval 'depth_from + depth_to' --field depth_from=5 --field depth_to=10
  fieldcalc eval 'upper(name)' --field name=core
  fieldcalc exec borehole.yaml --format json
  fieldcalc --explain CALC-R003`;

function emit(result: CommandResult): void {
  if (result.stdout !== '') console.log(result.stdout);
  if (result.stderr !== '') console.error(result.stderr);
  process.exitCode = result.code;
}

/**
 * Entry point for the fieldcalc binary
 *
 * Sets a non-zero exit code on any error or failed field.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));
    const trace = (line: string): void => console.error(line);

    switch (parsed.mode) {
      case 'help':
        console.log(HELP);
        return;

      case 'version':
        console.log(`fieldcalc ${readVersion()}`);
        return;

      case 'explain': {
        if (parsed.errorId === undefined) {
          console.log(listErrors());
          return;
        }
        const doc = explainError(parsed.errorId);
        if (doc === null) {
          console.error(`Unknown error id: ${parsed.errorId}`);
          process.exitCode = 1;
          return;
        }
        console.log(doc);
        return;
      }

      case 'eval': {
        const options = resolveOptions(parsed.flags, process.cwd(), trace);
        emit(runEval(parsed.formula, parsed.fields, options));
        return;
      }

      case 'exec': {
        const options = resolveOptions(parsed.flags, process.cwd(), trace);
        const entity = await loadEntity(parsed.file);
        emit(runEntity(entity, options));
        return;
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
