import type { Command } from 'commander';
import { formatTable } from './util/table.js';
import { CliError, toCliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(
    JSON.stringify(value, (_key, val: unknown) => (typeof val === 'bigint' ? val.toString() : val), 2),
  );
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

/** JSON body printed for a failed command. */
export function errorPayload(error: unknown, debug: boolean): Record<string, unknown> {
  const lifted = toCliError(error);
  const isCliError = lifted instanceof CliError;
  const message = lifted instanceof Error ? lifted.message : String(lifted);
  const payload: Record<string, unknown> = {
    ok: false,
    code: isCliError ? lifted.code : 'INTERNAL_ERROR',
    message,
  };
  if (debug) {
    payload.details = isCliError
      ? lifted.details ?? null
      : lifted instanceof Error
        ? { stack: lifted.stack }
        : { raw: String(lifted) };
  }
  return payload;
}

export function printError(error: unknown, output: OutputOptions): void {
  if (output.json) {
    printJson(errorPayload(error, output.debug));
    return;
  }

  const lifted = toCliError(error);
  console.error(`Error: ${lifted instanceof Error ? lifted.message : String(lifted)}`);
  if (output.debug) {
    if (lifted instanceof CliError && lifted.details !== undefined) {
      console.error('Details:', JSON.stringify(lifted.details, null, 2));
    } else if (lifted instanceof Error && lifted.stack) {
      console.error(lifted.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
