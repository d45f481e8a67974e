import chalk from 'chalk';
import {
  ConfigError,
  buildRegistry,
  formatConfigError,
  formatSummary,
  formatTypeSpec,
  lint,
  report
} from '../../src/index.js';
import { loadConfig, type Config, type LoadConfigOptions } from './config.js';
import { errorMessage, log } from './log.js';
import { stripComments } from './message.js';

export interface CliFlags {
  types?: string;
  allowCapsTypes?: boolean;
  dontExitOnErrors?: boolean;
  verbose?: boolean;
  stripComments?: boolean;
}

export interface CheckOptions {
  types?: string;
  ignoreCase: boolean;
  continueOnError: boolean;
  verbose: boolean;
}

export interface Outcome {
  exitCode: number;
  /** Printed to stderr in red */
  errors: string[];
  /** Printed to stderr in yellow */
  warnings: string[];
  /** Printed to stdout */
  output: string[];
}

function failure(errors: string[]): Outcome {
  return { exitCode: 1, errors, warnings: [], output: [] };
}

export function resolveOptions(flags: CliFlags, config: Config): CheckOptions {
  return {
    types: flags.types ?? config.types,
    ignoreCase: Boolean(flags.allowCapsTypes) || config.ignoreCase,
    continueOnError: Boolean(flags.dontExitOnErrors) || config.continueOnError,
    verbose: Boolean(flags.verbose)
  };
}

/**
 * Lints one message. Configuration errors always fail; violations fail unless
 * `continueOnError` is set, in which case they are returned as warnings.
 */
export function runCheck(raw: string, options: CheckOptions): Outcome {
  const registry = buildRegistry(options.types, { ignoreCase: options.ignoreCase });
  if (!registry.ok) {
    return failure([formatConfigError(registry.error)]);
  }

  const { message, result } = lint(raw, registry.value, options.ignoreCase);
  const { lines, success } = report(result, { continueOnError: options.continueOnError });
  const output = options.verbose ? formatSummary(message, result) : [];

  if (success) {
    return { exitCode: 0, errors: [], warnings: lines, output };
  }
  return { exitCode: 1, errors: lines, warnings: [], output };
}

export function runTypes(options: CheckOptions): Outcome {
  const registry = buildRegistry(options.types, { ignoreCase: options.ignoreCase });
  if (!registry.ok) {
    return failure([formatConfigError(registry.error)]);
  }

  const types = registry.value.types();
  return {
    exitCode: 0,
    errors: [],
    warnings: [],
    output: [...types.map((type) => `${type.name}: ${type.required.join(', ')}`), `spec: ${formatTypeSpec(types)}`]
  };
}

function resolve(flags: CliFlags, loadOptions?: LoadConfigOptions): CheckOptions | Outcome {
  try {
    const options = resolveOptions(flags, loadConfig(loadOptions));
    log(`Resolved options: ${JSON.stringify(options)}`);
    return options;
  } catch (error) {
    if (error instanceof ConfigError) {
      return failure([formatConfigError(error)]);
    }
    throw error;
  }
}

function isOutcome(value: CheckOptions | Outcome): value is Outcome {
  return 'exitCode' in value;
}

/**
 * Loads configuration, reads the message through `read` and lints it.
 */
export function runCheckCommand(read: () => string, flags: CliFlags, loadOptions?: LoadConfigOptions): Outcome {
  const options = resolve(flags, loadOptions);
  if (isOutcome(options)) {
    return options;
  }

  let raw: string;
  try {
    raw = read();
  } catch (error) {
    return failure([`[io] ${errorMessage(error)}`]);
  }

  if (flags.stripComments) {
    raw = stripComments(raw);
  }

  return runCheck(raw, options);
}

export function runTypesCommand(flags: CliFlags, loadOptions?: LoadConfigOptions): Outcome {
  const options = resolve(flags, loadOptions);
  return isOutcome(options) ? options : runTypes(options);
}

export function printOutcome(outcome: Outcome): void {
  for (const line of outcome.output) {
    console.log(line);
  }
  for (const line of outcome.warnings) {
    console.error(chalk.yellow(line));
  }
  for (const line of outcome.errors) {
    console.error(chalk.red(line));
  }
}
