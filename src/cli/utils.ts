/**
 * Shared CLI utilities.
 */

import { loadConfig, toRuntimeConfig, type ExternalConfig } from '../config/loader.js';
import type { RetrievalConfig } from '../config/retrieval-config.js';

/**
 * Value following `--name`, or undefined when the flag is absent.
 */
export function getFlagValue(args: readonly string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index < 0 || index + 1 >= args.length) return undefined;
  return args[index + 1];
}

/** Flags that take a value; their value is not a positional argument. */
const VALUE_FLAGS = new Set(['--kb', '--top-k', '--session', '--config', '--name']);

/**
 * Arguments that are neither flags nor flag values.
 */
export function positionalArgs(args: readonly string[]): string[] {
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }
    positional.push(arg);
  }
  return positional;
}

/**
 * Split a comma-separated list, dropping empty entries.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Parse a positive integer flag value. Returns undefined when absent.
 *
 * @throws Error when present but not a positive integer
 */
export function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Load configuration for a command, honouring `--config <path>`.
 */
export function loadCommandConfig(args: readonly string[], cliOverrides?: ExternalConfig): RetrievalConfig {
  const projectConfigPath = getFlagValue(args, '--config');
  return toRuntimeConfig(loadConfig({ projectConfigPath, cliOverrides }));
}
