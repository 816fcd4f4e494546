/**
 * @fileoverview Command-line argument parsing.
 *
 * `--flag value` and `--flag=value` forms; flags declared `multi` may
 * repeat. A value may itself start with `--` unless it names a known
 * flag. Anything malformed is a ValidationError so it reaches the JSON
 * envelope like every other local failure.
 */

import { ValidationError } from '../utils/errors.js';

export type FlagKind = 'string' | 'multi' | 'boolean';

export type FlagSpec = Record<string, FlagKind>;

export interface ParsedArgs {
  values: Map<string, string[]>;
  booleans: Set<string>;
}

/** Flags accepted by every command. */
export const GLOBAL_FLAGS: FlagSpec = {
  verbose: 'boolean',
  help: 'boolean',
};

const SHORT_FLAGS: Record<string, string> = {
  '-h': 'help',
  '-v': 'verbose',
};

function flagName(arg: string): string {
  const eq = arg.indexOf('=');
  return eq === -1 ? arg.slice(2) : arg.slice(2, eq);
}

function isKnownFlag(arg: string, flags: FlagSpec): boolean {
  if (Object.hasOwn(SHORT_FLAGS, arg)) return true;
  return arg.startsWith('--') && Object.hasOwn(flags, flagName(arg));
}

/**
 * Parse argv (without the command name) against a flag spec.
 * @throws ValidationError for unknown flags, stray arguments, missing values, or repeats of single-value flags
 */
export function parseArgs(argv: readonly string[], spec: FlagSpec): ParsedArgs {
  const allFlags: FlagSpec = { ...GLOBAL_FLAGS, ...spec };
  const parsed: ParsedArgs = { values: new Map(), booleans: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (Object.hasOwn(SHORT_FLAGS, arg)) {
      parsed.booleans.add(SHORT_FLAGS[arg]);
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new ValidationError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = flagName(arg);
    if (!Object.hasOwn(allFlags, name)) {
      throw new ValidationError(`Unknown option: --${name}`);
    }
    const kind = allFlags[name];

    if (kind === 'boolean') {
      if (eq !== -1) {
        throw new ValidationError(`Option --${name} does not take a value`);
      }
      parsed.booleans.add(name);
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined || isKnownFlag(next, allFlags)) {
        throw new ValidationError(`Option --${name} requires a value`);
      }
      value = next;
      i++;
    }

    const existing = parsed.values.get(name);
    if (existing && kind !== 'multi') {
      throw new ValidationError(`Option --${name} may only be given once`);
    }
    parsed.values.set(name, [...(existing ?? []), value]);
  }

  return parsed;
}

export function getString(args: ParsedArgs, name: string): string | undefined {
  return args.values.get(name)?.[0];
}

export function getAll(args: ParsedArgs, name: string): string[] {
  return args.values.get(name) ?? [];
}

export function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.booleans.has(name);
}

/**
 * @throws ValidationError if the option is absent
 */
export function requireString(args: ParsedArgs, name: string): string {
  const value = getString(args, name);
  if (value === undefined) {
    throw new ValidationError(`Missing required option --${name}`);
  }
  return value;
}

/**
 * Parse an integer option. Range checks belong to the service.
 * @throws ValidationError if the value is not an integer
 */
export function getInt(args: ParsedArgs, name: string): number | undefined {
  const raw = getString(args, name);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ValidationError(`Option --${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}
