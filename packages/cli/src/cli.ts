// ============================================================================
// @ranktok/cli — Encode, decode and count tokens from the shell
// ============================================================================
// Commands:
//   ranktok encode <text>     [--encoding cl100k_base | --model gpt-4o]  → token ids
//   ranktok decode <id> <id>… [--strict]                                 → text
//   ranktok count  <text>                                                → token count
//   ranktok model  <model>                                               → encoding name
//   ranktok encodings                                                    → supported encodings
//
// Common flags:
//   --file <path>              read the text (or the ids) from a file
//   --allow-special <a,b|all>  special tokens to encode as such
//   --json                     machine-readable output
// ============================================================================

import { readFileSync } from 'node:fs';
import {
  type EncodeOptions,
  type Encoding,
  type EncodingRegistry,
  RanktokError,
  encodingNameForModel,
  getDefaultRegistry,
  listEncodingNames,
} from '@ranktok/core';

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliOptions {
  /** Registry to load encodings from; the process-wide one by default. */
  registry?: EncodingRegistry;
}

const VALUE_FLAGS = new Set(['encoding', 'model', 'allow-special', 'file']);

class UsageError extends RanktokError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const USAGE = [
  'Usage: ranktok <command> [options]',
  '',
  'Commands:',
  '  encode <text>       print the token ids of <text>',
  '  decode <id…>        print the text of the token ids',
  '  count <text>        print the number of tokens in <text>',
  '  model <model>       print the encoding a model uses',
  '  encodings           list the supported encodings',
  '',
  'Options:',
  '  --encoding <name>           encoding to use (default: cl100k_base or RANKTOK_DEFAULT_ENCODING)',
  '  --model <model>             pick the encoding a model uses',
  '  --allow-special <a,b|all>   encode these special tokens as special tokens',
  '  --file <path>               read the input from a file',
  '  --strict                    fail on token bytes that are not valid UTF-8',
  '  --json                      print JSON',
];

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Map<string, string | true>;
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--') || arg === '--') {
      positionals.push(arg);
      continue;
    }
    const name = arg.slice(2);
    if (VALUE_FLAGS.has(name)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`--${name} needs a value`);
      }
      flags.set(name, value);
      i++;
    } else {
      flags.set(name, true);
    }
  }

  const [command, ...rest] = positionals;
  return { command, positionals: rest, flags };
}

function getFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function hasFlag(args: ParsedArgs, name: string): boolean {
  return args.flags.has(name);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

function readText(args: ParsedArgs): string {
  const file = getFlag(args, 'file');
  if (file !== undefined) {
    return readFileSync(file, 'utf-8');
  }
  if (args.positionals.length === 0) {
    throw new UsageError('missing input text (pass it as an argument or use --file)');
  }
  return args.positionals.join(' ');
}

function readTokenIds(args: ParsedArgs): number[] {
  const file = getFlag(args, 'file');
  const fields =
    file !== undefined ? readFileSync(file, 'utf-8').split(/[\s,[\]]+/).filter((f) => f.length > 0) : args.positionals;

  if (fields.length === 0) {
    throw new UsageError('missing token ids');
  }
  return fields.map((field) => {
    if (!/^\d+$/.test(field)) {
      throw new UsageError(`invalid token id "${field}"`);
    }
    return Number(field);
  });
}

function encodeOptions(args: ParsedArgs): EncodeOptions {
  const allow = getFlag(args, 'allow-special');
  if (allow === undefined) return {};
  if (allow === 'all') return { allowedSpecial: 'all' };
  return {
    allowedSpecial: allow
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0),
  };
}

async function resolveEncoding(args: ParsedArgs, registry: EncodingRegistry): Promise<Encoding> {
  const model = getFlag(args, 'model');
  if (model !== undefined) {
    return registry.forModel(model);
  }
  return registry.get(getFlag(args, 'encoding') ?? registry.defaultEncoding);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function encodeCommand(args: ParsedArgs, io: CliIO, registry: EncodingRegistry): Promise<void> {
  const enc = await resolveEncoding(args, registry);
  const tokens = enc.encode(readText(args), encodeOptions(args));
  if (hasFlag(args, 'json')) {
    io.stdout(JSON.stringify({ encoding: enc.name, tokens, count: tokens.length }));
  } else {
    io.stdout(tokens.join(' '));
  }
}

async function decodeCommand(args: ParsedArgs, io: CliIO, registry: EncodingRegistry): Promise<void> {
  const enc = await resolveEncoding(args, registry);
  const tokens = readTokenIds(args);
  const text = hasFlag(args, 'strict') ? enc.decode(tokens) : enc.decodeLossy(tokens);
  if (hasFlag(args, 'json')) {
    io.stdout(JSON.stringify({ encoding: enc.name, text }));
  } else {
    io.stdout(text);
  }
}

async function countCommand(args: ParsedArgs, io: CliIO, registry: EncodingRegistry): Promise<void> {
  const enc = await resolveEncoding(args, registry);
  const count = enc.count(readText(args), encodeOptions(args));
  if (hasFlag(args, 'json')) {
    io.stdout(JSON.stringify({ encoding: enc.name, count }));
  } else {
    io.stdout(String(count));
  }
}

function modelCommand(args: ParsedArgs, io: CliIO): void {
  const [model] = args.positionals;
  if (model === undefined) {
    throw new UsageError('missing model name');
  }
  const encoding = encodingNameForModel(model);
  io.stdout(hasFlag(args, 'json') ? JSON.stringify({ model, encoding }) : encoding);
}

function encodingsCommand(args: ParsedArgs, io: CliIO): void {
  const names = listEncodingNames();
  if (hasFlag(args, 'json')) {
    io.stdout(JSON.stringify(names));
    return;
  }
  for (const name of names) io.stdout(name);
}

/**
 * Run one CLI invocation and return its exit code.
 *
 * @param argv - Arguments after the executable, e.g. `['count', 'hello']`
 */
export async function run(argv: readonly string[], io: CliIO, options: CliOptions = {}): Promise<number> {
  try {
    const args = parseArgs(argv);
    const registry = options.registry ?? getDefaultRegistry();

    switch (args.command) {
      case 'encode':
        await encodeCommand(args, io, registry);
        break;
      case 'decode':
        await decodeCommand(args, io, registry);
        break;
      case 'count':
        await countCommand(args, io, registry);
        break;
      case 'model':
        modelCommand(args, io);
        break;
      case 'encodings':
        encodingsCommand(args, io);
        break;
      case undefined:
      case 'help':
        for (const line of USAGE) io.stdout(line);
        break;
      default:
        throw new UsageError(`unknown command "${args.command}"`);
    }
    return 0;
  } catch (error: unknown) {
    io.stderr(`error: ${errorMessage(error)}`);
    return 1;
  }
}
