#!/usr/bin/env node
/**
 * mime-entry CLI: parse and check MIME type strings.
 *
 *   mime-entry 'application/rdf+xml;q=0.9' 'text/*'
 *   mime-entry --json --strict image/png
 */

import { readFileSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { MimeTypeEntry } from './mime-type.js';
import { isValid } from './validate.js';
import type { MimeTypeSummary } from './types.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_USAGE = 2;

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function getVersion(): string {
  const pkgUrl = new URL('../package.json', import.meta.url);
  const pkg = JSON.parse(readFileSync(pkgUrl, 'utf-8')) as { version: string };
  return pkg.version;
}

function formatSummary(input: string, s: MimeTypeSummary): string {
  const flags: string[] = [];
  if (s.anyMajorType) flags.push('any type');
  if (s.anySubtype)   flags.push('any subtype');

  const lines = [
    input,
    `  Name      : ${s.name}`,
    `  Full type : ${s.fullType}`,
    `  Quality   : ${s.quality}`,
  ];
  if (flags.length > 0) lines.push(`  Wildcard  : ${flags.join(', ')}`);
  return lines.join('\n');
}

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
mime-entry <type...> [options]

Parse MIME type strings of the form type/subtype[;q=x.y].

OPTIONS
  --json                      Print one JSON record per type
  --strict                    Also require a valid RFC 2045 type/subtype name
  -q, --quiet                 Only set the exit code
  -h, --help                  Show this help
  -v, --version               Show version

EXIT CODES
  0  every type parsed
  1  at least one type was malformed (or invalid under --strict)
  2  usage error
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

interface CliArgs {
  types: string[];
  json: boolean;
  strict: boolean;
  quiet: boolean;
}

function parseArgs(raw: string[], io: CliIo): CliArgs | undefined {
  const args: CliArgs = { types: [], json: false, strict: false, quiet: false };
  let literal = false;

  for (const a of raw) {
    if (literal) {
      args.types.push(a);
      continue;
    }
    switch (a) {
      case '--json':              args.json = true; break;
      case '--strict':            args.strict = true; break;
      case '-q': case '--quiet':  args.quiet = true; break;
      case '--':                  literal = true; break;
      default:
        if (a.startsWith('-')) {
          io.err(`Unknown option: ${a}`);
          return undefined;
        }
        args.types.push(a);
    }
  }

  return args;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI against `rawArgs` (without the node/script prefix) and return the exit code.
 */
export function runCli(rawArgs: string[], io: CliIo = consoleIo): number {
  // Everything after `--` is a type, never a flag
  const literalAt = rawArgs.indexOf('--');
  const flags = literalAt === -1 ? rawArgs : rawArgs.slice(0, literalAt);

  if (rawArgs.length === 0 || flags.includes('-h') || flags.includes('--help')) {
    io.out(HELP);
    return EXIT_OK;
  }
  if (flags.includes('-v') || flags.includes('--version')) {
    io.out(getVersion());
    return EXIT_OK;
  }

  const a = parseArgs(rawArgs, io);
  if (!a) return EXIT_USAGE;
  if (a.types.length === 0) {
    io.err('Error: No MIME types specified');
    return EXIT_USAGE;
  }

  let exitCode = EXIT_OK;
  for (const input of a.types) {
    let entry: MimeTypeEntry;
    try {
      entry = MimeTypeEntry.parse(input);
    } catch (err) {
      exitCode = EXIT_INVALID;
      if (!a.quiet) io.err(`✗ ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    const summary = entry.toSummary();
    const checkName = !summary.anyMajorType && !summary.anySubtype;
    if (a.strict && checkName && !isValid(summary.fullType)) {
      exitCode = EXIT_INVALID;
      if (!a.quiet) io.err(`✗ Invalid MIME type name: ${summary.fullType}`);
      continue;
    }

    if (a.quiet) continue;
    io.out(a.json ? JSON.stringify({ input, ...summary }) : formatSummary(input, summary));
  }

  return exitCode;
}

// ─── Entry ────────────────────────────────────────────────────────────────────

function isMainModule(): boolean {
  const invokedAs = process.argv[1];
  if (invokedAs === undefined) return false;
  try {
    // npm links bins, while import.meta.url is the resolved file
    return import.meta.url === pathToFileURL(realpathSync(invokedAs)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  process.exitCode = runCli(process.argv.slice(2));
}
