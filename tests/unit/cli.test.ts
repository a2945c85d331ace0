import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { runCli, getVersion, HELP, EXIT_OK, EXIT_INVALID, EXIT_USAGE } from '../../src/cli.js';
import type { CliIo } from '../../src/cli.js';

function capture(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => stdout.push(line),
    err: line => stderr.push(line),
  };
}

describe('CLI', () => {
  it('should show help when no args provided', () => {
    const io = capture();

    expect(runCli([], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([HELP]);
    expect(HELP).toContain('mime-entry <type...> [options]');
  });

  it('should show help with -h', () => {
    const io = capture();

    expect(runCli(['text/plain', '-h'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([HELP]);
  });

  it('should show version with --version', () => {
    const io = capture();

    expect(runCli(['--version'], io)).toBe(EXIT_OK);
    expect(io.stdout[0]).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should describe a parsed type', () => {
    const io = capture();

    expect(runCli(['application/rdf+xml;q=0.9'], io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([
      [
        'application/rdf+xml;q=0.9',
        '  Name      : application/rdf+xml',
        '  Full type : application/rdf+xml',
        '  Quality   : 0.9',
      ].join('\n'),
    ]);
  });

  it('should show wildcards', () => {
    const io = capture();

    runCli(['*/*'], io);

    expect(io.stdout[0]?.split('\n').at(-1)).toBe('  Wildcard  : any type, any subtype');
  });

  it('should print JSON records with --json', () => {
    const io = capture();

    expect(runCli(['--json', 'text/*'], io)).toBe(EXIT_OK);
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual({
      input: 'text/*',
      name: 'text/*',
      fullType: 'text/*',
      majorType: 'text',
      subtype: '*',
      quality: 1,
      anyMajorType: false,
      anySubtype: true,
    });
  });

  it('should report malformed types and keep going', () => {
    const io = capture();

    expect(runCli(['*/plain', 'image/png'], io)).toBe(EXIT_INVALID);
    expect(io.stderr).toEqual([
      '✗ Cannot parse MIME type (expected type/subtype[;q=x.y] format): */plain',
    ]);
    expect(io.stdout).toHaveLength(1);
  });

  it('should check names under --strict', () => {
    const lenient = capture();
    const strict = capture();

    expect(runCli(['a@b/c'], lenient)).toBe(EXIT_OK);
    expect(runCli(['--strict', 'a@b/c'], strict)).toBe(EXIT_INVALID);
    expect(strict.stderr).toEqual(['✗ Invalid MIME type name: a@b/c']);
  });

  it('should print nothing with --quiet', () => {
    const io = capture();

    expect(runCli(['-q', '*/x', 'text/plain'], io)).toBe(EXIT_INVALID);
    expect(io.stdout).toEqual([]);
    expect(io.stderr).toEqual([]);
  });

  it('should reject unknown options', () => {
    const io = capture();

    expect(runCli(['--bogus'], io)).toBe(EXIT_USAGE);
    expect(io.stderr).toEqual(['Unknown option: --bogus']);
  });

  it('should require at least one type', () => {
    const io = capture();

    expect(runCli(['--json'], io)).toBe(EXIT_USAGE);
    expect(io.stderr).toEqual(['Error: No MIME types specified']);
  });

  it('should take arguments after -- literally', () => {
    const io = capture();

    expect(runCli(['--json', '--', '-x/y'], io)).toBe(EXIT_OK);
    expect(JSON.parse(io.stdout[0] ?? '')).toMatchObject({ fullType: '-x/y' });
  });

  it('should not treat -h or -v after -- as flags', () => {
    const help = capture();
    const version = capture();

    expect(runCli(['--', '-h'], help)).toBe(EXIT_INVALID);
    expect(help.stdout).toEqual([]);
    expect(help.stderr).toEqual([
      '✗ Cannot parse MIME type (expected type/subtype[;q=x.y] format): -h',
    ]);

    expect(runCli(['--', '-v/x'], version)).toBe(EXIT_OK);
    expect(version.stdout[0]?.split('\n')[0]).toBe('-v/x');
  });

  it('should read the version from the package manifest', () => {
    const manifest: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf8')
    );
    const io = capture();

    runCli(['-v'], io);

    expect(manifest).toMatchObject({ version: io.stdout[0] });
    expect(getVersion()).toBe(io.stdout[0]);
  });
});
