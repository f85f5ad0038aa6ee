/**
 * engine-build CLI tests
 *
 * Commands run against the bundled configuration in its test environment
 * with a fixed GPU; the build command itself is covered by the pipeline
 * integration tests.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { HELP_TEXT, parseArgs, readVersion, runCli, type CliOptions } from '../../../src/cli/commands.js';
import { ConfigurationError } from '../../../src/api/errors.js';
import { arch, makeTempDir, silentLogger, writeEngineDir } from '../../helpers/fixtures.js';

describe('parseArgs', () => {
  it('collects the command and boolean flags', () => {
    expect(parseArgs(['build', '--force', '--push'])).toEqual({
      _: ['build'],
      force: true,
      push: true,
      json: false,
      help: false,
      version: false,
    });
  });

  it('accepts values inline or as the next argument', () => {
    const args = parseArgs(['validate', '--kind=checkpoint', '--dir', 'models/ckpt', '--json']);

    expect(args.kind).toBe('checkpoint');
    expect(args.dir).toBe('models/ckpt');
    expect(args.json).toBe(true);
    expect(args._).toEqual(['validate']);
  });

  it('treats -h as help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });

  it('requires a value for value flags', () => {
    expect(() => parseArgs(['validate', '--dir'])).toThrow('--dir: requires a value');
    expect(() => parseArgs(['validate', '--dir', '--json'])).toThrow(ConfigurationError);
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['build', '--fast'])).toThrow('--fast: unknown option');
  });
});

describe('runCli', () => {
  let testDir: string;
  let out: string[];
  let err: string[];
  let options: CliOptions;

  beforeEach(async () => {
    testDir = await makeTempDir('cli');
    out = [];
    err = [];
    options = {
      env: { NODE_ENV: 'test', MODEL_ID: 'acme/Tiny-Model' },
      cwd: testDir,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      probe: () => arch(89),
      logger: silentLogger,
    };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('prints help', async () => {
    expect(await runCli(['--help'], options)).toBe(0);
    expect(out).toEqual([HELP_TEXT]);
  });

  it('prints the version', async () => {
    expect(await runCli(['--version'], options)).toBe(0);
    expect(out).toEqual([`engine-build v${readVersion()}`]);
  });

  it('fails without a command', async () => {
    expect(await runCli([], options)).toBe(1);
    expect(err).toEqual(['Error: No command specified']);
  });

  it('fails on an unknown command', async () => {
    expect(await runCli(['deploy'], options)).toBe(1);
    expect(err).toEqual(["Error: Unknown command 'deploy'"]);
  });

  it('reports errors with their code', async () => {
    expect(await runCli(['status', '--fast'], options)).toBe(1);
    expect(err).toEqual(['Error [CONFIGURATION]: --fast: unknown option']);
  });

  describe('policy', () => {
    it('prints the policy for the requested mode', async () => {
      expect(await runCli(['policy', '--mode', 'base'], options)).toBe(0);
      expect(out).toContain('Policy:             base → fp8, KV fp8, flashinfer, max 8192 tokens / batch 32');
    });

    it('defaults to the configured precision mode', async () => {
      expect(await runCli(['policy', '--json'], options)).toBe(0);

      const parsed: unknown = JSON.parse(out.join('\n'));
      expect(parsed).toMatchObject({
        architecture: { code: 'sm89', family: 'ada' },
        policy: { precisionMode: 'compact', weightFormat: 'int4_awq', kvCacheDtype: 'int8' },
      });
    });

    it('rejects an unknown mode', async () => {
      expect(await runCli(['policy', '--mode', 'huge'], options)).toBe(1);
      expect(err).toEqual(["Error [CONFIGURATION]: PRECISION_MODE: must be one of compact, base (got 'huge')"]);
    });

    it('notes the conservative policy on an unrecognised GPU', async () => {
      expect(await runCli(['policy'], { ...options, probe: () => arch(null) })).toBe(0);
      expect(out).toContain('Note:               GPU not recognised; using conservative limits');
    });
  });

  describe('status', () => {
    it('reports a first build', async () => {
      expect(await runCli(['status'], options)).toBe(0);

      expect(out).toContain('Record:     none');
      expect(out).toContain('Rebuild:    yes (no-record)');
      expect(out).toContain(`  ${'ENGINE_DIR'.padEnd(22)} models/tiny-model-engine-int4-awq`);
    });

    it('emits JSON', async () => {
      expect(await runCli(['status', '--json'], options)).toBe(0);

      const parsed: unknown = JSON.parse(out.join('\n'));
      expect(parsed).toMatchObject({
        recordPath: path.join(testDir, '.run', 'build_record.env'),
        record: null,
        rebuild: true,
        reason: 'no-record',
      });
    });
  });

  describe('validate', () => {
    const engineDir = (): string => path.join(testDir, 'models', 'tiny-model-engine-int4-awq');

    it('validates the configured engine directory', async () => {
      await writeEngineDir(engineDir());

      expect(await runCli(['validate'], options)).toBe(0);
      expect(out).toEqual([
        `Valid engine: ${engineDir()}`,
        'Primary file:  64.00 B',
        'Compatibility: metadata',
      ]);
    });

    it('fails an engine built for another GPU', async () => {
      await writeEngineDir(engineDir(), { smCode: 'sm90' });

      expect(await runCli(['validate'], options)).toBe(1);
      expect(out).toEqual([
        `Invalid engine: Artifact at ${engineDir()} was built for architecture 'sm90', current architecture is 'sm89'`,
      ]);
    });

    it('emits the error as JSON', async () => {
      expect(await runCli(['validate', '--kind', 'checkpoint', '--dir', 'models/absent', '--json'], options)).toBe(1);

      const parsed: unknown = JSON.parse(out.join('\n'));
      expect(parsed).toMatchObject({
        valid: false,
        error: {
          code: 'ARTIFACT_MISSING',
          message: `Artifact directory not found: ${path.join(testDir, 'models', 'absent')}`,
        },
      });
    });

    it('rejects an unknown artifact kind', async () => {
      expect(await runCli(['validate', '--kind', 'weights'], options)).toBe(1);
      expect(err).toEqual(["Error [CONFIGURATION]: --kind: must be engine or checkpoint (got 'weights')"]);
    });
  });
});
