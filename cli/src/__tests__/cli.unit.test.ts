/**
 * @kqlrun/cli Tests
 *
 * Commands are exercised directly and through the commander program, with
 * FakeBackend in place of the Azure CLI.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { Command, CommanderError } from 'commander';
import { createTestLogger, ErrorCode } from '@kqlrun/core';
import {
  createCapturingStream,
  createTempFolder,
  FakeBackend,
  type CapturingStream,
  type TempFolder,
} from '@kqlrun/test-utils';
import { createProgram, runCommand, validateCommand } from '../index.js';

describe('@kqlrun/cli', () => {
  let root: TempFolder;
  let stdout: CapturingStream;

  beforeEach(async () => {
    root = await createTempFolder({
      'queries/a.kql': 'A',
      'queries/b.kql': 'B',
    });
    stdout = createCapturingStream();
  });

  afterEach(async () => {
    await root.cleanup();
  });

  describe('run command', () => {
    it('should run every query and print the results', async () => {
      const backend = new FakeBackend({ responses: { A: [{ n: 1 }], B: [] } });

      const result = await runCommand({
        folder: 'queries',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: {},
        backend,
        stdout,
        logger: createTestLogger(),
      });

      expect(result.success).toBe(true);
      expect(result.exitCode).toBe(0);
      expect(result.summary?.selected).toEqual(['a.kql', 'b.kql']);
      expect(stdout.text()).toBe('[\n  {\n    "n": 1\n  }\n]\n[]\n');
    });

    it('should fail when the folder does not exist', async () => {
      const backend = new FakeBackend();

      const result = await runCommand({
        folder: 'missing',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: {},
        backend,
        stdout,
        logger: createTestLogger(),
      });

      expect(result.exitCode).toBe(1);
      expect(result.error?.code).toBe(ErrorCode.FOLDER_NOT_FOUND);
      expect(result.error?.message).toBe(`Folder "${root.resolve('missing')}" does not exist`);
      expect(backend.calls).toEqual([]);
    });

    it('should fail on an invalid configuration before any query runs', async () => {
      await root.write('queries/.kql-config.yaml', 'files:\n  include: [a.kql]\n  exclude: [b.kql]\n');
      const backend = new FakeBackend();
      const logger = createTestLogger();

      const result = await runCommand({
        folder: 'queries',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: {},
        backend,
        stdout,
        logger,
      });

      expect(result.exitCode).toBe(1);
      expect(result.error?.code).toBe(ErrorCode.CONFIG_INVALID);
      expect(backend.calls).toEqual([]);
      expect(logger.getMessages('error')).toHaveLength(1);
    });

    it('should fail on settings that do not validate', async () => {
      const result = await runCommand({
        folder: 'queries',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: {},
        flags: { timespan: 'one day' },
        backend: new FakeBackend(),
        stdout,
        logger: createTestLogger(),
      });

      expect(result.exitCode).toBe(1);
      expect(result.error?.code).toBe(ErrorCode.SETTINGS_INVALID);
      expect(result.error?.message).toBe('timespan: Timespan must be an ISO 8601 duration');
    });

    it('should reject unusable environment values', async () => {
      const result = await runCommand({
        folder: 'queries',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: { KQLRUN_CONCURRENCY: 'many' },
        backend: new FakeBackend(),
        stdout,
        logger: createTestLogger(),
      });

      expect(result.exitCode).toBe(1);
      expect(result.error?.message).toBe('Invalid value "many" for KQLRUN_CONCURRENCY; expected a positive integer');
    });

    describe('exit policy', () => {
      const failing = (): FakeBackend => new FakeBackend({ responses: { A: new Error('Throttled') } });

      it('should exit 0 on query failures by default', async () => {
        const result = await runCommand({
          folder: 'queries',
          workspaceId: 'test-workspace',
          cwd: root.path,
          env: {},
          backend: failing(),
          stdout,
          logger: createTestLogger(),
        });

        expect(result.exitCode).toBe(0);
        expect(result.summary?.queries.map(query => query.status)).toEqual(['failed', 'succeeded']);
      });

      it('should exit 1 with the fail policy from flags', async () => {
        const result = await runCommand({
          folder: 'queries',
          workspaceId: 'test-workspace',
          cwd: root.path,
          env: {},
          flags: { onQueryError: 'fail' },
          backend: failing(),
          stdout,
          logger: createTestLogger(),
        });

        expect(result.success).toBe(false);
        expect(result.exitCode).toBe(1);
      });

      it('should take the policy from the document', async () => {
        await root.write('queries/.kql-config.yaml', 'onQueryError: fail\n');

        const result = await runCommand({
          folder: 'queries',
          workspaceId: 'test-workspace',
          cwd: root.path,
          env: {},
          backend: failing(),
          stdout,
          logger: createTestLogger(),
        });

        expect(result.exitCode).toBe(1);
      });

      it('should let the environment override the document', async () => {
        await root.write('queries/.kql-config.yaml', 'onQueryError: fail\n');

        const result = await runCommand({
          folder: 'queries',
          workspaceId: 'test-workspace',
          cwd: root.path,
          env: { KQLRUN_ON_QUERY_ERROR: 'continue' },
          backend: failing(),
          stdout,
          logger: createTestLogger(),
        });

        expect(result.exitCode).toBe(0);
      });
    });

    it('should resolve the output base against the working directory', async () => {
      await root.write(
        'queries/.kql-config.yaml',
        'queries:\n  - file: a.kql\n    output:\n      - format: json\n        file: "{query}.json"\n'
      );
      const backend = new FakeBackend({ responses: { A: [{ n: 1 }] } });

      const result = await runCommand({
        folder: 'queries',
        workspaceId: 'test-workspace',
        cwd: root.path,
        env: {},
        flags: { outputBase: 'reports' },
        backend,
        stdout,
        logger: createTestLogger(),
      });

      expect(result.exitCode).toBe(0);
      expect(backend.queries()).toEqual(['A']);
      expect(await readFile(root.resolve('reports', 'a.json'), 'utf8')).toBe('[\n  {\n    "n": 1\n  }\n]');
    });
  });

  describe('validate command', () => {
    it('should list the files a run would execute', async () => {
      await root.write('queries/.kql-config.yaml', 'files:\n  exclude: [a.kql]\n');

      const result = await validateCommand({
        folder: 'queries',
        cwd: root.path,
        env: {},
        logger: createTestLogger(),
      });

      expect(result).toEqual({
        success: true,
        exitCode: 0,
        configFile: root.resolve('queries', '.kql-config.yaml'),
        dialect: 'canonical',
        files: ['b.kql'],
      });
    });

    it('should succeed with no files selected', async () => {
      await root.write('queries/.kql-config.yaml', 'files:\n  include: [zzz.kql]\n');
      const logger = createTestLogger();

      const result = await validateCommand({ folder: 'queries', cwd: root.path, env: {}, logger });

      expect(result.exitCode).toBe(0);
      expect(result.files).toEqual([]);
      expect(logger.getMessages('warn')).toHaveLength(1);
    });

    it('should report an invalid configuration', async () => {
      await root.write('queries/.kql-config.yaml', 'queries:\n  - file: missing.kql\n');

      const result = await validateCommand({
        folder: 'queries',
        cwd: root.path,
        env: {},
        logger: createTestLogger(),
      });

      expect(result.exitCode).toBe(1);
      expect(result.error?.code).toBe(ErrorCode.CONFIG_INVALID);
    });
  });

  describe('program', () => {
    let stderr: CapturingStream;
    let exitCodes: number[];
    let backend: FakeBackend;

    function program(): ReturnType<typeof createProgram> {
      const base = new Command()
        .exitOverride()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });

      return createProgram(
        {
          cwd: root.path,
          env: {},
          stdout,
          stderr,
          createBackend: () => backend,
          setExitCode: (code) => {
            exitCodes.push(code);
          },
        },
        base
      );
    }

    async function parseError(args: string[]): Promise<CommanderError> {
      try {
        await program().parseAsync(args, { from: 'user' });
      } catch (error) {
        if (error instanceof CommanderError) return error;
        throw error;
      }
      throw new Error('expected a CommanderError');
    }

    beforeEach(() => {
      stderr = createCapturingStream();
      exitCodes = [];
      backend = new FakeBackend({ responses: { A: [{ n: 1 }], B: new Error('Throttled') } });
    });

    it('should print the validation report', async () => {
      await program().parseAsync(['validate', '-f', 'queries'], { from: 'user' });

      expect(stdout.text()).toBe('Configuration: none (defaults)\nDialect: default\nQuery files (2):\n  a.kql\n  b.kql\n');
      expect(exitCodes).toEqual([0]);
      expect(backend.calls).toEqual([]);
    });

    it('should run queries with the workspace from the command line', async () => {
      await program().parseAsync(['run', '-f', 'queries', '-w', 'test-workspace', '--timespan', 'P1D'], {
        from: 'user',
      });

      expect(backend.calls.map(call => call.workspaceId)).toEqual(['test-workspace', 'test-workspace']);
      expect(backend.calls.map(call => call.timespan)).toEqual(['P1D', 'P1D']);
      expect(exitCodes).toEqual([0]);
    });

    it('should exit 1 with --fail-on-error when a query fails', async () => {
      await program().parseAsync(['run', '-f', 'queries', '-w', 'test-workspace', '--fail-on-error'], {
        from: 'user',
      });

      expect(exitCodes).toEqual([1]);
    });

    it('should log errors to stderr in the chosen format', async () => {
      await program().parseAsync(
        ['run', '-f', 'queries', '-w', 'test-workspace', '--log-format', 'json', '-l', 'CRITICAL'],
        { from: 'user' }
      );

      const lines = stderr.text().trim().split('\n');
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '')).toMatchObject({
        level: 'error',
        message: 'Query "b.kql" failed: Throttled',
      });
    });

    it('should reject unknown option values', async () => {
      expect((await parseError(['run', '-f', 'queries', '-w', 'ws', '--color', 'sometimes'])).code).toBe(
        'commander.invalidArgument'
      );
      expect((await parseError(['run', '-f', 'queries', '-w', 'ws', '-l', 'loud'])).code).toBe(
        'commander.invalidArgument'
      );
    });

    it('should require the folder and workspace', async () => {
      expect((await parseError(['run', '-f', 'queries'])).code).toBe('commander.missingMandatoryOptionValue');
      expect(backend.calls).toEqual([]);
    });
  });
});
