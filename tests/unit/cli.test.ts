import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Command } from 'commander';
import { createGenerateCommand, toGeneratorOverrides } from '../../src/cli/commands/generate.js';
import { handleCommandError } from '../../src/cli/output.js';
import { createProgram } from '../../src/cli/program.js';
import { ConfigError, DocumentError } from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logger.js';

describe('CLI', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    logger.setLevel('info');
  });

  describe('names command', () => {
    it('should print canonical and allocated names', async () => {
      await createProgram().exitOverride().parseAsync(['names', 'Name', '_name', 'name'], { from: 'user' });

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
        status: 'success',
        names: [
          { raw: 'Name', canonical: 'Name', name: 'Name', score: 0 },
          { raw: '_name', canonical: 'Name', name: 'UnderscoreName', score: 11 },
          { raw: 'name', canonical: 'Name', name: 'NameLowercase', score: 1 },
        ],
      });
    });

    it('should honour the naming style', async () => {
      await createProgram()
        .exitOverride()
        .parseAsync(['names', '--naming-style', 'camel', 'user_name'], { from: 'user' });

      expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
        status: 'success',
        names: [{ raw: 'user_name', canonical: 'userName', name: 'userName', score: 11 }],
      });
    });

    it('should apply the log level before running the command', async () => {
      await createProgram().exitOverride().parseAsync(['--log-level', 'debug', 'names', 'a'], { from: 'user' });
      expect(logger.getLevel()).toBe('debug');
    });
  });

  describe('toGeneratorOverrides', () => {
    function overridesFor(args: string[]): ReturnType<typeof toGeneratorOverrides> {
      let captured: ReturnType<typeof toGeneratorOverrides> = {};
      const command = createGenerateCommand();
      command.action((_input: string, opts: Parameters<typeof toGeneratorOverrides>[0], self: Command) => {
        captured = toGeneratorOverrides(opts, self);
      });
      command.parse(['input.yaml', ...args], { from: 'user' });
      return captured;
    }

    it('should include only options given on the command line', () => {
      expect(overridesFor([])).toEqual({});
    });

    it('should map flags to generator options', () => {
      expect(
        overridesFor([
          '--namespace',
          'Api.Models',
          '--naming-style',
          'camel',
          '--mutable-arrays',
          '--mutable-maps',
          '--no-default-non-nullable',
          '--no-default-values',
          '--max-depth',
          '8',
        ]),
      ).toEqual({
        namespace: 'Api.Models',
        namingStyle: 'camel',
        immutableArrays: false,
        immutableMaps: false,
        defaultNonNullable: false,
        propagateDefaults: false,
        maxCompositionDepth: 8,
      });
    });
  });

  describe('handleCommandError', () => {
    it('should print the error response and set the exit code', () => {
      handleCommandError(new ConfigError('bad option'), 'generation');

      expect(process.exitCode).toBe(2);
      expect(JSON.parse(String(errorSpy.mock.calls.at(-1)?.[0]))).toEqual({
        status: 'error',
        phase: 'generation',
        error: { code: 'CONFIG_ERROR', message: 'bad option' },
      });
    });

    it('should map document errors and unknown errors to their exit codes', () => {
      handleCommandError(new DocumentError('not a document'), 'generation');
      expect(process.exitCode).toBe(3);

      handleCommandError(new Error('boom'), 'naming');
      expect(process.exitCode).toBe(1);
      expect(JSON.parse(String(errorSpy.mock.calls.at(-1)?.[0]))).toEqual({
        status: 'error',
        phase: 'naming',
        error: { code: 'GENERAL_ERROR', message: 'boom', cause: 'Error: boom' },
      });
    });
  });
});
