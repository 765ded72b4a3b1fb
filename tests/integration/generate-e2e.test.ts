/**
 * End-to-end: OpenAPI document on disk → `generate` → JSON report
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { createProgram } from '../../src/cli/program.js';
import type { GenerationReport } from '../../src/lib/reporter/index.js';

const FIXTURE = fileURLToPath(new URL('../fixtures/petstore.yaml', import.meta.url));

async function run(args: string[]): Promise<void> {
  await createProgram().exitOverride().parseAsync(args, { from: 'user' });
}

function lastJson(spy: MockInstance<typeof console.log>): unknown {
  return JSON.parse(String(spy.mock.calls.at(-1)?.[0]));
}

function isReport(value: unknown): value is GenerationReport {
  return typeof value === 'object' && value !== null && 'declarations' in value && 'summary' in value;
}

async function generate(args: string[], spy: MockInstance<typeof console.log>): Promise<GenerationReport> {
  await run(['generate', FIXTURE, ...args]);
  const report = lastJson(spy);
  if (!isReport(report)) {
    throw new Error('generate did not print a report');
  }
  return report;
}

function members(report: GenerationReport, name: string): Array<[string, string]> {
  const declaration = report.declarations.find((candidate) => candidate.name === name);
  if (declaration?.kind !== 'aggregate') {
    throw new Error(`${name} is not an aggregate`);
  }
  return declaration.members.map((member) => [member.name, member.typeName]);
}

describe('generate command', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), 'schemawright-e2e-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should declare every schema and the inline declarations it introduces', async () => {
    const report = await generate(['--namespace', 'TestModels'], logSpy);

    expect(report.declarations.map((declaration) => [declaration.name, declaration.kind])).toEqual([
      ['Pet', 'aggregate'],
      ['Status', 'enumeration'],
      ['Cat', 'aggregate'],
      ['Dog', 'aggregate'],
      ['AnyPet', 'union'],
      ['Order', 'aggregate'],
      ['StatusLowercase', 'enumeration'],
      ['OrderLinesItem', 'aggregate'],
    ]);
    expect(report.summary).toEqual({
      declarations: 8,
      aggregate: 5,
      enumeration: 2,
      union: 1,
      typeAlias: 0,
      diagnostics: 1,
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('should name and type aggregate members', async () => {
    const report = await generate(['--namespace', 'TestModels'], logSpy);

    expect(members(report, 'Pet')).toEqual([
      ['Id', 'long'],
      ['Name', 'string'],
      ['UnderscoreName', 'string?'],
      ['PetType', 'string?'],
      ['Status', 'Status'],
    ]);
    expect(members(report, 'Cat')).toEqual([
      ['Indoor', 'bool'],
      ['Declawed', 'bool?'],
    ]);
    expect(members(report, 'Order')).toEqual([
      ['Status', 'StatusLowercase?'],
      ['ShipDate', 'DateTimeOffset?'],
      ['Lines', 'IReadOnlyList<OrderLinesItem>?'],
      ['Pet', 'AnyPet?'],
      ['Metadata', 'IReadOnlyDictionary<string, string>?'],
    ]);
  });

  it('should render defaults and record inheritance', async () => {
    const report = await generate(['--namespace', 'TestModels'], logSpy);

    const pet = report.declarations.find((declaration) => declaration.name === 'Pet');
    const dog = report.declarations.find((declaration) => declaration.name === 'Dog');
    expect(pet?.kind === 'aggregate' && pet.members[4]?.default).toEqual({
      kind: 'enumMember',
      code: 'TestModels.Status.Available',
    });
    expect(dog?.kind === 'aggregate' && dog.base).toBe('Pet');
    expect(dog?.kind === 'aggregate' && dog.members[0]?.default).toEqual({ kind: 'literal', code: '1' });
  });

  it('should report the union and its unresolved mapping target', async () => {
    const report = await generate([], logSpy);

    expect(report.declarations.find((declaration) => declaration.name === 'AnyPet')).toEqual({
      kind: 'union',
      name: 'AnyPet',
      sourceName: 'AnyPet',
      marker: 'abstract',
      discriminator: 'petType',
      variants: [
        { declaration: 'Cat', discriminatorValue: 'cat' },
        { declaration: 'Dog', discriminatorValue: 'dog' },
      ],
    });
    expect(report.diagnostics).toEqual([
      {
        code: 'UnresolvedDiscriminatorTarget',
        message: 'Discriminator value "fish" of "AnyPet" maps to "Fish", which declares nothing',
        schema: 'AnyPet',
      },
    ]);
  });

  it('should apply generator flags', async () => {
    const report = await generate(['--mutable-arrays', '--no-default-values'], logSpy);

    expect(members(report, 'Order')[2]).toEqual(['Lines', 'List<OrderLinesItem>?']);
    const dog = report.declarations.find((declaration) => declaration.name === 'Dog');
    expect(dog?.kind === 'aggregate' && dog.members[0]?.default).toEqual({ kind: 'placeholder', code: 'null!' });
    expect(report.options.propagateDefaults).toBe(false);
  });

  it('should read options from a config file and write the report to its output', async () => {
    const output = path.join(dir, 'report.json');
    const config = path.join(dir, 'schemawright.yaml');
    await fs.writeFile(config, `generate:\n  namingStyle: camel\n  output: ${JSON.stringify(output)}\n`);

    await run(['generate', FIXTURE, '--config', config]);

    expect(lastJson(logSpy)).toEqual({
      status: 'success',
      phase: 'generation',
      output: { path: output },
      summary: {
        declarations: 8,
        aggregate: 5,
        enumeration: 2,
        union: 1,
        typeAlias: 0,
        diagnostics: 1,
      },
    });

    const written: unknown = JSON.parse(await fs.readFile(output, 'utf-8'));
    if (!isReport(written)) {
      throw new Error('report file is not a report');
    }
    expect(written.options.namingStyle).toBe('camel');
    expect(written.declarations.map((declaration) => declaration.name)).toEqual([
      'pet',
      'status',
      'cat',
      'dog',
      'anyPet',
      'order',
      'statusLowercase',
      'orderLinesItem',
    ]);
  });

  it('should exit with the file error code for a missing document', async () => {
    await run(['generate', path.join(dir, 'missing.yaml')]);

    expect(process.exitCode).toBe(4);
    expect(JSON.parse(String(errorSpy.mock.calls.at(-1)?.[0]))).toMatchObject({
      status: 'error',
      phase: 'generation',
      error: { code: 'FILE_IO_ERROR' },
    });
  });

  it('should exit with the config error code for an invalid config file', async () => {
    const config = path.join(dir, 'invalid.yaml');
    await fs.writeFile(config, 'generate:\n  maxCompositionDepth: 0\n');

    await run(['generate', FIXTURE, '--config', config]);

    expect(process.exitCode).toBe(2);
  });
});
