import { describe, it, expect, beforeAll } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { cleanGeneratedCode, normalizeResult, runOrchestrator, type OrchestratorDeps } from '../agent.js';
import { MasterTableStore, type MasterSnapshot } from '../master-table.js';
import { BackendUnavailableError, ConfigurationError, DataUnavailableError } from '../errors.js';
import type { ModelBackend } from '../tools/model-backend.js';

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');
const SOURCES = ['agri.csv', 'rain.csv', 'soil.csv'];

/**
 * Replays canned responses and records every call.
 */
class FakeBackend implements ModelBackend {
  readonly calls: Array<{ system: string; user: string }> = [];

  constructor(private readonly responses: Array<string | Error>) {}

  async generate(systemInstruction: string, userInstruction: string): Promise<string> {
    this.calls.push({ system: systemInstruction, user: userInstruction });
    const next = this.responses.shift();
    if (next === undefined) throw new Error('FakeBackend ran out of responses');
    if (next instanceof Error) throw next;
    return next;
  }
}

let snapshot: MasterSnapshot;

beforeAll(async () => {
  const store = new MasterTableStore({
    crop: join(FIXTURES, 'crop.csv'),
    rainfall: join(FIXTURES, 'rain.csv'),
    soil: join(FIXTURES, 'soil.csv'),
  });
  await store.load();
  snapshot = store.require();
});

function deps(backend: ModelBackend | null, available = true): OrchestratorDeps {
  return {
    backend,
    getSnapshot: () => (available ? snapshot : null),
    sources: SOURCES,
  };
}

describe('cleanGeneratedCode', () => {
  it('strips markdown fences', () => {
    expect(cleanGeneratedCode('```sql\nSELECT 1\n```')).toBe('SELECT 1');
    expect(cleanGeneratedCode('```\nSELECT 2;\n```\n')).toBe('SELECT 2;');
    expect(cleanGeneratedCode('  SELECT 3  ')).toBe('SELECT 3');
  });
});

describe('normalizeResult', () => {
  it('collapses a single cell to a scalar', () => {
    expect(normalizeResult({ success: true, result: [{ result: 42.5 }] })).toBe(42.5);
    expect(normalizeResult({ success: true, result: [{ result: null }] })).toBeNull();
  });

  it('serializes other row sets as JSON records', () => {
    expect(normalizeResult({ success: true, result: [{ a: 1, b: 'x' }] })).toBe('[{"a":1,"b":"x"}]');
    expect(normalizeResult({ success: true, result: [] })).toBe('[]');
  });
});

describe('runOrchestrator', () => {
  it('rejects before any backend call when the API key is unset', async () => {
    await expect(runOrchestrator('How much rice?', deps(null))).rejects.toBeInstanceOf(ConfigurationError);
    await expect(runOrchestrator('How much rice?', deps(null, false))).rejects.toMatchObject({
      code: 'BACKEND_NOT_CONFIGURED',
    });
  });

  it('rejects before any backend call when data is unavailable', async () => {
    const backend = new FakeBackend(['SELECT 1']);

    await expect(runOrchestrator('How much rice?', deps(backend, false))).rejects.toBeInstanceOf(
      DataUnavailableError
    );
    expect(backend.calls).toHaveLength(0);
  });

  it('generates, executes and synthesizes an answer', async () => {
    const question = 'What was the total RICE PRODUCTION in Maharashtra in 2010?';
    const backend = new FakeBackend([
      '```sql\nSELECT SUM("RICE PRODUCTION (1000 tons)") AS result FROM df WHERE LOWER("State") = LOWER(\'maharashtra\') AND "Year" = 2010\n```',
      'Maharashtra produced 200.5 thousand tons of rice in 2010. [Sources: agri.csv, rain.csv, soil.csv]',
    ]);

    const result = await runOrchestrator(question, deps(backend));

    expect(result.answer).toBe(
      'Maharashtra produced 200.5 thousand tons of rice in 2010. [Sources: agri.csv, rain.csv, soil.csv]'
    );
    expect(result.data_result).toBe(200.5);
    expect(result.generated_code).toBe(
      'SELECT SUM("RICE PRODUCTION (1000 tons)") AS result FROM df WHERE LOWER("State") = LOWER(\'maharashtra\') AND "Year" = 2010'
    );
    expect(result.error).toBeNull();
    expect(result.snapshot_version).toBe(1);

    expect(backend.calls).toHaveLength(2);
    expect(backend.calls[0].user).toBe(question);
    expect(backend.calls[0].system).toContain('"Total_Annual_Rainfall_mm"');
    expect(backend.calls[0].system).toContain('named `df`');
    expect(backend.calls[1].system).toContain(`USER_QUESTION: "${question}"`);
    expect(backend.calls[1].system).toContain('DATA_RESULT:\n200.5\n');
    expect(backend.calls[1].system).toContain('"[Sources: agri.csv, rain.csv, soil.csv]"');
  });

  it('returns tabular results as JSON records', async () => {
    const backend = new FakeBackend([
      'SELECT "District", "Total_Annual_Rainfall_mm" FROM df WHERE "Year" = 2010 ORDER BY "District"',
      'Pune received 36 mm; no rainfall record exists for Nashik.',
    ]);

    const result = await runOrchestrator('Rainfall by district in 2010?', deps(backend));

    expect(result.data_result).toBe(
      '[{"District":"Nashik","Total_Annual_Rainfall_mm":null},{"District":"Pune","Total_Annual_Rainfall_mm":36}]'
    );
    expect(result.error).toBeNull();
  });

  it('routes a failing query to the explanation step', async () => {
    const backend = new FakeBackend([
      'SELECT missing_column FROM df',
      'The data has no such field. Try asking about rice or wheat production instead.',
    ]);

    const result = await runOrchestrator('What is the cotton yield?', deps(backend));

    expect(result.error).toBe('no such column: missing_column');
    expect(result.answer).toBe('The data has no such field. Try asking about rice or wheat production instead.');
    expect(result.data_result).toBeNull();
    expect(result.generated_code).toBe('SELECT missing_column FROM df');
    expect(backend.calls[1].system).toContain('FAILED_QUERY:\nSELECT missing_column FROM df\n');
    expect(backend.calls[1].system).toContain('ERROR_MESSAGE: "no such column: missing_column"');
  });

  it('treats a write attempt as an execution error and leaves the table intact', async () => {
    const backend = new FakeBackend([
      'DELETE FROM df',
      'That request would change the data, which is not allowed.',
      'SELECT COUNT(*) AS result FROM df',
      'There are 4 rows.',
    ]);

    const first = await runOrchestrator('Delete everything', deps(backend));
    const second = await runOrchestrator('How many rows?', deps(backend));

    expect(first.error).toBe('Only SELECT queries that return rows are allowed');
    expect(second.data_result).toBe(4);
  });

  it('propagates backend failures', async () => {
    const failure = new BackendUnavailableError(3, new Error('HTTP 503'));
    const backend = new FakeBackend([failure]);

    await expect(runOrchestrator('How much rice?', deps(backend))).rejects.toBe(failure);
  });

  it('propagates a failure of the synthesis call', async () => {
    const failure = new BackendUnavailableError(3, new Error('HTTP 503'));
    const backend = new FakeBackend(['SELECT 1 AS result', failure]);

    await expect(runOrchestrator('One?', deps(backend))).rejects.toBe(failure);
    expect(backend.calls).toHaveLength(2);
  });
});
