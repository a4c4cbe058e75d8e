/**
 * Query Orchestrator
 * Question -> generated SQL -> execution on a private copy -> synthesized answer
 */

import { ConfigurationError, DataUnavailableError } from './errors.js';
import type { MasterSnapshot, MasterTableState } from './master-table.js';
import type { CellValue } from './pipeline/types.js';
import { renderPrompt } from './prompts.js';
import type { ModelBackend } from './tools/model-backend.js';
import { formatSchemaForPrompt } from './tools/schema-tool.js';
import { executeSQL, type SQLExecutorOutput } from './tools/sql-executor-tool.js';

/** What the user sees of the query result: a scalar, or rows serialized as JSON */
export type DataResult = CellValue;

export interface OrchestratorResult {
  answer: string;
  data_result: DataResult;
  generated_code: string;
  error: string | null;
  snapshot_version: number;
  timings: {
    total_ms: number;
    [key: string]: number;
  };
}

export interface OrchestratorDeps {
  /** null when no API key is configured */
  backend: ModelBackend | null;
  getSnapshot: () => MasterSnapshot | null;
  /** State detail for the data-unavailable error */
  getState?: () => MasterTableState;
  /** Source identifiers for the answer citation */
  sources: string[];
}

/**
 * Strip surrounding markdown code fences (```sql ... ```) from generated text.
 */
export function cleanGeneratedCode(rawCode: string): string {
  let cleaned = rawCode.trim();

  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```[\w-]*[^\S\n]*\n?/, '');
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.substring(0, cleaned.length - 3);
  }
  return cleaned.trim();
}

/**
 * A single-cell result collapses to its value; any other row set becomes a
 * JSON array of row objects.
 */
export function normalizeResult(execution: SQLExecutorOutput): DataResult {
  const rows = execution.result ?? [];
  if (rows.length === 1) {
    const values = Object.values(rows[0]);
    if (values.length === 1) {
      return values[0];
    }
  }
  return JSON.stringify(rows);
}

function formatDataResult(result: DataResult): string {
  return result === null ? 'null' : String(result);
}

function assertPreconditions(deps: OrchestratorDeps): { backend: ModelBackend; snapshot: MasterSnapshot } {
  if (!deps.backend) {
    console.error('ERROR: GEMINI_API_KEY is not set');
    throw new ConfigurationError(
      'Server-side configuration error: the Gemini API key is not set. Add GEMINI_API_KEY to the environment.'
    );
  }

  const snapshot = deps.getSnapshot();
  if (!snapshot) {
    const state = deps.getState?.();
    throw new DataUnavailableError(state?.status === 'unavailable' ? state.reason : undefined);
  }

  return { backend: deps.backend, snapshot };
}

/**
 * Answer one question. Backend failures reject; a failing generated query does
 * not, its error is explained in the answer instead.
 */
export async function runOrchestrator(question: string, deps: OrchestratorDeps): Promise<OrchestratorResult> {
  const startTime = Date.now();
  const timings: OrchestratorResult['timings'] = { total_ms: 0 };

  // Both checks happen before any backend call
  const { backend, snapshot } = assertPreconditions(deps);
  console.log(`\nReceived new question: ${question}`);

  // Step 1: Generate query
  console.log('\n📝 [Step: Generate Query] Asking the model for SQL...');
  let stepStart = Date.now();
  const codeGenInstruction = renderPrompt('code-generation', {
    columns: JSON.stringify(snapshot.columns),
    schema: formatSchemaForPrompt(snapshot.schema),
  });
  const generatedCode = await backend.generate(codeGenInstruction, question);
  timings.generation_ms = Date.now() - stepStart;

  const cleanedCode = cleanGeneratedCode(generatedCode);
  console.log(`--- Generated Query ---\n${cleanedCode}\n-----------------------`);

  // Step 2: Execute on a private copy of the snapshot
  console.log('\n▶️ [Step: Execute] Running query...');
  stepStart = Date.now();
  const execution = executeSQL(cleanedCode, snapshot.image);
  timings.execution_ms = Date.now() - stepStart;

  let dataResult: DataResult = null;
  let execError: string | null = null;
  if (execution.success) {
    dataResult = normalizeResult(execution);
    console.log(`  ✓ Query executed: ${execution.row_count} rows. Result: ${formatDataResult(dataResult).substring(0, 150)}...`);
  } else {
    execError = execution.error ?? 'Unknown execution error';
    console.log('  ✗ Query failed:', execError);
  }

  // Step 3: Synthesize answer, or explain the failure
  stepStart = Date.now();
  let answer: string;
  if (execError !== null) {
    console.log('\n🔧 [Step: Explain Error] Asking the model to explain the failure...');
    const errorInstruction = renderPrompt('error-explanation', {
      question,
      failed_code: cleanedCode,
      error: execError,
    });
    answer = await backend.generate(errorInstruction, question);
  } else {
    console.log('\n💬 [Step: Synthesize Answer] Writing the final answer...');
    const synthesisInstruction = renderPrompt('answer-synthesis', {
      question,
      data_result: formatDataResult(dataResult),
      sources: deps.sources.join(', '),
    });
    answer = await backend.generate(synthesisInstruction, question);
  }
  timings.synthesis_ms = Date.now() - stepStart;
  timings.total_ms = Date.now() - startTime;

  return {
    answer,
    data_result: dataResult,
    generated_code: cleanedCode,
    error: execError,
    snapshot_version: snapshot.version,
    timings,
  };
}
