import { z } from 'zod';
import type { IOracle, OracleError, OracleRequest } from './index.js';
import { err, ok, type Result } from '../types/result.js';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the JSON object out of a model answer: a fenced block when present,
 * otherwise the span from the first `{` to the last `}`.
 */
export function extractJson(content: string): string | undefined {
  const fenced = FENCED_BLOCK.exec(content);
  const candidate = fenced ? fenced[1] : content;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return undefined;
  }
  return candidate.slice(start, end + 1);
}

export function parseJsonObject(content: string): Result<unknown, OracleError> {
  const json = extractJson(content);
  if (json === undefined) {
    return err({ kind: 'parse', message: 'No JSON object in oracle answer' });
  }
  try {
    return ok(JSON.parse(json));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err({ kind: 'parse', message: `Invalid JSON in oracle answer: ${message}` });
  }
}

export function parseJudgment<S extends z.ZodTypeAny>(
  content: string,
  schema: S
): Result<z.output<S>, OracleError> {
  const parsed = parseJsonObject(content);
  if (!parsed.ok) {
    return parsed;
  }
  const validated = schema.safeParse(parsed.value);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err({ kind: 'schema', message: `Unexpected oracle answer shape: ${issues.join('; ')}` });
  }
  return ok(validated.data);
}

/**
 * Asks the oracle and validates the structured answer in one go.
 */
export async function askForJudgment<S extends z.ZodTypeAny>(
  oracle: IOracle,
  request: OracleRequest,
  schema: S
): Promise<Result<z.output<S>, OracleError>> {
  const answer = await oracle.ask({ ...request, expectJson: true });
  if (!answer.ok) {
    return answer;
  }
  return parseJudgment(answer.value, schema);
}

const BOOLEAN_WORDS: Readonly<Record<string, boolean>> = {
  true: true,
  yes: true,
  false: false,
  no: false,
};

/**
 * Booleans as models actually write them: true, "true", "yes", "no".
 */
export const looseBoolean = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => BOOLEAN_WORDS[value.trim().toLowerCase()])
    .pipe(z.boolean()),
]);

/** Optional text that also accepts numbers and treats null as absent. */
export const looseText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));
