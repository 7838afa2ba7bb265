import type { z } from 'zod';
import type { LlmClient, LlmRequest } from './llm-client.js';
import { createChildLogger } from '@tenet/shared/src/logger.js';
import { AgentError } from '@tenet/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';

const log = createChildLogger('llm:invoke-and-validate');

const DEFAULT_MAX_CORRECTIONS = 1;

export interface InvokeAndValidateOptions<T extends z.ZodTypeAny> {
  readonly llmClient: LlmClient;
  readonly request: LlmRequest;
  readonly schema: T;
  readonly agentName: string;
  /** Extra attempts made with a correction note after an unusable reply. */
  readonly maxRetries?: number;
}

type ReplyCheck<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly issues: string[] };

function checkReply<T extends z.ZodTypeAny>(content: string, schema: T): ReplyCheck<z.infer<T>> {
  let parsed: unknown;
  try {
    parsed = extractJson(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, issues: [`Failed to parse JSON: ${message}`] };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.errors.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`),
    };
  }

  // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment
  return { ok: true, value: result.data };
}

function withCorrection(request: LlmRequest, issues: readonly string[]): LlmRequest {
  return {
    ...request,
    userMessage: `${request.userMessage}\n\n[CORRECTION] Your previous response could not be used. Fix these issues and respond with valid JSON only:\n${issues.map((issue) => `- ${issue}`).join('\n')}`,
  };
}

/**
 * Invokes the model and validates its JSON reply against `schema`. LLM
 * errors propagate untouched; unusable replies are retried with a
 * correction note, then reported as an AgentError.
 */
export async function invokeAndValidate<T extends z.ZodTypeAny>(
  options: InvokeAndValidateOptions<T>,
): Promise<z.infer<T>> {
  const { llmClient, request, schema, agentName, maxRetries = DEFAULT_MAX_CORRECTIONS } = options;

  let issues: string[] = [];

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    request.signal?.throwIfAborted();
    const response = await llmClient.invoke(attempt === 0 ? request : withCorrection(request, issues));
    const check = checkReply(response.content, schema);

    if (check.ok) {
      // eslint-disable-next-line @typescript-eslint/no-unsafe-return
      return check.value;
    }

    issues = check.issues;
    log.warn({ agentName, attempt: attempt + 1, issues }, 'Unusable model reply, retrying with correction');
  }

  throw new AgentError(
    `${agentName} returned invalid output after ${String(maxRetries + 1)} attempts: ${issues.join(', ')}`,
  );
}
