import { createChildLogger } from '@tenet/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@tenet/shared/src/utils/errors.js';

const log = createChildLogger('llm:client');

const MAX_TRANSIENT_RETRIES = 3;
const BASE_DELAY_MS = 1000;
const DEFAULT_VERTEX_MODEL = 'gemini-2.0-flash';

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: Record<string, unknown>;
  /** Aborting it cancels the request and any transient retry. */
  readonly signal?: AbortSignal;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

/**
 * Mock replies report no conflicts and no connections, so every payload
 * evaluated in mock mode comes back approved.
 */
function createMockResponse(systemPrompt: string): string {
  const prompt = systemPrompt.toLowerCase();

  if (prompt.includes('coherence-checker')) {
    return JSON.stringify({ evaluations: [] });
  }

  if (prompt.includes('connection-proposer')) {
    return JSON.stringify({ connections: [] });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      const content = createMockResponse(request.systemPrompt);

      return Promise.resolve({
        content,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

function readStatusCode(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number): number {
  const exponential = BASE_DELAY_MS * Math.pow(2, attempt);
  const jitter = Math.random() * BASE_DELAY_MS;
  return exponential + jitter;
}

interface VertexSettings {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
}

function readVertexSettings(): VertexSettings {
  const projectId = process.env['GCP_PROJECT_ID'];
  if (!projectId) {
    throw new ConfigurationError(
      'GCP_PROJECT_ID environment variable is required for Vertex AI LLM client',
    );
  }

  return {
    projectId,
    location: process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1',
    model: process.env['VERTEX_AI_MODEL'] ?? DEFAULT_VERTEX_MODEL,
  };
}

async function createVertexClient(): Promise<LlmClient> {
  const settings = readVertexSettings();
  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  const model = new ChatVertexAI({
    model: settings.model,
    location: settings.location,
    temperature: 0,
    authOptions: { projectId: settings.projectId },
    responseMimeType: 'application/json',
  });

  log.info(settings, 'Using Vertex AI LLM client');

  async function invokeOnce(request: LlmRequest): Promise<LlmResponse> {
    const response = await model.invoke(
      [
        ['system', request.systemPrompt],
        ['human', request.userMessage],
      ],
      { signal: request.signal },
    );

    return {
      content:
        typeof response.content === 'string' ? response.content : JSON.stringify(response.content),
      tokenUsage: response.usage_metadata
        ? {
            input: response.usage_metadata.input_tokens,
            output: response.usage_metadata.output_tokens,
          }
        : undefined,
    };
  }

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Vertex AI LLM invocation');

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        request.signal?.throwIfAborted();
        try {
          return await invokeOnce(request);
        } catch (error) {
          if (request.signal?.aborted) {
            throw error;
          }

          lastError = error instanceof Error ? error : new Error(String(error));

          if (!isTransientError(error)) {
            throw new LlmError(`Vertex AI invocation failed: ${lastError.message}`, false, lastError);
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt));
          }
        }
      }

      throw new LlmError(
        `Vertex AI invocation failed after ${String(MAX_TRANSIENT_RETRIES)} attempts: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createLlmClient(): Promise<LlmClient> {
  if (process.env['TENET_MOCK_LLM'] === 'true') {
    return createMockClient();
  }

  return createVertexClient();
}
