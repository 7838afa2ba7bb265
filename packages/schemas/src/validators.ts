import type { ZodError } from 'zod';
import { z } from 'zod';
import type { Payload } from '@tenet/shared/src/types/evaluation.types.js';
import { SchemaValidationError } from '@tenet/shared/src/utils/errors.js';
import { EvaluationConfigSchema } from './evaluation-config.schema.js';
import type { EvaluationConfig } from './evaluation-config.schema.js';
import { PayloadSchema } from './rule.schema.js';

const PayloadListSchema = z.array(PayloadSchema);

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateEvaluationConfig(data: unknown): EvaluationConfig {
  const result = EvaluationConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid evaluation configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validatePayloads(data: unknown): readonly Payload[] {
  const result = PayloadListSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid payloads', formatZodErrors(result.error));
  }

  return result.data;
}
