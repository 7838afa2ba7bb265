import { z } from 'zod';
import { InvoiceSchema } from '@tenet/schemas/src/invoice.schema.js';
import {
  GuidelineContentSchema,
  StyleGuideContentSchema,
} from '@tenet/schemas/src/rule.schema.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    runningTasks: z.number().int(),
  })
  .openapi('HealthResponse');

// Evaluations
export const EvaluationResponseSchema = z
  .object({
    id: z.string(),
    ownerId: z.string(),
    createdAt: z.string(),
    status: z.enum(['pending', 'running', 'completed', 'failed']),
    error: z.string().nullable(),
    invoices: z.array(InvoiceSchema),
    progress: z.number(),
  })
  .openapi('Evaluation');

export type EvaluationResponse = z.infer<typeof EvaluationResponseSchema>;

// Rule sets
export const GuidelineResponseSchema = z
  .object({
    id: z.string(),
    ownerId: z.string(),
    content: GuidelineContentSchema,
    createdAt: z.string(),
  })
  .openapi('Guideline');

export type GuidelineResponse = z.infer<typeof GuidelineResponseSchema>;

export const StyleGuideResponseSchema = z
  .object({
    id: z.string(),
    ownerId: z.string(),
    content: StyleGuideContentSchema,
    createdAt: z.string(),
  })
  .openapi('StyleGuide');

export type StyleGuideResponse = z.infer<typeof StyleGuideResponseSchema>;

export const GuidelineConnectionResponseSchema = z
  .object({
    id: z.string(),
    source: z.string(),
    target: z.string(),
    kind: z.enum(['entails', 'suggests']),
    createdAt: z.string(),
  })
  .openapi('GuidelineConnection');

export type GuidelineConnectionResponse = z.infer<typeof GuidelineConnectionResponseSchema>;

export const GuidelineCommitResponseSchema = z
  .object({
    guidelines: z.array(GuidelineResponseSchema),
    connections: z.array(GuidelineConnectionResponseSchema),
  })
  .openapi('GuidelineCommitResponse');

export const GuidelineListResponseSchema = z
  .object({
    guidelines: z.array(GuidelineResponseSchema),
  })
  .openapi('GuidelineList');

export const StyleGuideListResponseSchema = z
  .object({
    styleGuides: z.array(StyleGuideResponseSchema),
  })
  .openapi('StyleGuideList');
