import { z } from 'zod';
import { GuidelineContentSchema, StyleGuideContentSchema } from './rule.schema.js';

const SeveritySchema = z.number().int().min(1).max(10);

export const IncoherenceKindSchema = z.enum(['strict', 'contingent']);

export const GuidelineCoherenceCheckSchema = z.object({
  kind: z.enum([
    'contradiction_with_existing_guideline',
    'contradiction_with_another_evaluated_guideline',
  ]),
  first: GuidelineContentSchema,
  second: GuidelineContentSchema,
  issue: z.string(),
  severity: SeveritySchema,
  incoherenceKind: IncoherenceKindSchema,
});

export const StyleGuideCoherenceCheckSchema = z.object({
  kind: z.enum([
    'contradiction_with_existing_style_guide',
    'contradiction_with_another_evaluated_style_guide',
  ]),
  first: StyleGuideContentSchema,
  second: StyleGuideContentSchema,
  issue: z.string(),
  severity: SeveritySchema,
  incoherenceKind: IncoherenceKindSchema,
});

export const ConnectionPropositionSchema = z.object({
  checkKind: z.enum(['connection_with_existing_guideline', 'connection_with_another_evaluated_guideline']),
  source: GuidelineContentSchema,
  target: GuidelineContentSchema,
  connectionKind: z.enum(['entails', 'suggests']),
});

export const GuidelineInvoiceDataSchema = z.object({
  kind: z.literal('guideline'),
  coherenceChecks: z.array(GuidelineCoherenceCheckSchema),
  connectionPropositions: z.array(ConnectionPropositionSchema).nullable(),
});

export const StyleGuideInvoiceDataSchema = z.object({
  kind: z.literal('style_guide'),
  coherenceChecks: z.array(StyleGuideCoherenceCheckSchema),
});

// Invoice payloads are echoed back as evaluated, so no field has a default.
const EvaluatedGuidelinePayloadSchema = z.object({
  kind: z.literal('guideline'),
  content: GuidelineContentSchema,
  operation: z.enum(['add', 'update']),
  updatedId: z.string().min(1).optional(),
  coherenceCheck: z.boolean(),
  connectionProposition: z.boolean(),
});

const EvaluatedStyleGuidePayloadSchema = z.object({
  kind: z.literal('style_guide'),
  content: StyleGuideContentSchema,
  operation: z.enum(['add', 'update']),
  updatedId: z.string().min(1).optional(),
  coherenceCheck: z.boolean(),
});

export const GuidelineInvoiceSchema = z.object({
  kind: z.literal('guideline'),
  payload: EvaluatedGuidelinePayloadSchema,
  checksum: z.string().min(1),
  approved: z.boolean(),
  data: GuidelineInvoiceDataSchema.nullable(),
  error: z.string().nullable(),
});

export const StyleGuideInvoiceSchema = z.object({
  kind: z.literal('style_guide'),
  payload: EvaluatedStyleGuidePayloadSchema,
  checksum: z.string().min(1),
  approved: z.boolean(),
  data: StyleGuideInvoiceDataSchema.nullable(),
  error: z.string().nullable(),
});

export const InvoiceSchema = z.discriminatedUnion('kind', [
  GuidelineInvoiceSchema,
  StyleGuideInvoiceSchema,
]);

export type InvoiceInput = z.infer<typeof InvoiceSchema>;
