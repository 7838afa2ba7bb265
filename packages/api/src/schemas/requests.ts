import { z } from '@hono/zod-openapi';
import { PayloadSchema } from '@tenet/schemas/src/rule.schema.js';
import { InvoiceSchema } from '@tenet/schemas/src/invoice.schema.js';

export const CreateEvaluationRequestSchema = z
  .object({
    ownerId: z.string().min(1),
    payloads: z.array(PayloadSchema),
  })
  .openapi('CreateEvaluationRequest');

export type CreateEvaluationRequest = z.infer<typeof CreateEvaluationRequestSchema>;

export const EvaluationIdParamSchema = z.object({
  evaluationId: z.string().min(1),
});

export const ReadEvaluationQuerySchema = z
  .object({
    waitForCompletion: z.coerce.number().int().min(0).max(300).optional(),
  })
  .openapi('ReadEvaluationQuery');

export const OwnerIdParamSchema = z.object({
  ownerId: z.string().min(1),
});

export const CommitInvoicesRequestSchema = z
  .object({
    invoices: z.array(InvoiceSchema).min(1),
  })
  .openapi('CommitInvoicesRequest');

export type CommitInvoicesRequest = z.infer<typeof CommitInvoicesRequestSchema>;
