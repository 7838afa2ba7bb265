import { z } from 'zod';

export const GuidelineContentSchema = z.object({
  condition: z.string().min(1),
  action: z.string().min(1),
});

export const StyleGuideEventSchema = z.object({
  source: z.enum(['customer', 'ai_agent', 'human_agent', 'system']),
  message: z.string().min(1),
});

export const StyleGuideExampleSchema = z.object({
  before: z.array(StyleGuideEventSchema),
  after: z.array(StyleGuideEventSchema),
  violation: z.string(),
});

export const StyleGuideContentSchema = z.object({
  principle: z.string().min(1),
  examples: z.array(StyleGuideExampleSchema),
});

const PayloadOperationSchema = z.enum(['add', 'update']);

export const GuidelinePayloadSchema = z.object({
  kind: z.literal('guideline'),
  content: GuidelineContentSchema,
  operation: PayloadOperationSchema.default('add'),
  updatedId: z.string().min(1).optional(),
  coherenceCheck: z.boolean().default(true),
  connectionProposition: z.boolean().default(true),
});

export const StyleGuidePayloadSchema = z.object({
  kind: z.literal('style_guide'),
  content: StyleGuideContentSchema,
  operation: PayloadOperationSchema.default('add'),
  updatedId: z.string().min(1).optional(),
  coherenceCheck: z.boolean().default(true),
});

export const PayloadSchema = z
  .discriminatedUnion('kind', [GuidelinePayloadSchema, StyleGuidePayloadSchema])
  .superRefine((payload, ctx) => {
    if (payload.operation === 'update' && payload.updatedId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['updatedId'],
        message: 'updatedId is required when operation is "update"',
      });
    }
    if (payload.operation === 'add' && payload.updatedId !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['updatedId'],
        message: 'updatedId is only allowed when operation is "update"',
      });
    }
  });

export type GuidelineContentInput = z.infer<typeof GuidelineContentSchema>;
export type StyleGuideContentInput = z.infer<typeof StyleGuideContentSchema>;
export type PayloadInput = z.infer<typeof PayloadSchema>;
