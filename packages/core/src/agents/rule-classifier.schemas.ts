import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const SeveritySchema = z.number().int().min(1).max(10);

export const GuidelineCoherenceResultSchema = z.object({
  evaluations: z.array(
    z.object({
      comparisonId: z.number().int().min(1),
      conditionOverlapSeverity: SeveritySchema,
      actionContradictionSeverity: SeveritySchema,
      rationale: z.string(),
    }),
  ),
});

export type GuidelineCoherenceResult = z.infer<typeof GuidelineCoherenceResultSchema>;

export const GuidelineCoherenceResultJsonSchema = zodToJsonSchema(GuidelineCoherenceResultSchema, {
  name: 'GuidelineCoherenceResult',
  $refStrategy: 'none',
});

export const GuidelineConnectionResultSchema = z.object({
  connections: z.array(
    z.object({
      sourceId: z.number().int().min(0),
      targetId: z.number().int().min(0),
      kind: z.enum(['entails', 'suggests']),
      score: SeveritySchema,
      rationale: z.string(),
    }),
  ),
});

export type GuidelineConnectionResult = z.infer<typeof GuidelineConnectionResultSchema>;

export const GuidelineConnectionResultJsonSchema = zodToJsonSchema(
  GuidelineConnectionResultSchema,
  {
    name: 'GuidelineConnectionResult',
    $refStrategy: 'none',
  },
);

export const StyleGuideCoherenceResultSchema = z.object({
  evaluations: z.array(
    z.object({
      comparisonId: z.number().int().min(1),
      scopeOverlapSeverity: SeveritySchema,
      contradictionSeverity: SeveritySchema,
      rationale: z.string(),
    }),
  ),
});

export type StyleGuideCoherenceResult = z.infer<typeof StyleGuideCoherenceResultSchema>;

export const StyleGuideCoherenceResultJsonSchema = zodToJsonSchema(
  StyleGuideCoherenceResultSchema,
  {
    name: 'StyleGuideCoherenceResult',
    $refStrategy: 'none',
  },
);
