import { z } from 'zod';

const SeveritySchema = z.number().int().min(1).max(10);

const CoherenceConfigSchema = z.object({
  contradictionThreshold: SeveritySchema.default(6),
  relatednessThreshold: SeveritySchema.default(6),
  criticalRelatednessThreshold: SeveritySchema.default(7),
});

const ConnectionConfigSchema = z.object({
  minScore: SeveritySchema.default(6),
});

const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(100),
  intervalMs: z.number().int().min(0).default(3500),
});

const ListenerConfigSchema = z.object({
  pollIntervalMs: z.number().int().min(1).default(250),
});

export const EvaluationConfigSchema = z.object({
  $schema: z.string().optional(),
  batchSize: z.number().int().min(1).max(50).default(5),
  coherence: CoherenceConfigSchema.default({}),
  connection: ConnectionConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  listener: ListenerConfigSchema.default({}),
});

export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;
export type CoherenceConfig = z.infer<typeof CoherenceConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_EVALUATION_CONFIG: EvaluationConfig = EvaluationConfigSchema.parse({});
