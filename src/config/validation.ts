import { z } from 'zod';

export const ruleThresholdsSchema = z.object({
  smallBusinessMaxSqm: z.number().int().positive().default(150),
  smallBusinessMaxPeople: z.number().int().positive().default(50),
  largeBusinessMinSqm: z.number().int().positive().default(300),
  largeBusinessMinPeople: z.number().int().positive().default(200),
  complexFeatureCount: z.number().int().min(1).default(3),
});

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  catalog: z.object({
    path: z.string().min(1).default('data/fire-safety-catalog.json'),
  }),
  rules: ruleThresholdsSchema,
});

export type Config = z.infer<typeof configSchema>;
export type RuleThresholds = z.infer<typeof ruleThresholdsSchema>;
