import { z } from 'zod';

const PackingConfigSchema = z.object({
  boxes: z.number().int().min(1).default(3),
  strategy: z.enum(['ldm', 'greedy']).default('ldm'),
  seeding: z.enum(['batch', 'single']).default('batch'),
  allow_empty: z.boolean().default(false),
});

const BenchmarkConfigSchema = z.object({
  articles: z.number().int().min(1).default(35),
  boxes: z.number().int().min(1).default(3),
  smallest_weight: z.number().int().min(0).default(100),
  largest_weight: z.number().int().min(0).default(1000),
  seed: z.number().int().default(42),
  runs: z.number().int().min(1).default(5),
}).refine(b => b.largest_weight >= b.smallest_weight, {
  message: 'largest_weight must be >= smallest_weight',
  path: ['largest_weight'],
});

const OutputConfigSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  packing: PackingConfigSchema.default({}),
  benchmark: BenchmarkConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function parseConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {});
}
