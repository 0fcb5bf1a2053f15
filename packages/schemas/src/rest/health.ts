import { z } from 'zod';

export const DEPENDENCY_NAMES = ['catalog', 'notification', 'chat'] as const;

export const dependencyNameSchema = z.enum(DEPENDENCY_NAMES);

export type DependencyName = z.infer<typeof dependencyNameSchema>;

export const breakerStateSchema = z.enum(['closed', 'open', 'half_open']);

export type BreakerState = z.infer<typeof breakerStateSchema>;

export const dependencyHealthSchema = z.object({
  state: breakerStateSchema,
  consecutiveFailures: z.number().int().nonnegative(),
  openedAt: z.string().min(1).nullable(),
});

export const dependencyHealthResponseSchema = z.object({
  dependencies: z.record(dependencyNameSchema, dependencyHealthSchema),
});

export type DependencyHealthView = z.infer<typeof dependencyHealthSchema>;

export type DependencyHealthResponse = z.infer<typeof dependencyHealthResponseSchema>;
