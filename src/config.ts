import { z } from 'zod';
import type { DiffExecutor } from './scheduler/executor.js';
import type { ContentEquality } from './reconcile/reconfigure.js';
import { ErrorCode } from './types/enums.js';
import { ListDiffError } from './types/error.js';

export const DEFAULT_BACKGROUND_THRESHOLD = 1000;

const executorSchema = z.custom<DiffExecutor>(
  (value) => typeof value === 'object' && value !== null && 'run' in value && typeof value.run === 'function',
  { message: 'executor must provide run()' }
);

const schedulerOptionsSchema = z
  .object({
    backgroundThreshold: z.number().int().nonnegative().default(DEFAULT_BACKGROUND_THRESHOLD),
    animate: z.boolean().default(true),
    coalesce: z.boolean().default(true),
    inlineExecutor: executorSchema.optional(),
    backgroundExecutor: executorSchema.optional(),
    isContentEqual: z.function().optional()
  })
  .strict();

export interface UpdateSchedulerOptions<I> {
  /** Diffs where either snapshot holds more items than this run on the background executor. */
  backgroundThreshold?: number;
  /** Default for `apply()` when the call does not say. */
  animate?: boolean;
  /** Skip queued requests that a later request has made stale. */
  coalesce?: boolean;
  inlineExecutor?: DiffExecutor;
  backgroundExecutor?: DiffExecutor;
  /** Marks identity-equal, content-different items for reconfiguration before diffing. */
  isContentEqual?: ContentEquality<I>;
}

export interface ResolvedSchedulerOptions<I> {
  backgroundThreshold: number;
  animate: boolean;
  coalesce: boolean;
  inlineExecutor?: DiffExecutor;
  backgroundExecutor?: DiffExecutor;
  isContentEqual?: ContentEquality<I>;
}

export function resolveSchedulerOptions<I>(input: UpdateSchedulerOptions<I> = {}): ResolvedSchedulerOptions<I> {
  const parsed = schedulerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new ListDiffError(ErrorCode.INVALID_OPTIONS, `Invalid scheduler options: ${detail}`);
  }
  return {
    backgroundThreshold: parsed.data.backgroundThreshold,
    animate: parsed.data.animate,
    coalesce: parsed.data.coalesce,
    inlineExecutor: input.inlineExecutor,
    backgroundExecutor: input.backgroundExecutor,
    isContentEqual: input.isContentEqual
  };
}
