import { z } from 'zod';
import { ShimError } from './error.js';

export const LogConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  format: z.enum(['json', 'text']).default('json'),
});

export const ShimConfigSchema = z.object({
  tracerName: z.string().min(1).default('opentracing-shim'),
  tracerVersion: z.string().min(1).optional(),
  log: LogConfigSchema.default({}),
});

export type LogConfig = z.infer<typeof LogConfigSchema>;
export type ShimConfig = z.infer<typeof ShimConfigSchema>;

/**
 * loadConfig は設定値を検証し、既定値を補った ShimConfig を返す。
 * 不正な場合は INVALID_CONFIG の ShimError を送出する。
 */
export function loadConfig(input: unknown = {}): ShimConfig {
  const result = ShimConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ShimError(`invalid shim config: ${issues}`, 'INVALID_CONFIG', result.error);
  }
  return result.data;
}
