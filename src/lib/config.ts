import { z } from 'zod';
import { ConfigError, describeError } from './errors';

const booleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const configSchema = z.object({
  FUZZ_BACKEND: z.string().trim().min(1, 'Backend name must not be empty').default('reference'),
  FUZZ_AUTOJUNK: booleanFlagSchema.default('true'),
});

export interface FuzzConfig {
  /** Name of the scorer backend bound at startup. */
  backend: string;
  /** Whether the aligner ignores popular symbols on long inputs. */
  autojunk: boolean;
}

/**
 * Read configuration from the environment. Called once when the default API is bound.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FuzzConfig {
  const parsed = configSchema.safeParse({
    FUZZ_BACKEND: env.FUZZ_BACKEND,
    FUZZ_AUTOJUNK: env.FUZZ_AUTOJUNK,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    const error = new ConfigError(issues);
    console.error(`[config] ${describeError(error)}`);
    throw error;
  }
  return {
    backend: parsed.data.FUZZ_BACKEND,
    autojunk: parsed.data.FUZZ_AUTOJUNK,
  };
}
