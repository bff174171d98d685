import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const supabaseEnvSchema = z.object({
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),
  SUPABASE_PORTFOLIO_TABLE: z.string().min(1).default('paper_portfolios'),
  SUPABASE_OUTCOME_TABLE: z.string().min(1).default('signal_outcomes')
});

export type SupabaseEnv = z.infer<typeof supabaseEnvSchema>;

/**
 * Returns null when Supabase is not configured at all; the engine then keeps
 * state in memory. A partial configuration is an error.
 */
export function loadSupabaseEnv(env: NodeJS.ProcessEnv = process.env): SupabaseEnv | null {
  if (!env.SUPABASE_URL && !env.SUPABASE_SERVICE_KEY) {
    return null;
  }

  const parsed = supabaseEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(`Invalid Supabase environment configuration: ${parsed.error.message}`);
  }

  return parsed.data;
}
