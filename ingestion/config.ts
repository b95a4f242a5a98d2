/**
 * Ingestion settings read from the environment.
 *
 * The CLI loads .env.local through dotenv before calling loadConfig().
 */

import { z } from 'zod';
import { ConfigError } from './shared/errors';

const envSchema = z.object({
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().min(1).optional(),
  STATE_DIR: z.string().min(1).default('data/state'),
  PDF_DIR: z.string().min(1).default('meeting_pdfs'),
  ROSTER_PATH: z.string().min(1).default('data/members.json'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  USER_AGENT: z.string().min(1).default('BoardVotesBot/0.1'),
  SFBOS_MEETINGS_URL: z.string().url().default('https://sfbos.org/meetings/full-board-meetings'),
  LEGISTAR_CLIENT: z.string().min(1).default('sfgov'),
  LEGISTAR_BODY: z.string().min(1).default('Board of Supervisors'),
});

export interface IngestionConfig {
  supabaseUrl?: string;
  supabaseKey?: string;
  stateDir: string;
  pdfDir: string;
  rosterPath: string;
  http: {
    timeoutMs: number;
    delayMs: number;
    userAgent: string;
  };
  sfbosMeetingsUrl: string;
  legistar: {
    client: string;
    bodyName: string;
  };
}

/**
 * Validate environment variables and build the ingestion config.
 *
 * Empty strings count as unset so a blank line in .env.local falls back to the default.
 *
 * @throws {ConfigError} If a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestionConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    supabaseUrl: vars.SUPABASE_URL,
    supabaseKey: vars.SUPABASE_KEY,
    stateDir: vars.STATE_DIR,
    pdfDir: vars.PDF_DIR,
    rosterPath: vars.ROSTER_PATH,
    http: {
      timeoutMs: vars.REQUEST_TIMEOUT_MS,
      delayMs: vars.REQUEST_DELAY_MS,
      userAgent: vars.USER_AGENT,
    },
    sfbosMeetingsUrl: vars.SFBOS_MEETINGS_URL,
    legistar: {
      client: vars.LEGISTAR_CLIENT,
      bodyName: vars.LEGISTAR_BODY,
    },
  };
}
