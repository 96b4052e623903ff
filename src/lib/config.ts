import { z } from "zod";
import { ConfigError, formatZodIssues } from "./errors";

export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 500;
export const DEFAULT_TIMEOUT_MS = 120_000;

export const ConfigSchema = z.object({
  STUDY_API_URL: z.string().url(),
  STUDY_API_TOKEN: z.string().min(1),
  STUDY_API_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRIES),
  STUDY_API_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS),
  STUDY_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

export interface StudyConfig {
  apiUrl: string;
  apiToken: string;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/**
 * Read configuration from the environment. Scripts load `.env.local`
 * with dotenv before calling this.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StudyConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = ConfigSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error));
  }

  const c = result.data;
  return {
    apiUrl: c.STUDY_API_URL,
    apiToken: c.STUDY_API_TOKEN,
    retries: c.STUDY_API_RETRIES,
    retryDelayMs: c.STUDY_API_RETRY_DELAY_MS,
    timeoutMs: c.STUDY_API_TIMEOUT_MS,
  };
}
