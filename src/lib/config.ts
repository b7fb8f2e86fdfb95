import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_BASE_URL = "https://www.beeminder.com/api/v1/";
export const DEFAULT_EDITOR = "vi";
export const MISSING_API_KEY = "Please create environment variable BEEMINDER_API_KEY";

export interface BeelineConfig {
  apiKey: string;
  baseUrl: string;
  user: string;
  editor: string;
}

const configSchema = z.object({
  apiKey: z.string({ required_error: MISSING_API_KEY }),
  baseUrl: z
    .string()
    .url({ message: "BEEMINDER_BASE_URL must be an absolute URL" })
    .transform((url) => (url.endsWith("/") ? url : `${url}/`))
    .default(DEFAULT_BASE_URL),
  user: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, { message: "BEEMINDER_USER must be a plain username" })
    .default("me"),
  editor: z.string().default(DEFAULT_EDITOR),
});

// Unset and blank variables are treated the same
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read beeline's configuration from the environment.
 *
 * Throws ConfigError when BEEMINDER_API_KEY is missing or a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BeelineConfig {
  const parsed = configSchema.safeParse({
    apiKey: present(env.BEEMINDER_API_KEY),
    baseUrl: present(env.BEEMINDER_BASE_URL),
    user: present(env.BEEMINDER_USER),
    editor: present(env.VISUAL) ?? present(env.EDITOR),
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues[0]?.message ?? "Invalid configuration");
  }

  return parsed.data;
}
