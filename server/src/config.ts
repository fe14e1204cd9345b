import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  MONGODB_URI: z.string().min(1).optional(),
  DB_NAME: z.string().min(1).default("plotwise"),
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-2.0-flash"),
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  OPENROUTER_MODEL: z.string().min(1).default("anthropic/claude-3.5-sonnet"),
  OPENROUTER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

/** Reads settings from the environment; empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  return Object.freeze(envSchema.parse(cleaned));
}
