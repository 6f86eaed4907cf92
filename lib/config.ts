import { z } from "zod";

const ConfigSchema = z.object({
  PORTFOLIO_MODEL: z.string().trim().min(1).default("gpt-3.5-turbo"),
  COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  OPENAI_BASE_URL: z.string().url().optional(),
});

export type AppConfig = {
  model: string;
  timeoutMs: number;
  baseURL?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse({
    PORTFOLIO_MODEL: env.PORTFOLIO_MODEL || undefined,
    COMPLETION_TIMEOUT_MS: env.COMPLETION_TIMEOUT_MS || undefined,
    OPENAI_BASE_URL: env.OPENAI_BASE_URL || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  return {
    model: parsed.data.PORTFOLIO_MODEL,
    timeoutMs: parsed.data.COMPLETION_TIMEOUT_MS,
    baseURL: parsed.data.OPENAI_BASE_URL,
  };
}
