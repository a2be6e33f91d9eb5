import { z } from "zod";

export const logLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace"])
  .default("info");

export type LogLevel = z.infer<typeof logLevelSchema>;

const envSchema = z.object({
  GITHUB_TOKEN: z.string().min(1),
  ANTHROPIC_API_KEY: z.string().min(1),

  // Path of the review config file, relative to the working directory
  PINPOINT_CONFIG: z.string().default("pinpoint.yml"),

  LOG_LEVEL: logLevelSchema,
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

function envError(issues: z.ZodIssue[], key?: string): Error {
  const lines = issues
    .map((i) => `  ${[key, ...i.path].filter((p) => p !== undefined).join(".")}: ${i.message}`)
    .join("\n");
  return new Error(`Invalid environment variables:\n${lines}`);
}

export function parseEnv(raw: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) throw envError(result.error.issues);
  return result.data;
}

/** Validates LOG_LEVEL alone; the logger starts before the rest of the env is read */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const result = logLevelSchema.safeParse(raw);
  if (!result.success) throw envError(result.error.issues, "LOG_LEVEL");
  return result.data;
}

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv({ ...process.env });
  return _env;
}
