import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import JSON5 from "json5";
import { ZodError } from "zod";
import { ConfigError } from "../errors/errors.js";
import { PixscriptConfigSchema, type PixscriptConfig } from "./schema.js";

const PLACEHOLDER = /\$\{([^}]+)\}/g;

/**
 * Recursively walk a value and replace every `${ENV_VAR}` pattern in strings
 * with the corresponding value from `env`.  If the env var is not set the
 * placeholder is left as-is so the caller can decide how to handle it.
 */
export function interpolateEnvVars(value: unknown, env: Record<string, string | undefined> = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER, (match, varName: string) => env[varName] ?? match);
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }

  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = interpolateEnvVars(v, env);
    }
    return result;
  }

  return value;
}

function formatZodError(err: ZodError): string {
  return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** Validate an already-parsed config object. */
export function parseConfig(raw: unknown, env: Record<string, string | undefined> = process.env): PixscriptConfig {
  const result = PixscriptConfigSchema.safeParse(interpolateEnvVars(raw, env));
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatZodError(result.error)}`, { cause: result.error });
  }

  const token = result.data.channels.telegram.botToken;
  if (!token || token.includes("${")) {
    throw new ConfigError("TELEGRAM_BOT_TOKEN is missing. Set it in environment or .env");
  }
  return result.data;
}

/**
 * Load, parse and validate a `pixscript.config.json5` file.
 */
export async function loadConfig(
  configPath: string,
  env: Record<string, string | undefined> = process.env,
): Promise<PixscriptConfig> {
  const absolutePath = resolve(configPath);

  let raw: string;
  try {
    raw = await readFile(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config at ${absolutePath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse config at ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  return parseConfig(parsed, env);
}
