/**
 * @switchyard/core - Environment Variables
 * Typed access to process.env
 */

/**
 * Get an environment variable value
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? defaultValue : value;
}

/**
 * Get an environment variable parsed as JSON.
 * Unparseable values throw instead of reading as unset.
 */
export function getEnvJson(key: string): unknown {
  const value = getEnv(key);
  if (value === undefined) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Environment variable "${key}" is not valid JSON: ${reason}`);
  }
}

export type EnvMode = "development" | "production" | "test";

export function getEnvMode(): EnvMode {
  const env = getEnv("NODE_ENV");
  if (env === "production") return "production";
  if (env === "test") return "test";
  return "development";
}

export function isDevelopment(): boolean {
  return getEnvMode() === "development";
}
