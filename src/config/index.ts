import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigError } from "../errors";
import { appConfigSchema, credentialsSchema } from "./schema";
import type { AppConfig, Credentials, ScanConfig } from "./schema";

/**
 * Loads scan tunables from a YAML file. Without a path every setting takes its
 * default.
 */
export function loadConfig(configPath?: string): AppConfig {
  if (configPath === undefined) {
    return appConfigSchema.parse({});
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to parse YAML in ${configPath}: ${message}`);
  }

  // an empty file parses to null
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export function loadCredentials(env: NodeJS.ProcessEnv): Credentials {
  const result = credentialsSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
    throw new ConfigError(`missing or invalid Bluesky credentials in environment: ${fields}`);
  }

  return {
    identifier: result.data.BLUESKY_HANDLE,
    password: result.data.BLUESKY_APP_PASSWORD,
    service: result.data.BLUESKY_SERVICE,
  };
}

export type { AppConfig, Credentials, ScanConfig };
