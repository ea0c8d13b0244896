import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { FeedRelayError, errorMessage } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig, NotifierConfig, QuotaLimits } from "./schema";

export class ConfigError extends FeedRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/**
 * Reads and validates the YAML config file. Omitted sections take their
 * defaults; only `notifier` is required.
 *
 * @throws ConfigError listing every schema issue as `  - path: message`
 */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`failed to read config file at ${configPath}: ${errorMessage(err)}`, {
      configPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigError(`failed to parse YAML in ${configPath}: ${errorMessage(err)}`, {
      configPath,
    });
  }

  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid configuration in ${configPath}:\n${issues.join("\n")}`, {
      configPath,
      issueCount: issues.length,
    });
  }

  return result.data;
}

export type { AppConfig, NotifierConfig, QuotaLimits };
