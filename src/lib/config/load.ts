/**
 * load.ts — Configuration loading
 *
 * Resolves the config path (explicit → DASHCAM_MERGER_CONFIG →
 * config/config.json), reads and validates the document, and fails fast with
 * a ConfigInvalid MergeError that names the offending field.
 */

import { readFile } from "fs/promises";
import { resolve } from "path";
import { MergeError, errnoCode } from "../utils/errors";
import { configDocumentSchema, toAppConfig, type AppConfig } from "./schema";

export const DEFAULT_CONFIG_PATH = "config/config.json";

export function resolveConfigPath(explicitPath?: string): string {
  return resolve(explicitPath || process.env.DASHCAM_MERGER_CONFIG || DEFAULT_CONFIG_PATH);
}

export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const parsed = configDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MergeError(`Invalid configuration in ${source}: ${issues}`, "ConfigInvalid");
  }
  return toAppConfig(parsed.data);
}

export async function loadConfig(explicitPath?: string): Promise<AppConfig> {
  const configPath = resolveConfigPath(explicitPath);

  let text: string;
  try {
    text = await readFile(configPath, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new MergeError(
        `Configuration file not found: ${configPath} (copy config/config.example.json to config/config.json)`,
        "ConfigInvalid"
      );
    }
    throw new MergeError(
      `Could not read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      "ConfigInvalid"
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MergeError(
      `Configuration file is not valid JSON: ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      "ConfigInvalid"
    );
  }

  return parseConfig(raw, configPath);
}
