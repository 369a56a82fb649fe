import { readFile } from "node:fs/promises";
import type { Logger } from "../interfaces/logger.js";
import type { GlowlineConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { glowlineConfigSchema } from "./config-schema.js";

/**
 * Read a JSON config file. A missing file yields an empty config so defaults
 * apply; unreadable or invalid content throws.
 */
export async function loadConfigFile(
  configPath: string,
  logger: Logger = noopLogger,
): Promise<GlowlineConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.debug?.("No config file, using defaults", { component: "config", configPath });
      return {};
    }
    throw new Error(`Failed to read config file ${configPath}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file ${configPath} is not valid JSON`, { cause: err });
  }

  const validation = glowlineConfigSchema.safeParse(parsed);
  if (!validation.success) {
    throw new Error(`Invalid configuration in ${configPath}: ${validation.error.message}`);
  }
  logger.info("Loaded config file", { component: "config", configPath });
  return validation.data;
}
