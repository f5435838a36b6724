import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { errnoCode } from "../errors/catalog.js";
import {
  SnipkeepConfigSchema,
  type SnipkeepConfig,
} from "../schemas/config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

function serializeConfig(config: SnipkeepConfig): string {
  return JSON.stringify(config, null, 2) + "\n";
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<SnipkeepConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    // A missing file means "all defaults"
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = SnipkeepConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = serializeConfig(config);
  if (serialized !== raw) {
    await saveConfig(config, { configPath });
  }

  return config;
}

export async function saveConfig(
  config: SnipkeepConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, serializeConfig(config), "utf-8");
}
