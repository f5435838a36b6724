import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".snipkeep");
export const DEFAULT_SNIPPETS_DIR = join(DEFAULT_ROOT_PATH, "snippets");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Environment variable overriding the root path */
export const ROOT_PATH_ENV = "SNIPKEEP_ROOT_PATH";
