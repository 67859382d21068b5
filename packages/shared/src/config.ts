import { existsSync, mkdirSync, readFileSync, openSync, writeSync, closeSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

const APP_DIR = "glucose-archive";
export const CONFIG_DIR_ENV = "GLUCOSE_ARCHIVE_CONFIG_DIR";

export function getConfigDir(): string {
  const override = process.env[CONFIG_DIR_ENV]?.trim();
  const dir = override ? override : join(homedir(), ".config", APP_DIR);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  return dir;
}

export function getModuleConfigPath(module: string): string {
  return join(getConfigDir(), `${module}.json`);
}

/**
 * Read a module's JSON config. Returns null when the file is absent.
 * A file that exists but does not parse is an error, not an absent config.
 */
export function readConfig(module: string): unknown {
  const path = getModuleConfigPath(module);
  if (!existsSync(path)) return null;
  const raw = readFileSync(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`Invalid JSON in ${path}: ${reason}`);
  }
}

export function writeConfig<T>(module: string, data: T): string {
  const filePath = getModuleConfigPath(module);
  const content = JSON.stringify(data, null, 2) + "\n";
  // Created 0600 from the start; chmod covers files that already existed.
  const fd = openSync(filePath, "w", 0o600);
  try {
    writeSync(fd, content);
  } finally {
    closeSync(fd);
  }
  chmodSync(filePath, 0o600);
  return filePath;
}
