import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import * as p from "@clack/prompts";
import { errorMessage, isNodeError } from "./errors.js";
import { ExitSignal } from "./exit-signal.js";
import { DEFAULT_MANIFEST_FILE } from "./manifest.js";
import type { MissingFilePolicy } from "./uninstall.js";

export const CONFIG_FILE = "uninstall.json";

export interface UninstallConfig {
  manifest?: string;
  destDir?: string;
  missing?: MissingFilePolicy;
}

export interface ReadConfigOptions {
  onWarn?: (message: string) => void;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const KNOWN_KEYS = new Set(["manifest", "destDir", "missing"]);

function readString(
  record: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${key} must be a string`);
  }
  return value;
}

function isMissingPolicy(value: string): value is MissingFilePolicy {
  return value === "ignore" || value === "fail";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readConfig(
  dir: string,
  options?: ReadConfigOptions,
): Promise<UninstallConfig | null> {
  const filePath = join(dir, CONFIG_FILE);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isNodeError(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${detail}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a JSON object`);
  }

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      options?.onWarn?.(`Unknown config key "${key}" — skipping`);
    }
  }

  const missingValue = readString(parsed, "missing");
  let missing: MissingFilePolicy | undefined;
  if (missingValue !== undefined) {
    if (!isMissingPolicy(missingValue)) {
      throw new ConfigError(`missing must be "ignore" or "fail"`);
    }
    missing = missingValue;
  }

  return {
    manifest: readString(parsed, "manifest"),
    destDir: readString(parsed, "destDir"),
    missing,
  };
}

export interface SettingsFlags {
  manifest?: string;
  destDir?: string;
  strict?: boolean;
}

export interface UninstallSettings {
  manifestPath: string;
  destDir: string | undefined;
  missing: MissingFilePolicy;
}

/** Flags win over the environment, which wins over uninstall.json. */
export async function resolveSettings(
  flags: SettingsFlags,
  env: NodeJS.ProcessEnv,
  cwd: string,
  options?: ReadConfigOptions,
): Promise<UninstallSettings> {
  const config: UninstallConfig = (await readConfig(cwd, options)) ?? {};

  const manifest = flags.manifest ?? config.manifest ?? DEFAULT_MANIFEST_FILE;
  const envDestDir = env.DESTDIR !== "" ? env.DESTDIR : undefined;
  const destDir = flags.destDir ?? envDestDir ?? config.destDir;

  return {
    manifestPath: resolve(cwd, manifest),
    destDir: destDir === "" ? undefined : destDir,
    missing: flags.strict === true ? "fail" : config.missing ?? "ignore",
  };
}

export async function resolveSettingsOrExit(
  flags: SettingsFlags,
): Promise<UninstallSettings> {
  return resolveSettings(flags, process.env, process.cwd(), {
    onWarn: (message) => p.log.warn(message),
  }).catch((err: unknown) => {
    p.log.error(`Failed to read configuration: ${errorMessage(err)}`);
    throw new ExitSignal(1);
  });
}
