import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @example
 * expandPath("~/projects/app"); // "/Users/username/projects/app" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

export const SupportedLanguageSchema = z.enum(["en"]);

export type SupportedLanguage = z.infer<typeof SupportedLanguageSchema>;

export const SyncPairConfigSchema = z.object({
  /** Upper bound for every external command (git, ssh, rsync) */
  commandTimeoutMs: z.number().int().positive().default(120_000),
  /** ConnectTimeout passed to ssh by the connection test */
  sshConnectTimeoutSec: z.number().int().positive().default(10),
  /** Git remote that push and pull talk to */
  gitRemote: z.string().min(1).default("origin"),
  /** Flags placed before --files-from on every rsync transfer */
  rsyncFlags: z.array(z.string().min(1)).default(["-avz"]),
  language: SupportedLanguageSchema.default("en"),
  debug: z.boolean().default(false),
  logToFile: z.boolean().default(false),
});

export type SyncPairConfig = z.infer<typeof SyncPairConfigSchema>;

export const DEFAULT_CONFIG: SyncPairConfig = SyncPairConfigSchema.parse({});

/**
 * Get the configuration directory path.
 * SYNCPAIR_CONFIG_DIR overrides the default ~/.syncpair, which keeps tests
 * away from the real user configuration.
 */
export function getConfigDir(): string {
  if (process.env.SYNCPAIR_CONFIG_DIR) {
    return process.env.SYNCPAIR_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".syncpair");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

/**
 * Path of the persisted project list.
 */
export function getProjectsPath(): string {
  return path.join(getConfigDir(), "projects.json");
}

export function getLogDir(): string {
  return path.join(getConfigDir(), "logs");
}

/**
 * Load the configuration from disk.
 *
 * A missing file yields the defaults. Keys present in the file are merged
 * over the defaults.
 *
 * @throws {ConfigError} If the file is not valid YAML or a value has the wrong type
 */
export async function loadConfig(): Promise<SyncPairConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch {
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, undefined, {
      cause: err instanceof Error ? err : undefined,
      configKey: configPath,
    });
  }

  const result = SyncPairConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, undefined, {
      configKey: issue?.path.join("."),
    });
  }
  return result.data;
}
