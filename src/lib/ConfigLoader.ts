/**
 * Configuration loader for fops
 *
 * Builds the read-only engine configuration once at startup. This is the only
 * place that reads the environment; the engine receives the result.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { Locale } from "../interfaces/IMessageProvider";
import { ValidationError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export const DEFAULT_CHUNK_SIZE = 64 * 1024; // 64KB
export const LARGE_FILE_THRESHOLD = 32 * 1024 * 1024; // 32MB
export const MULTI_ENTRY_THRESHOLD = 5;

export const EngineConfigSchema = z.object({
  /** Locale used to label events */
  locale: z.enum(["en", "zh"]),
  /** Root of the recoverable delete store */
  trashDir: z.string().min(1),
  /** Bytes per read/write during copies */
  chunkSize: z.number().int().positive(),
  /** Files at least this large report per-chunk progress */
  largeFileThreshold: z.number().int().nonnegative(),
  /** Batches with at least this many entries report progress */
  multiEntryThreshold: z.number().int().positive(),
  /** How copies are verified before the source is removed */
  verification: z.enum(["size", "sha256"]),
  enableAuditLog: z.boolean(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

const ConfigFileSchema = EngineConfigSchema.partial().strict();

export class ConfigLoader {
  /**
   * Load configuration from file and environment
   *
   * Precedence: defaults, then the config file, then environment overrides.
   */
  static async loadConfig(
    env: NodeJS.ProcessEnv = process.env
  ): Promise<EngineConfig> {
    const configPath =
      env["FOPS_CONFIG"] ||
      path.join(
        env["XDG_CONFIG_HOME"] || path.join(os.homedir(), ".config"),
        "fops",
        "config.json"
      );

    const fromFile = fs.existsSync(configPath)
      ? this.readConfigFile(configPath)
      : {};

    const config: EngineConfig = {
      ...this.defaults(env),
      ...fromFile,
    };

    const lang = env["FOPS_LANG"];
    if (lang) {
      config.locale = this.resolveLocale(lang);
    }
    const trashDir = env["FOPS_TRASH_DIR"];
    if (trashDir) {
      config.trashDir = path.resolve(trashDir);
    }
    const auditLog = env["FOPS_AUDIT_LOG"];
    if (auditLog !== undefined) {
      config.enableAuditLog = ["1", "true", "yes"].includes(
        auditLog.toLowerCase()
      );
    }

    return EngineConfigSchema.parse(config);
  }

  /**
   * Default configuration for an environment
   */
  static defaults(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    return {
      locale: this.resolveLocale(
        env["LC_ALL"] || env["LC_MESSAGES"] || env["LANG"]
      ),
      trashDir: path.join(
        env["XDG_DATA_HOME"] || path.join(os.homedir(), ".local", "share"),
        "Trash"
      ),
      chunkSize: DEFAULT_CHUNK_SIZE,
      largeFileThreshold: LARGE_FILE_THRESHOLD,
      multiEntryThreshold: MULTI_ENTRY_THRESHOLD,
      verification: "size",
      enableAuditLog: false,
    };
  }

  /**
   * Map a language/region value such as `zh_CN.UTF-8` to a supported locale
   */
  static resolveLocale(value: string | undefined): Locale {
    if (value && value.toLowerCase().startsWith("zh")) {
      return "zh";
    }
    return "en";
  }

  private static readConfigFile(configPath: string): Partial<EngineConfig> {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ValidationError(
        `Invalid configuration file ${configPath}: ${ErrorHandler.describe(error)}`
      );
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid configuration file ${configPath}: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
    }

    const { trashDir, ...rest } = parsed.data;
    return trashDir
      ? { ...rest, trashDir: path.resolve(path.dirname(configPath), trashDir) }
      : rest;
  }
}
