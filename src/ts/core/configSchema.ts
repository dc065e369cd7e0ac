/**
 * @fileoverview Catalog configuration schema and resolution
 * @module core/configSchema
 *
 * Resolves the run configuration from three layers, lowest precedence first:
 * built-in defaults, a YAML config file, explicit overrides (CLI flags).
 * The merged result is validated once against CatalogConfigSchema.
 *
 * Relative paths resolve against the working directory, not the config
 * file's location.
 */

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "solid-catalog.yaml";

// ============================================================================
// SCHEMA
// ============================================================================

export const ReportFormatSchema = z.enum(["markdown", "text"]);

export const CatalogConfigSchema = z
  .object({
    inputDir: z.string().min(1).default("docs/principles"),
    outputPath: z.string().min(1).nullable().default(null), // null = stdout
    format: ReportFormatSchema.default("markdown"),
    strict: z.boolean().default(false), // fail the run on validation warnings
    quiet: z.boolean().default(false),
  })
  .strict();

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

export type CatalogConfigOverrides = Partial<CatalogConfig>;

export interface ResolveOptions {
  /** Explicit config file; must exist when given */
  configFile?: string;
  cwd?: string;
}

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown for invalid configuration or CLI usage
 */
export class ConfigError extends Error {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(`Invalid configuration (${source}): ${message}`);
    this.name = "ConfigError";
    this.source = source;
  }
}

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Merge defaults, config file and overrides into a validated config.
 *
 * Without an explicit configFile, solid-catalog.yaml in the working
 * directory is used when present and silently skipped when absent.
 *
 * @throws {ConfigError} If the config file is unreadable or malformed,
 *   or the merged values fail validation
 */
export function resolveCatalogConfig(
  overrides: CatalogConfigOverrides = {},
  options: ResolveOptions = {}
): CatalogConfig {
  const cwd = options.cwd ?? process.cwd();

  let fileValues: Record<string, unknown> = {};
  let source = "defaults";

  if (options.configFile !== undefined) {
    const configPath = path.resolve(cwd, options.configFile);
    fileValues = readConfigFile(configPath);
    source = configPath;
  } else {
    const implicitPath = path.resolve(cwd, DEFAULT_CONFIG_FILE);
    if (fs.existsSync(implicitPath)) {
      fileValues = readConfigFile(implicitPath);
      source = implicitPath;
    }
  }

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = CatalogConfigSchema.safeParse({ ...fileValues, ...definedOverrides });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(source, issues);
  }

  const config = result.data;
  return {
    ...config,
    inputDir: path.resolve(cwd, config.inputDir),
    outputPath: config.outputPath === null ? null : path.resolve(cwd, config.outputPath),
  };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : String(error));
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : String(error));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(configPath, "config file must contain a YAML mapping");
  }

  return Object.fromEntries(Object.entries(parsed));
}
