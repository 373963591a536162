/*
Purpose: locate, parse and validate brand-registry.yaml, then apply environment and CLI overrides.
Assumptions: relative paths in the file resolve against the file's directory; overrides resolve against the working directory.
Usage: const config = loadRegistryConfig({ configPath: opts.config, overrides: { brandsRoot: opts.root } }).
*/

import fs from "node:fs";
import path from "node:path";

import { CORE_SCHEMA, load } from "js-yaml";

import { RegistryConfigSchema, type ResolvedRegistryConfig } from "./config.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

export const CONFIG_FILE_NAME = "brand-registry.yaml";

export const CONFIG_ENV = {
  brandsRoot: "BRAND_REGISTRY_ROOT",
  templatesRoot: "BRAND_REGISTRY_TEMPLATES",
  logFile: "BRAND_REGISTRY_LOG",
} as const;

export type ConfigOverrides = {
  brandsRoot?: string;
  templatesRoot?: string;
  logFile?: string;
};

// =============================================================================
// DISCOVERY
// =============================================================================

export function findConfigFile(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

// =============================================================================
// LOADING
// =============================================================================

export function loadRegistryConfig(
  args: {
    configPath?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: ConfigOverrides;
  } = {},
): ResolvedRegistryConfig {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;

  const configPath = args.configPath ? path.resolve(cwd, args.configPath) : findConfigFile(cwd);
  if (args.configPath && configPath && !fs.existsSync(configPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Registry config missing.",
      message: `Config file not found at ${configPath}.`,
      hint: `Create ${CONFIG_FILE_NAME} or drop --config to use the defaults.`,
    });
  }

  const raw = configPath ? readConfigFile(configPath) : {};
  const parsed = RegistryConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Registry config invalid.",
      message: `${configPath ?? CONFIG_FILE_NAME}: ${details}`,
      hint: "Fix the listed keys; brands_root, templates_root, log_file and assets.max_bytes are supported.",
      cause: parsed.error,
    });
  }

  const baseDir = configPath ? path.dirname(configPath) : cwd;
  const config = parsed.data;
  const overrides = args.overrides ?? {};

  const pick = (
    flag: string | undefined,
    envName: string,
    fileValue: string | undefined,
  ): string | undefined => {
    if (flag) return path.resolve(cwd, flag);
    const fromEnv = env[envName];
    if (fromEnv) return path.resolve(cwd, fromEnv);
    return fileValue === undefined ? undefined : path.resolve(baseDir, fileValue);
  };

  const logFile = pick(overrides.logFile, CONFIG_ENV.logFile, config.log_file);
  return {
    configPath,
    brandsRoot: pick(overrides.brandsRoot, CONFIG_ENV.brandsRoot, config.brands_root) ?? baseDir,
    templatesRoot:
      pick(overrides.templatesRoot, CONFIG_ENV.templatesRoot, config.templates_root) ?? baseDir,
    ...(logFile ? { logFile } : {}),
    maxAssetBytes: config.assets.max_bytes,
  };
}

function readConfigFile(configPath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Registry config unreadable.",
      message: `Cannot read ${configPath}.`,
      hint: "Check the file permissions.",
      cause: err,
    });
  }

  try {
    return load(text, { schema: CORE_SCHEMA, filename: configPath }) ?? {};
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Registry config invalid.",
      message: `${configPath} is not valid YAML.`,
      hint: "Fix the YAML syntax and retry.",
      cause: err,
    });
  }
}
