import fse from "fs-extra";
import type { Command } from "commander";

import { AssetRegistry } from "../assets/asset-registry.js";
import { BrandRegistry } from "../brand/brand-registry.js";
import type { ResolvedRegistryConfig } from "../core/config.js";
import { loadRegistryConfig } from "../core/config-loader.js";
import { InvalidArgumentError } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import { parseDocument } from "../store/document-store.js";
import type { DocumentMap } from "../store/document.js";
import { TemplateCatalog } from "../templates/template-catalog.js";

import { reportCommandError, type OutputOptions } from "./output.js";

export type CliGlobalOptions = {
  config?: string;
  root?: string;
  templates?: string;
  json?: boolean;
  debug?: boolean;
};

export type RegistryContext = {
  config: ResolvedRegistryConfig;
  logger?: JsonlLogger;
  templates: TemplateCatalog;
  brands: BrandRegistry;
  assets: AssetRegistry;
};

export type DocumentInputOptions = {
  data?: string;
  file?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function createRegistryContext(config: ResolvedRegistryConfig): RegistryContext {
  const logger = config.logFile ? new JsonlLogger(config.logFile) : undefined;
  const templates = new TemplateCatalog({ templatesRoot: config.templatesRoot, logger });
  const brands = new BrandRegistry({ brandsRoot: config.brandsRoot, templates, logger });
  const assets = new AssetRegistry({ brands, maxBytes: config.maxAssetBytes, logger });
  return { config, logger, templates, brands, assets };
}

export function resolveGlobalOptions(command: Command): CliGlobalOptions {
  return command.optsWithGlobals() as CliGlobalOptions;
}

export async function runCommand(
  command: Command,
  task: (context: RegistryContext, output: OutputOptions) => Promise<void>,
): Promise<void> {
  const globals = resolveGlobalOptions(command);
  const output: OutputOptions = { json: globals.json ?? false, debug: globals.debug ?? false };

  try {
    const config = loadRegistryConfig({
      configPath: globals.config,
      overrides: { brandsRoot: globals.root, templatesRoot: globals.templates },
    });
    await task(createRegistryContext(config), output);
  } catch (err) {
    reportCommandError(err, output);
  }
}

// =============================================================================
// DOCUMENT INPUT
// =============================================================================

// Inline YAML (or JSON) from --data, or a file from --file.
export async function readDocumentInput(
  options: DocumentInputOptions,
  label: string,
): Promise<DocumentMap | undefined> {
  if (options.data !== undefined && options.file !== undefined) {
    throw new InvalidArgumentError(`Pass either --data or --file for the ${label}, not both`);
  }
  if (options.data !== undefined) {
    return parseDocument(options.data, "--data");
  }
  if (options.file !== undefined) {
    return parseDocument(await fse.readFile(options.file, "utf8"), options.file);
  }
  return undefined;
}

export async function requireDocumentInput(
  options: DocumentInputOptions,
  label: string,
): Promise<DocumentMap> {
  const document = await readDocumentInput(options, label);
  if (!document) {
    throw new InvalidArgumentError(`The ${label} is required: pass --data or --file`);
  }
  return document;
}
