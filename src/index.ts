import { Command } from "commander";

import { registerAssetsCommand } from "./cli/assets.js";
import { registerBrandsCommand } from "./cli/brands.js";
import { registerTemplatesCommand } from "./cli/templates.js";

export { AssetRegistry } from "./assets/asset-registry.js";
export type {
  AssetDeletionResult,
  AssetListing,
  AssetValidationReport,
  CleanupSummary,
  UploadResult,
} from "./assets/asset-registry.js";
export { BrandRegistry } from "./brand/brand-registry.js";
export type {
  Brand,
  BrandListing,
  CreationResult,
  DeletionResult,
  LockResult,
  UnlockResult,
  UpdateResult,
} from "./brand/brand-registry.js";
export { mergeDocuments } from "./brand/merge.js";
export { checkProtection, protectionStatus } from "./brand/protection.js";
export { nextVersion } from "./brand/version.js";
export { loadRegistryConfig } from "./core/config-loader.js";
export {
  AlreadyExistsError,
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  ProtectionError,
  RegistryError,
  ValidationError,
} from "./core/errors.js";
export { JsonlLogger } from "./core/logger.js";
export { documentExists, loadDocument, parseDocument, saveDocument } from "./store/document-store.js";
export type { DocumentMap, DocumentValue } from "./store/document.js";
export { TemplateCatalog } from "./templates/template-catalog.js";
export type { Template, TemplateListing } from "./templates/template-catalog.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("brand-registry")
    .description("Versioned brand configurations, templates and assets on the filesystem")
    .option("--config <path>", "Path to brand-registry.yaml")
    .option("--root <dir>", "Brands directory (overrides config)")
    .option("--templates <dir>", "Templates directory (overrides config)")
    .option("--json", "Print results as JSON", false)
    .option("--debug", "Show error causes and stack traces", false);

  registerBrandsCommand(program);
  registerTemplatesCommand(program);
  registerAssetsCommand(program);

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}
