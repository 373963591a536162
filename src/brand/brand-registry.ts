/*
Purpose: lifecycle of brands stored as one YAML document per directory under the brands root.
Assumptions: a single process; mutations on one brand are serialized through a KeyedMutex; reads are lock-free.
Usage:
  const registry = new BrandRegistry({ brandsRoot, templates });
  await registry.create("acme", { config: { brand: { name: "Acme" } } });
  await registry.update("acme", { colors: { primary: "#112233" } });
*/

import path from "node:path";

import fse from "fs-extra";

import {
  AlreadyExistsError,
  InvalidArgumentError,
  NotFoundError,
  ProtectionError,
  wrapInternalError,
} from "../core/errors.js";
import { walkTree } from "../core/fs-tree.js";
import { sharedBrandLocks, type KeyedMutex } from "../core/keyed-mutex.js";
import { logRegistryEvent, type JsonlLogger } from "../core/logger.js";
import {
  ASSETS_DIR,
  BRAND_LAYOUT_DIRS,
  TEMPLATES_DIR,
  brandDocumentPath,
  deletionArchivePath,
  entityDir,
} from "../core/paths.js";
import {
  compareStrings,
  formatBackupTimestamp,
  toPosixPath,
  withReadRetry,
} from "../core/utils.js";
import { documentExists, loadDocument, saveDocument } from "../store/document-store.js";
import { documentSection, type DocumentMap } from "../store/document.js";
import type { TemplateCatalog } from "../templates/template-catalog.js";

import { resolveAssetPaths, type AssetResolution } from "./asset-paths.js";
import { archiveDirectory, snapshotDocument } from "./backup.js";
import { validateCompliance, validateDocumentStructure } from "./compliance.js";
import { generateCssVariables } from "./css-variables.js";
import { mergeDocuments } from "./merge.js";
import { assertSafePathSegment, assertValidEntityName, displayNameFromId } from "./name.js";
import {
  assertActor,
  buildLockFields,
  buildUnlockFields,
  checkProtection,
  isProtectionLevel,
  protectionStatus,
  readProtection,
  stripProtection,
  type GuardedOperation,
  type ProtectionRecord,
  type ProtectionStatus,
} from "./protection.js";
import {
  BrandStatusSchema,
  parseBrandDocument,
  type BrandDocument,
  type BrandStatus,
  type ProtectionLevel,
} from "./schema.js";
import { INITIAL_VERSION, nextVersion } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type Brand = {
  name: string;
  displayName: string;
  dir: string;
  document: DocumentMap;
  config: BrandDocument;
  extensions: DocumentMap;
  version: string;
  status: string;
  templateSource: string | null;
  createdAt?: string;
  updatedAt?: string;
  protection: ProtectionRecord;
  assets: Record<string, string | string[]>;
  assetResolution: AssetResolution[];
  cssVariables: string;
  warnings: string[];
};

export type CreateBrandOptions = {
  config?: DocumentMap;
  templateName?: string;
  overrides?: DocumentMap;
  copyFrom?: string;
};

export type CreationResult = {
  name: string;
  path: string;
  version: string;
  templateSource: string | null;
  createdFiles: string[];
  warnings: string[];
};

export type UpdateOptions = {
  createBackup?: boolean;
  force?: boolean;
};

export type UpdateResult = {
  name: string;
  backupPath: string | null;
  updatedFields: string[];
  previousVersion: string;
  version: string;
  warnings: string[];
};

export type DeleteOptions = {
  confirm?: boolean;
  force?: boolean;
  createBackup?: boolean;
};

export type DeletionResult = {
  name: string;
  archivePath: string | null;
  deletedFiles: string[];
  filesDeleted: number;
  directoriesDeleted: number;
  bytesDeleted: number;
  forced: boolean;
  warnings: string[];
};

export type ListOptions = {
  detailed?: boolean;
  status?: string;
};

export type BrandSummary = {
  name: string;
  displayName: string;
  status: string;
  version: string;
  templateSource?: string | null;
  createdAt?: string;
  updatedAt?: string;
  assetCount?: number;
  assetBytes?: number;
};

export type BrandListing = {
  brands: BrandSummary[];
  statuses: string[];
  statusFilter?: string;
};

export type LockOptions = {
  reason?: string;
  by: string;
};

export type LockResult = {
  name: string;
  level: ProtectionLevel;
  protectedBy: string;
  protectedAt: string;
  reason: string;
  version: string;
};

export type UnlockResult = {
  name: string;
  unlockedBy: string;
  unlockedAt: string;
  version: string;
};

export type BrandRegistryOptions = {
  brandsRoot: string;
  templates?: TemplateCatalog;
  logger?: JsonlLogger;
  locks?: KeyedMutex;
  clock?: () => Date;
};

// =============================================================================
// REGISTRY
// =============================================================================

export class BrandRegistry {
  readonly brandsRoot: string;
  private readonly templates?: TemplateCatalog;
  private readonly logger?: JsonlLogger;
  private readonly locks: KeyedMutex;
  private readonly clock: () => Date;

  constructor(options: BrandRegistryOptions) {
    this.brandsRoot = path.resolve(options.brandsRoot);
    this.templates = options.templates;
    this.logger = options.logger;
    this.locks = options.locks ?? sharedBrandLocks;
    this.clock = options.clock ?? (() => new Date());
  }

  brandDir(name: string): string {
    assertSafePathSegment(name);
    return entityDir(this.brandsRoot, name);
  }

  async requireBrandDir(name: string): Promise<string> {
    const dir = this.brandDir(name);
    if (!(await fse.pathExists(dir))) {
      throw new NotFoundError(`Brand '${name}' not found`, name);
    }
    return dir;
  }

  // One mutating operation per brand at a time, across every registry sharing the mutex.
  async withBrandLock<T>(name: string, task: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(this.brandDir(name), task);
  }

  // ---------------------------------------------------------------------------
  // CREATE
  // ---------------------------------------------------------------------------

  async create(name: string, options: CreateBrandOptions = {}): Promise<CreationResult> {
    assertValidEntityName(name);
    return this.withBrandLock(name, () => this.createUnlocked(name, options));
  }

  private async createUnlocked(name: string, options: CreateBrandOptions): Promise<CreationResult> {
    const dir = this.brandDir(name);
    if (await fse.pathExists(dir)) {
      throw new AlreadyExistsError(`Brand '${name}' already exists`, name);
    }

    try {
      for (const layoutDir of BRAND_LAYOUT_DIRS) {
        await fse.ensureDir(path.join(dir, layoutDir));
      }

      let document: DocumentMap = {};
      let templateSource: string | null = null;

      if (options.copyFrom !== undefined) {
        document = await this.copyBrandContents(options.copyFrom, dir);
        templateSource = options.copyFrom;
      } else if (options.templateName !== undefined) {
        document = await this.requireTemplates(name).loadPreset(options.templateName);
        templateSource = options.templateName;
      }

      if (options.config) document = mergeDocuments(document, options.config);
      if (options.overrides) document = mergeDocuments(document, options.overrides);

      const now = this.clock().toISOString();
      document = mergeDocuments(document, {
        metadata: {
          created_at: now,
          updated_at: now,
          version: INITIAL_VERSION,
          status: "active",
          template_source: templateSource,
        },
      });

      const info = documentSection(document, "brand");
      if (typeof info.name !== "string") {
        document = mergeDocuments(document, { brand: { name: displayNameFromId(name) } });
      }

      parseBrandDocument(document, name);
      await saveDocument(brandDocumentPath(dir), document);

      const inventory = await walkTree(dir);
      const createdFiles = [
        ...inventory.directories.map((entry) => `${toPosixPath(path.relative(dir, entry))}/`),
        ...inventory.files.map((file) => file.relativePath),
      ].sort(compareStrings);

      logRegistryEvent(this.logger, "brand.create", {
        brand: name,
        template_source: templateSource,
      });

      return {
        name,
        path: dir,
        version: INITIAL_VERSION,
        templateSource,
        createdFiles,
        warnings: validateDocumentStructure(document),
      };
    } catch (err) {
      await fse.remove(dir);
      throw wrapInternalError(err, `Failed to create brand '${name}'`, name);
    }
  }

  // Source document without its protection, plus its assets/ and templates/ trees.
  private async copyBrandContents(source: string, targetDir: string): Promise<DocumentMap> {
    const sourceDir = this.brandDir(source);
    if (!(await fse.pathExists(sourceDir))) {
      throw new NotFoundError(`Source brand '${source}' not found`, source);
    }

    const document = stripProtection(await this.readDocument(source, sourceDir));
    for (const subdir of [ASSETS_DIR, TEMPLATES_DIR]) {
      const from = path.join(sourceDir, subdir);
      if (await fse.pathExists(from)) {
        await fse.copy(from, path.join(targetDir, subdir), { overwrite: true });
      }
    }
    return document;
  }

  private requireTemplates(name: string): TemplateCatalog {
    if (!this.templates) {
      throw new InvalidArgumentError(
        `Brand '${name}' cannot be created from a template: no template catalog configured`,
        name,
      );
    }
    return this.templates;
  }

  // ---------------------------------------------------------------------------
  // READ
  // ---------------------------------------------------------------------------

  async load(name: string): Promise<Brand> {
    const dir = this.brandDir(name);
    const document = await this.readDocument(name, dir);
    const { config, extensions } = parseBrandDocument(document, name);

    const resolved = await resolveAssetPaths(dir, documentSection(document, "assets"));
    for (const entry of resolved.resolution) {
      if (!entry.resolved) {
        logRegistryEvent(this.logger, "brand.asset.missing", {
          brand: name,
          role: entry.role,
          path: entry.path,
        });
      }
    }

    return {
      name,
      displayName: config.brand?.name ?? name,
      dir,
      document,
      config,
      extensions,
      version: config.metadata?.version ?? INITIAL_VERSION,
      status: config.metadata?.status ?? "active",
      templateSource: config.metadata?.template_source ?? null,
      createdAt: config.metadata?.created_at,
      updatedAt: config.metadata?.updated_at,
      protection: readProtection(config),
      assets: resolved.assets,
      assetResolution: resolved.resolution,
      cssVariables: generateCssVariables(config),
      warnings: resolved.warnings,
    };
  }

  async list(options: ListOptions = {}): Promise<BrandListing> {
    const brands: BrandSummary[] = [];
    const statuses = new Set<string>();

    for (const name of await this.brandNames()) {
      const dir = entityDir(this.brandsRoot, name);
      let config: BrandDocument;
      try {
        config = parseBrandDocument(await this.readDocument(name, dir), name).config;
      } catch (err) {
        logRegistryEvent(this.logger, "brand.load.failed", {
          brand: name,
          message: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      const status = config.metadata?.status ?? "active";
      statuses.add(status);
      if (options.status !== undefined && status !== options.status) continue;

      const summary: BrandSummary = {
        name,
        displayName: config.brand?.name ?? name,
        status,
        version: config.metadata?.version ?? INITIAL_VERSION,
      };

      if (options.detailed) {
        const inventory = await walkTree(path.join(dir, ASSETS_DIR));
        summary.templateSource = config.metadata?.template_source ?? null;
        summary.createdAt = config.metadata?.created_at;
        summary.updatedAt = config.metadata?.updated_at;
        summary.assetCount = inventory.files.length;
        summary.assetBytes = inventory.totalBytes;
      }

      brands.push(summary);
    }

    return {
      brands,
      statuses: Array.from(statuses).sort(compareStrings),
      ...(options.status !== undefined ? { statusFilter: options.status } : {}),
    };
  }

  async protectionStatus(name: string): Promise<ProtectionStatus> {
    const brand = await this.load(name);
    return protectionStatus(brand.protection);
  }

  validateCompliance(brand: Brand): string[] {
    return validateCompliance(brand.config);
  }

  cssVariables(brand: Brand): string {
    return generateCssVariables(brand.config);
  }

  // ---------------------------------------------------------------------------
  // UPDATE
  // ---------------------------------------------------------------------------

  async update(name: string, partial: DocumentMap, options: UpdateOptions = {}): Promise<UpdateResult> {
    return this.withBrandLock(name, () => this.updateUnlocked(name, partial, options));
  }

  private async updateUnlocked(
    name: string,
    partial: DocumentMap,
    options: UpdateOptions,
  ): Promise<UpdateResult> {
    const dir = await this.requireBrandDir(name);
    const warnings = options.force ? [] : await this.guardMutation(name, dir, "update");

    try {
      const current = await this.readDocument(name, dir);
      const metadata = documentSection(current, "metadata");
      const previousVersion =
        typeof metadata.version === "string" ? metadata.version : INITIAL_VERSION;
      const updatedFields = Object.keys(partial);
      const version = nextVersion(previousVersion, updatedFields);

      const updated = mergeDocuments(mergeDocuments(current, partial), {
        metadata: { updated_at: this.clock().toISOString(), version },
      });
      parseBrandDocument(updated, name);

      const backupPath =
        options.createBackup === false ? null : await snapshotDocument(dir, current, this.clock());
      await saveDocument(brandDocumentPath(dir), updated);

      logRegistryEvent(this.logger, "brand.update", {
        brand: name,
        fields: updatedFields,
        version,
        forced: options.force === true,
      });

      return {
        name,
        backupPath,
        updatedFields,
        previousVersion,
        version,
        warnings: [...warnings, ...validateDocumentStructure(updated)],
      };
    } catch (err) {
      throw wrapInternalError(err, `Failed to update brand '${name}'`, name);
    }
  }

  async setStatus(name: string, status: string): Promise<UpdateResult> {
    const parsed = BrandStatusSchema.safeParse(status);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        `Unknown status '${status}' for brand '${name}'; expected ${BrandStatusSchema.options.join(" or ")}`,
        name,
      );
    }
    const next: BrandStatus = parsed.data;
    return this.update(name, { metadata: { status: next } });
  }

  // ---------------------------------------------------------------------------
  // PROTECTION OVERRIDES
  // ---------------------------------------------------------------------------

  async lock(name: string, level: string, options: LockOptions): Promise<LockResult> {
    if (!isProtectionLevel(level)) {
      throw new InvalidArgumentError(
        `Protection level must be 'strict', 'warn' or 'none', got '${level}'`,
        name,
      );
    }
    const actor = assertActor(options.by, name);
    const fields = buildLockFields(level, options.reason ?? "", actor, this.clock());

    const result = await this.withBrandLock(name, () =>
      this.updateUnlocked(name, fields, { force: true }),
    );

    logRegistryEvent(this.logger, "brand.lock", { brand: name, level, by: actor });
    return {
      name,
      level,
      protectedBy: actor,
      protectedAt: fields.protected_at,
      reason: fields.protection_reason,
      version: result.version,
    };
  }

  async unlock(name: string, options: { by: string }): Promise<UnlockResult> {
    const actor = assertActor(options.by, name);
    const result = await this.withBrandLock(name, () =>
      this.updateUnlocked(name, buildUnlockFields(), { force: true }),
    );

    logRegistryEvent(this.logger, "brand.unlock", { brand: name, by: actor });
    return {
      name,
      unlockedBy: actor,
      unlockedAt: this.clock().toISOString(),
      version: result.version,
    };
  }

  // ---------------------------------------------------------------------------
  // DELETE
  // ---------------------------------------------------------------------------

  async delete(name: string, options: DeleteOptions = {}): Promise<DeletionResult> {
    if (!options.confirm && !options.force) {
      throw new InvalidArgumentError(`Deleting brand '${name}' requires confirmation`, name);
    }
    return this.withBrandLock(name, () => this.deleteUnlocked(name, options));
  }

  private async deleteUnlocked(name: string, options: DeleteOptions): Promise<DeletionResult> {
    const dir = await this.requireBrandDir(name);
    const forced = options.force === true;
    const warnings = forced ? [] : await this.guardMutation(name, dir, "delete");

    try {
      const inventory = await walkTree(dir);

      let archivePath: string | null = null;
      if (options.createBackup !== false && !forced) {
        const target = deletionArchivePath(this.brandsRoot, name, formatBackupTimestamp(this.clock()));
        archivePath = await archiveDirectory(dir, target);
      }

      await fse.remove(dir);

      logRegistryEvent(this.logger, "brand.delete", {
        brand: name,
        files: inventory.files.length,
        bytes: inventory.totalBytes,
        archive: archivePath,
        forced,
      });

      return {
        name,
        archivePath,
        deletedFiles: inventory.files.map((file) => file.relativePath),
        filesDeleted: inventory.files.length,
        directoriesDeleted: inventory.directories.length,
        bytesDeleted: inventory.totalBytes,
        forced,
        warnings,
      };
    } catch (err) {
      throw wrapInternalError(err, `Failed to delete brand '${name}'`, name);
    }
  }

  // ---------------------------------------------------------------------------
  // INTERNALS
  // ---------------------------------------------------------------------------

  private async readDocument(name: string, dir: string): Promise<DocumentMap> {
    try {
      return await withReadRetry(() => loadDocument(brandDocumentPath(dir)));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Brand '${name}' not found`, name, err);
      }
      throw wrapInternalError(err, `Failed to read brand '${name}'`, name);
    }
  }

  // Fails closed: a document that cannot be read or parsed blocks the mutation.
  private async guardMutation(
    name: string,
    dir: string,
    operation: GuardedOperation,
  ): Promise<string[]> {
    let record: ProtectionRecord;
    try {
      const document = await this.readDocument(name, dir);
      record = readProtection(parseBrandDocument(document, name).config);
    } catch (err) {
      if (err instanceof NotFoundError) return [];
      throw new ProtectionError(
        `Unable to verify protection status for brand '${name}'; ${operation} blocked`,
        name,
        err,
      );
    }

    const decision = checkProtection(name, record, operation);
    if (!decision.warning) return [];

    logRegistryEvent(this.logger, "brand.protection.warn", {
      brand: name,
      operation,
      message: decision.warning,
    });
    return [decision.warning];
  }

  private async brandNames(): Promise<string[]> {
    if (!(await fse.pathExists(this.brandsRoot))) return [];

    const names: string[] = [];
    for (const entry of await fse.readdir(this.brandsRoot)) {
      const dir = path.join(this.brandsRoot, entry);
      if (await documentExists(brandDocumentPath(dir))) {
        names.push(entry);
      }
    }
    return names.sort(compareStrings);
  }
}
