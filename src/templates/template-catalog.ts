/*
Purpose: named preset documents used to seed new brands.
Assumptions: one directory per template under the templates root, holding template_config.yaml and an optional assets/ tree.
Usage: const catalog = new TemplateCatalog({ templatesRoot }); await catalog.create("corporate", preset, { category: "business" }).
*/

import path from "node:path";

import fse from "fs-extra";

import { mergeDocuments } from "../brand/merge.js";
import { assertSafePathSegment, assertValidEntityName } from "../brand/name.js";
import { nextVersion } from "../brand/version.js";
import {
  AlreadyExistsError,
  InvalidArgumentError,
  NotFoundError,
  ValidationError,
  wrapInternalError,
} from "../core/errors.js";
import { logRegistryEvent, type JsonlLogger } from "../core/logger.js";
import { ASSETS_DIR, entityDir, templateDocumentPath } from "../core/paths.js";
import { compareStrings, withReadRetry } from "../core/utils.js";
import { documentExists, loadDocument, saveDocument } from "../store/document-store.js";
import { documentSection, omitKeys, type DocumentMap } from "../store/document.js";

import {
  extractOptionalAssets,
  extractRequiredAssets,
  TEMPLATE_IMPACT_SECTIONS,
  TEMPLATE_INFO_KEY,
  TemplateInfoSchema,
  validateTemplateAssets,
  validateTemplateStructure,
  type TemplateInfo,
} from "./template-info.js";

// =============================================================================
// TYPES
// =============================================================================

export type Template = {
  name: string;
  description: string;
  category: string;
  version: string;
  createdAt?: string;
  updatedAt?: string;
  features: string[];
  requiredAssets: string[];
  optionalAssets: string[];
  dir: string;
  document: DocumentMap;
};

export type TemplateSummary = Omit<Template, "dir" | "document" | "createdAt" | "updatedAt">;

export type CreateTemplateOptions = {
  description?: string;
  category?: string;
  features?: string[];
};

export type TemplateCreationResult = {
  name: string;
  path: string;
  category: string;
  version: string;
  warnings: string[];
};

export type TemplateListing = {
  templates: TemplateSummary[];
  categories: string[];
  categoryFilter?: string;
};

export type TemplateUpdateResult = {
  name: string;
  updatedFields: string[];
  version: string;
  warnings: string[];
};

export type TemplateDeletionResult = {
  name: string;
  category?: string;
  version?: string;
};

export type TemplateIssue = {
  type: "structure" | "asset";
  message: string;
};

export type TemplateValidationReport = {
  name: string;
  status: "valid" | "warning" | "error";
  issues: TemplateIssue[];
};

export type TemplateCatalogOptions = {
  templatesRoot: string;
  logger?: JsonlLogger;
  clock?: () => Date;
};

// =============================================================================
// CATALOG
// =============================================================================

export class TemplateCatalog {
  readonly templatesRoot: string;
  private readonly logger?: JsonlLogger;
  private readonly clock: () => Date;

  constructor(options: TemplateCatalogOptions) {
    this.templatesRoot = path.resolve(options.templatesRoot);
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  templateDir(name: string): string {
    assertSafePathSegment(name, "template");
    return entityDir(this.templatesRoot, name);
  }

  async create(
    name: string,
    document: DocumentMap,
    options: CreateTemplateOptions = {},
  ): Promise<TemplateCreationResult> {
    assertValidEntityName(name, "template");
    const dir = this.templateDir(name);
    if (await fse.pathExists(dir)) {
      throw new AlreadyExistsError(`Template '${name}' already exists`, name);
    }

    const category = options.category ?? "custom";
    const preset: DocumentMap = {
      ...document,
      [TEMPLATE_INFO_KEY]: {
        ...documentSection(document, TEMPLATE_INFO_KEY),
        name,
        description: options.description ?? "",
        category,
        version: "1.0.0",
        created_at: this.clock().toISOString(),
        features: options.features ?? [],
        required_assets: extractRequiredAssets(document),
        optional_assets: extractOptionalAssets(document),
      },
    };
    const warnings = validateTemplateStructure(preset);

    try {
      await fse.ensureDir(dir);
      await saveDocument(templateDocumentPath(dir), preset);
      if (Object.keys(documentSection(preset, "assets")).length > 0) {
        await fse.ensureDir(path.join(dir, ASSETS_DIR));
      }
    } catch (err) {
      await fse.remove(dir);
      throw wrapInternalError(err, `Failed to create template '${name}'`, name);
    }

    logRegistryEvent(this.logger, "template.create", { template: name, category });
    return { name, path: dir, category, version: "1.0.0", warnings };
  }

  async load(name: string): Promise<Template> {
    const dir = this.templateDir(name);
    let document: DocumentMap;
    try {
      document = await withReadRetry(() => loadDocument(templateDocumentPath(dir)));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError(`Template '${name}' not found`, name, err);
      }
      throw wrapInternalError(err, `Failed to load template '${name}'`, name);
    }

    const info = parseTemplateInfo(name, document);
    return {
      name: info.name ?? name,
      description: info.description,
      category: info.category,
      version: info.version,
      createdAt: info.created_at,
      updatedAt: info.updated_at,
      features: info.features,
      requiredAssets: info.required_assets,
      optionalAssets: info.optional_assets,
      dir,
      document,
    };
  }

  // The preset sections a brand is seeded from.
  async loadPreset(name: string): Promise<DocumentMap> {
    const template = await this.load(name);
    return omitKeys(template.document, [TEMPLATE_INFO_KEY]);
  }

  async list(categoryFilter?: string): Promise<TemplateListing> {
    const templates: TemplateSummary[] = [];
    const categories = new Set<string>();

    for (const name of await this.templateNames()) {
      let template: Template;
      try {
        template = await this.load(name);
      } catch (err) {
        logRegistryEvent(this.logger, "template.load.failed", {
          template: name,
          message: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      categories.add(template.category);
      if (categoryFilter !== undefined && template.category !== categoryFilter) continue;

      templates.push({
        name: template.name,
        description: template.description,
        category: template.category,
        version: template.version,
        features: template.features,
        requiredAssets: template.requiredAssets,
        optionalAssets: template.optionalAssets,
      });
    }

    templates.sort(
      (a, b) => compareStrings(a.category, b.category) || compareStrings(a.name, b.name),
    );

    return {
      templates,
      categories: Array.from(categories).sort(compareStrings),
      ...(categoryFilter !== undefined ? { categoryFilter } : {}),
    };
  }

  async update(name: string, partial: DocumentMap): Promise<TemplateUpdateResult> {
    const current = await this.load(name);
    const merged = mergeDocuments(current.document, partial);

    const changed = Object.keys(partial);
    const info = parseTemplateInfo(name, merged);
    const version = nextVersion(info.version, changed, TEMPLATE_IMPACT_SECTIONS);
    const infoUpdates: DocumentMap = { updated_at: this.clock().toISOString(), version };
    if (changed.includes("assets")) {
      infoUpdates.required_assets = extractRequiredAssets(merged);
      infoUpdates.optional_assets = extractOptionalAssets(merged);
    }

    const updated = mergeDocuments(merged, { [TEMPLATE_INFO_KEY]: infoUpdates });
    const warnings = validateTemplateStructure(updated);

    try {
      await saveDocument(templateDocumentPath(current.dir), updated);
    } catch (err) {
      throw wrapInternalError(err, `Failed to update template '${name}'`, name);
    }

    logRegistryEvent(this.logger, "template.update", { template: name, version });
    return { name, updatedFields: changed, version, warnings };
  }

  async delete(name: string, options: { confirm?: boolean } = {}): Promise<TemplateDeletionResult> {
    if (!options.confirm) {
      throw new InvalidArgumentError(`Deleting template '${name}' requires confirmation`, name);
    }

    const dir = this.templateDir(name);
    if (!(await fse.pathExists(dir))) {
      throw new NotFoundError(`Template '${name}' not found`, name);
    }

    // An unreadable preset can still be deleted.
    let result: TemplateDeletionResult = { name };
    try {
      const template = await this.load(name);
      result = { name, category: template.category, version: template.version };
    } catch (err) {
      logRegistryEvent(this.logger, "template.load.failed", {
        template: name,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    try {
      await fse.remove(dir);
    } catch (err) {
      throw wrapInternalError(err, `Failed to delete template '${name}'`, name);
    }

    logRegistryEvent(this.logger, "template.delete", { template: name });
    return result;
  }

  async validate(name: string): Promise<TemplateValidationReport> {
    let template: Template;
    try {
      template = await this.load(name);
    } catch (err) {
      if (err instanceof ValidationError) {
        return { name, status: "error", issues: [{ type: "structure", message: err.message }] };
      }
      throw err;
    }

    const issues: TemplateIssue[] = [
      ...validateTemplateStructure(template.document).map(
        (message): TemplateIssue => ({ type: "structure", message }),
      ),
      ...validateTemplateAssets(parseTemplateInfo(name, template.document)).map(
        (message): TemplateIssue => ({ type: "asset", message }),
      ),
    ];

    let status: TemplateValidationReport["status"] = "valid";
    if (issues.some((issue) => issue.type === "structure")) {
      status = "error";
    } else if (issues.length > 0) {
      status = "warning";
    }
    return { name, status, issues };
  }

  private async templateNames(): Promise<string[]> {
    if (!(await fse.pathExists(this.templatesRoot))) return [];

    const entries = await fse.readdir(this.templatesRoot);
    const names: string[] = [];
    for (const entry of entries) {
      if (await documentExists(templateDocumentPath(path.join(this.templatesRoot, entry)))) {
        names.push(entry);
      }
    }
    return names.sort(compareStrings);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function parseTemplateInfo(name: string, document: DocumentMap): TemplateInfo {
  const parsed = TemplateInfoSchema.safeParse(documentSection(document, TEMPLATE_INFO_KEY));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || TEMPLATE_INFO_KEY}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Malformed template '${name}': ${details}`, name, parsed.error);
  }
  return parsed.data;
}
