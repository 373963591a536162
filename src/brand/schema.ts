/*
Purpose: typed view of a brand document.
Assumptions: every section is optional; unknown nested keys pass through, unknown top-level keys land in `extensions`.
Usage: const { config, extensions } = parseBrandDocument(document, "acme").
*/

import { z } from "zod";

import { ValidationError } from "../core/errors.js";
import { DocumentValueSchema, omitKeys, type DocumentMap } from "../store/document.js";

// =============================================================================
// SECTIONS
// =============================================================================

const CssValueSchema = z.union([z.string(), z.number()]);

export const ProtectionLevelSchema = z.enum(["none", "warn", "strict"]);

export const BrandStatusSchema = z.enum(["active", "archived"]);

const BrandInfoSchema = z
  .object({
    name: z.string().optional(),
    tagline: z.string().optional(),
    website: z.string().optional(),
    community: z.string().optional(),
  })
  .passthrough();

const TypographySchema = z
  .object({
    primary_font: z.string().optional(),
    secondary_font: z.string().optional(),
    fallback: z.string().optional(),
    sizes: z.record(z.string(), CssValueSchema).optional(),
    weights: z.record(z.string(), CssValueSchema).optional(),
  })
  .passthrough();

const AssetEntrySchema = z.union([z.string(), z.array(z.string()), z.null()]);

const ComplianceSchema = z
  .object({
    required_colors: z.array(z.string()).optional(),
    required_fonts: z.array(z.string()).optional(),
    required_assets: z.array(z.string()).optional(),
    max_color_variations: z.number().int().nonnegative().optional(),
  })
  .passthrough();

const MetadataSchema = z
  .object({
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    version: z.string().optional(),
    status: z.string().optional(),
    template_source: z.string().nullable().optional(),
  })
  .passthrough();

const SectionMapSchema = z.record(z.string(), DocumentValueSchema);

// =============================================================================
// DOCUMENT
// =============================================================================

export const BrandDocumentSchema = z.object({
  brand: BrandInfoSchema.optional(),
  colors: z.record(z.string(), z.string()).optional(),
  typography: TypographySchema.optional(),
  layout: z.record(z.string(), CssValueSchema).optional(),
  assets: z.record(z.string(), AssetEntrySchema).optional(),
  templates: z.record(z.string(), z.string()).optional(),
  template_options: z.record(z.string(), SectionMapSchema).optional(),
  pdf_settings: SectionMapSchema.optional(),
  compliance: ComplianceSchema.optional(),
  metadata: MetadataSchema.optional(),
  is_protected: z.boolean().optional(),
  protection_level: ProtectionLevelSchema.optional(),
  protected_by: z.string().nullable().optional(),
  protected_at: z.string().nullable().optional(),
  protection_reason: z.string().optional(),
});

export type BrandDocument = z.infer<typeof BrandDocumentSchema>;
export type ProtectionLevel = z.infer<typeof ProtectionLevelSchema>;
export type BrandStatus = z.infer<typeof BrandStatusSchema>;

export const KNOWN_SECTIONS: readonly string[] = Object.keys(BrandDocumentSchema.shape);

export type ParsedBrandDocument = {
  config: BrandDocument;
  extensions: DocumentMap;
};

export function parseBrandDocument(document: DocumentMap, entity: string): ParsedBrandDocument {
  const parsed = BrandDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Malformed document for '${entity}': ${details}`, entity, parsed.error);
  }

  return {
    config: parsed.data,
    extensions: omitKeys(document, KNOWN_SECTIONS),
  };
}
