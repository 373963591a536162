/*
Purpose: the `template_info` block of a preset document and the checks run against it.
Assumptions: asset lists are derived from the preset's own `assets` and `compliance` sections.
*/

import path from "node:path";

import { z } from "zod";

import { assetEntryPaths } from "../brand/asset-paths.js";
import { documentSection, type DocumentMap } from "../store/document.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const TEMPLATE_INFO_KEY = "template_info";

export const TemplateInfoSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().default(""),
    category: z.string().default("custom"),
    version: z.string().default("1.0.0"),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    features: z.array(z.string()).default([]),
    required_assets: z.array(z.string()).default([]),
    optional_assets: z.array(z.string()).default([]),
  })
  .passthrough();

export type TemplateInfo = z.infer<typeof TemplateInfoSchema>;

// Sections whose change bumps a template's minor version.
export const TEMPLATE_IMPACT_SECTIONS: ReadonlySet<string> = new Set([
  "brand",
  "colors",
  "typography",
  "assets",
  "compliance",
]);

const OPTIONAL_ASSET_ROLES = ["watermark", "favicon", "background"] as const;
const REQUIRED_INFO_FIELDS = ["name", "description", "category"] as const;
const MAX_REQUIRED_ASSETS = 20;

// =============================================================================
// ASSET EXTRACTION
// =============================================================================

function dedupe(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function extractRequiredAssets(document: DocumentMap): string[] {
  const required: string[] = [];
  for (const value of Object.values(documentSection(document, "assets"))) {
    required.push(...assetEntryPaths(value));
  }
  required.push(...assetEntryPaths(documentSection(document, "compliance").required_assets));
  return dedupe(required);
}

export function extractOptionalAssets(document: DocumentMap): string[] {
  const assets = documentSection(document, "assets");
  return dedupe(OPTIONAL_ASSET_ROLES.flatMap((role) => assetEntryPaths(assets[role])));
}

// =============================================================================
// VALIDATION
// =============================================================================

export function validateTemplateStructure(document: DocumentMap): string[] {
  const issues: string[] = [];
  for (const section of ["brand", "colors"]) {
    if (!(section in document)) {
      issues.push(`Missing required section: ${section}`);
    }
  }

  if (!(TEMPLATE_INFO_KEY in document)) {
    issues.push(`Missing ${TEMPLATE_INFO_KEY} section`);
    return issues;
  }

  const info = documentSection(document, TEMPLATE_INFO_KEY);
  for (const field of REQUIRED_INFO_FIELDS) {
    if (!(field in info)) {
      issues.push(`Missing ${TEMPLATE_INFO_KEY} field: ${field}`);
    }
  }
  return issues;
}

function standardAssetType(assetPath: string): "image" | "font" | "css" | null {
  const ext = path.extname(assetPath).toLowerCase();
  if ([".png", ".jpg", ".jpeg", ".svg"].includes(ext)) return "image";
  if ([".woff", ".woff2", ".ttf", ".otf"].includes(ext)) return "font";
  if (ext === ".css") return "css";
  return null;
}

export function validateTemplateAssets(info: TemplateInfo): string[] {
  const issues: string[] = [];
  if (info.required_assets.length > MAX_REQUIRED_ASSETS) {
    issues.push(`Template requires too many assets (>${MAX_REQUIRED_ASSETS})`);
  }

  const types = [...info.required_assets, ...info.optional_assets].map(standardAssetType);
  if (!types.some((type) => type !== null)) {
    issues.push("Template doesn't specify any standard asset types");
  }
  return issues;
}
