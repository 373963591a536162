import type { DocumentMap } from "../store/document.js";

import type { BrandDocument } from "./schema.js";

export const REQUIRED_SECTIONS = ["brand", "colors"] as const;

// Advisory only: returns warnings, never throws.
export function validateCompliance(config: BrandDocument): string[] {
  const compliance = config.compliance;
  if (!compliance) return [];

  const warnings: string[] = [];
  const colors = config.colors ?? {};

  for (const color of compliance.required_colors ?? []) {
    if (!Object.hasOwn(colors, color)) {
      warnings.push(`Missing required color: ${color}`);
    }
  }

  const availableFonts = [
    config.typography?.primary_font ?? "",
    config.typography?.secondary_font ?? "",
  ];
  for (const font of compliance.required_fonts ?? []) {
    if (!availableFonts.includes(font)) {
      warnings.push(`Missing required font: ${font}`);
    }
  }

  const colorCount = Object.keys(colors).length;
  const ceiling = compliance.max_color_variations;
  if (ceiling !== undefined && colorCount > ceiling) {
    warnings.push(`Too many color variations: ${colorCount} > ${ceiling}`);
  }

  return warnings;
}

export function validateDocumentStructure(document: DocumentMap): string[] {
  return REQUIRED_SECTIONS.filter((section) => !(section in document)).map(
    (section) => `Missing required section: ${section}`,
  );
}
