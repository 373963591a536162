import type { BrandDocument } from "./schema.js";

const toCssName = (token: string): string => token.replace(/_/g, "-");

// `:root { ... }` block of custom properties read by the rendering layer.
export function generateCssVariables(config: BrandDocument): string {
  const lines = [":root {"];
  const typography = config.typography;
  const fallback = typography?.fallback ?? "sans-serif";

  for (const [name, value] of Object.entries(config.colors ?? {})) {
    lines.push(`  --color-${toCssName(name)}: ${value};`);
  }

  if (typography?.primary_font !== undefined) {
    lines.push(`  --font-primary: '${typography.primary_font}', ${fallback};`);
  }
  if (typography?.secondary_font !== undefined) {
    lines.push(`  --font-secondary: '${typography.secondary_font}', ${fallback};`);
  }

  for (const [name, value] of Object.entries(typography?.sizes ?? {})) {
    lines.push(`  --font-size-${toCssName(name)}: ${value};`);
  }
  for (const [name, value] of Object.entries(typography?.weights ?? {})) {
    lines.push(`  --font-weight-${toCssName(name)}: ${value};`);
  }

  for (const [name, value] of Object.entries(config.layout ?? {})) {
    lines.push(`  --layout-${toCssName(name)}: ${value};`);
  }

  lines.push("}");
  return lines.join("\n");
}
