import { z } from "zod";

export const DEFAULT_BRANDS_ROOT = "config/brands";
export const DEFAULT_TEMPLATES_ROOT = "config/templates";
export const DEFAULT_MAX_ASSET_BYTES = 10 * 1024 * 1024;

export const AssetsConfigSchema = z
  .object({
    max_bytes: z.number().int().positive().default(DEFAULT_MAX_ASSET_BYTES),
  })
  .strict();

export const RegistryConfigSchema = z
  .object({
    brands_root: z.string().min(1).default(DEFAULT_BRANDS_ROOT),
    templates_root: z.string().min(1).default(DEFAULT_TEMPLATES_ROOT),
    log_file: z.string().min(1).optional(),
    assets: AssetsConfigSchema.default({}),
  })
  .strict();

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

// Paths are absolute once resolved.
export type ResolvedRegistryConfig = {
  configPath: string | null;
  brandsRoot: string;
  templatesRoot: string;
  logFile?: string;
  maxAssetBytes: number;
};
