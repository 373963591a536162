import type { Command } from "commander";

import type { Brand, BrandListing } from "../brand/brand-registry.js";
import type { ProtectionStatus } from "../brand/protection.js";

import { readDocumentInput, requireDocumentInput, runCommand } from "./context.js";
import { emitResult, printTable, printWarnings } from "./output.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerBrandsCommand(program: Command): void {
  const brands = program.command("brands").description("Create, inspect and maintain brands");

  brands
    .command("list")
    .description("List brands sorted by name")
    .option("--detailed", "Include timestamps, template source and asset totals", false)
    .option("--status <status>", "Only brands with this status")
    .action(async (opts: { detailed: boolean; status?: string }, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const listing = await registry.list({ detailed: opts.detailed, status: opts.status });
        emitResult(listing, output, (value) => printBrandListing(value, opts.detailed));
      });
    });

  brands
    .command("show")
    .description("Show a brand with resolved asset paths")
    .argument("<name>", "Brand name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const brand = await registry.load(name);
        emitResult(summarizeBrand(brand), output, () => printBrand(brand));
      });
    });

  brands
    .command("create")
    .description("Create a brand from a document, a template or an existing brand")
    .argument("<name>", "Brand name")
    .option("--template <name>", "Seed from a template")
    .option("--copy-from <brand>", "Copy document, assets and templates from an existing brand")
    .option("--data <yaml>", "Inline YAML or JSON document")
    .option("--file <path>", "YAML or JSON document file")
    .option("--overrides <yaml>", "Inline YAML merged last")
    .action(
      async (
        name: string,
        opts: { template?: string; copyFrom?: string; data?: string; file?: string; overrides?: string },
        command: Command,
      ) => {
        await runCommand(command, async ({ brands: registry }, output) => {
          const config = await readDocumentInput(opts, "brand document");
          const overrides = await readDocumentInput({ data: opts.overrides }, "overrides");
          const result = await registry.create(name, {
            config,
            overrides,
            templateName: opts.template,
            copyFrom: opts.copyFrom,
          });
          emitResult(result, output, (value) => {
            console.log(`Created brand ${value.name} at ${value.path} (version ${value.version}).`);
            if (value.templateSource) console.log(`Source: ${value.templateSource}`);
            printWarnings(value.warnings);
          });
        });
      },
    );

  brands
    .command("update")
    .description("Merge a partial document into a brand")
    .argument("<name>", "Brand name")
    .option("--data <yaml>", "Inline YAML or JSON partial document")
    .option("--file <path>", "YAML or JSON partial document file")
    .option("--no-backup", "Skip the document snapshot")
    .option("--force", "Bypass brand protection", false)
    .action(
      async (
        name: string,
        opts: { data?: string; file?: string; backup: boolean; force: boolean },
        command: Command,
      ) => {
        await runCommand(command, async ({ brands: registry }, output) => {
          const partial = await requireDocumentInput(opts, "partial document");
          const result = await registry.update(name, partial, {
            createBackup: opts.backup,
            force: opts.force,
          });
          emitResult(result, output, (value) => {
            console.log(
              `Updated brand ${value.name}: ${value.updatedFields.join(", ")} (version ${value.previousVersion} -> ${value.version}).`,
            );
            if (value.backupPath) console.log(`Backup: ${value.backupPath}`);
            printWarnings(value.warnings);
          });
        });
      },
    );

  brands
    .command("delete")
    .description("Delete a brand, archiving it first")
    .argument("<name>", "Brand name")
    .option("--confirm", "Confirm the deletion", false)
    .option("--force", "Bypass protection and skip the archive", false)
    .option("--no-backup", "Skip the archive")
    .action(
      async (
        name: string,
        opts: { confirm: boolean; force: boolean; backup: boolean },
        command: Command,
      ) => {
        await runCommand(command, async ({ brands: registry }, output) => {
          const result = await registry.delete(name, {
            confirm: opts.confirm,
            force: opts.force,
            createBackup: opts.backup,
          });
          emitResult(result, output, (value) => {
            console.log(
              `Deleted brand ${value.name}: ${value.filesDeleted} files, ${value.bytesDeleted} bytes.`,
            );
            if (value.archivePath) console.log(`Archive: ${value.archivePath}`);
            printWarnings(value.warnings);
          });
        });
      },
    );

  brands
    .command("lock")
    .description("Protect a brand against updates and deletion")
    .argument("<name>", "Brand name")
    .requiredOption("--by <actor>", "Who applies the protection")
    .option("--level <level>", "none, warn or strict", "strict")
    .option("--reason <reason>", "Why the brand is protected")
    .action(
      async (name: string, opts: { by: string; level: string; reason?: string }, command: Command) => {
        await runCommand(command, async ({ brands: registry }, output) => {
          const result = await registry.lock(name, opts.level, { by: opts.by, reason: opts.reason });
          emitResult(result, output, (value) => {
            console.log(
              `Brand ${value.name} protection set to ${value.level} by ${value.protectedBy}: ${value.reason}`,
            );
          });
        });
      },
    );

  brands
    .command("unlock")
    .description("Remove a brand's protection")
    .argument("<name>", "Brand name")
    .requiredOption("--by <actor>", "Who removes the protection")
    .action(async (name: string, opts: { by: string }, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const result = await registry.unlock(name, { by: opts.by });
        emitResult(result, output, (value) => {
          console.log(`Brand ${value.name} protection removed by ${value.unlockedBy}.`);
        });
      });
    });

  brands
    .command("protection")
    .description("Show a brand's protection status")
    .argument("<name>", "Brand name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const status = await registry.protectionStatus(name);
        emitResult(status, output, printProtection);
      });
    });

  brands
    .command("compliance")
    .description("Check a brand against its own compliance rules")
    .argument("<name>", "Brand name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const warnings = registry.validateCompliance(await registry.load(name));
        emitResult({ name, warnings }, output, (value) => {
          if (value.warnings.length === 0) {
            console.log(`Brand ${value.name} is compliant.`);
            return;
          }
          printWarnings(value.warnings);
        });
      });
    });

  brands
    .command("css")
    .description("Print the brand's CSS custom properties")
    .argument("<name>", "Brand name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ brands: registry }, output) => {
        const css = registry.cssVariables(await registry.load(name));
        emitResult({ name, css }, output, (value) => console.log(value.css));
      });
    });

  for (const [commandName, status] of [
    ["archive", "archived"],
    ["activate", "active"],
  ] as const) {
    brands
      .command(commandName)
      .description(`Mark a brand as ${status}`)
      .argument("<name>", "Brand name")
      .action(async (name: string, _opts: unknown, command: Command) => {
        await runCommand(command, async ({ brands: registry }, output) => {
          const result = await registry.setStatus(name, status);
          emitResult(result, output, (value) => {
            console.log(`Brand ${value.name} is now ${status}.`);
            printWarnings(value.warnings);
          });
        });
      });
  }
}

// =============================================================================
// PRINTERS
// =============================================================================

function printBrandListing(listing: BrandListing, detailed: boolean): void {
  if (listing.brands.length === 0) {
    console.log("No brands found.");
    return;
  }

  const headers = detailed
    ? ["Name", "Display name", "Status", "Version", "Assets", "Bytes", "Source"]
    : ["Name", "Display name", "Status", "Version"];
  const rows = listing.brands.map((brand) => {
    const base = [brand.name, brand.displayName, brand.status, brand.version];
    if (!detailed) return base;
    return [
      ...base,
      String(brand.assetCount ?? 0),
      String(brand.assetBytes ?? 0),
      brand.templateSource ?? "-",
    ];
  });
  printTable(headers, rows);
}

function summarizeBrand(brand: Brand): Omit<Brand, "config"> {
  const { config: _config, ...rest } = brand;
  return rest;
}

function printBrand(brand: Brand): void {
  console.log(`Brand: ${brand.name} (${brand.displayName})`);
  console.log(`Version: ${brand.version}`);
  console.log(`Status: ${brand.status}`);
  console.log(`Protection: ${brand.protection.isProtected ? brand.protection.level : "none"}`);
  if (brand.templateSource) console.log(`Source: ${brand.templateSource}`);

  if (brand.assetResolution.length > 0) {
    console.log("Assets:");
    for (const entry of brand.assetResolution) {
      console.log(`  ${entry.role}: ${entry.path}${entry.resolved ? "" : " (missing)"}`);
    }
  }
  printWarnings(brand.warnings);
}

function printProtection(status: ProtectionStatus): void {
  console.log(`Protected: ${status.isProtected ? "yes" : "no"}`);
  console.log(`Level: ${status.level}`);
  if (status.protectedBy) console.log(`By: ${status.protectedBy}`);
  if (status.protectedAt) console.log(`At: ${status.protectedAt}`);
  if (status.reason) console.log(`Reason: ${status.reason}`);
  console.log(`Can update: ${status.canUpdate ? "yes" : "no"}`);
  console.log(`Can delete: ${status.canDelete ? "yes" : "no"}`);
}
