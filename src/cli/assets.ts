import path from "node:path";

import type { Command } from "commander";
import fse from "fs-extra";

import type { AssetListing, AssetValidationReport, CleanupSummary } from "../assets/asset-registry.js";

import { runCommand } from "./context.js";
import { emitResult, printTable, printWarnings } from "./output.js";

export function registerAssetsCommand(program: Command): void {
  const assets = program.command("assets").description("Upload and maintain brand asset files");

  assets
    .command("upload")
    .description("Store a local file as a brand asset")
    .argument("<brand>", "Brand name")
    .argument("<file>", "Local file to upload")
    .option("--type <type>", "logo, image, font, css, template or another type", "image")
    .option("--name <filename>", "Stored filename (defaults to the local file's name)")
    .action(
      async (brand: string, file: string, opts: { type: string; name?: string }, command: Command) => {
        await runCommand(command, async ({ assets: registry }, output) => {
          const payload = (await fse.readFile(file)).toString("base64");
          const result = await registry.upload(brand, payload, opts.name ?? path.basename(file), opts.type);
          emitResult(result, output, (value) => {
            console.log(`Uploaded ${value.path} (${value.size} bytes, sha256 ${value.checksum}).`);
            printWarnings(value.warnings);
          });
        });
      },
    );

  assets
    .command("list")
    .description("List files under the brand's assets directory")
    .argument("<brand>", "Brand name")
    .option("--type <type>", "image, font, css or misc")
    .action(async (brand: string, opts: { type?: string }, command: Command) => {
      await runCommand(command, async ({ assets: registry }, output) => {
        const listing = await registry.list(brand, opts.type);
        emitResult(listing, output, printAssetListing);
      });
    });

  assets
    .command("validate")
    .description("Check an asset file's presence, type and checksum")
    .argument("<brand>", "Brand name")
    .argument("<path>", "Asset path relative to the brand directory")
    .action(async (brand: string, assetPath: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ assets: registry }, output) => {
        const report = await registry.validate(brand, assetPath);
        emitResult(report, output, printAssetValidation);
        if (report.status !== "valid") process.exitCode = 1;
      });
    });

  assets
    .command("delete")
    .description("Delete an asset, keeping a backup copy")
    .argument("<brand>", "Brand name")
    .argument("<path>", "Asset path relative to the brand directory")
    .option("--no-backup", "Skip the backup copy")
    .action(async (brand: string, assetPath: string, opts: { backup: boolean }, command: Command) => {
      await runCommand(command, async ({ assets: registry }, output) => {
        const result = await registry.delete(brand, assetPath, { createBackup: opts.backup });
        emitResult(result, output, (value) => {
          console.log(`Deleted ${value.path} (${value.bytesDeleted} bytes).`);
          if (value.backupPath) console.log(`Backup: ${value.backupPath}`);
          printWarnings(value.warnings);
        });
      });
    });

  assets
    .command("cleanup")
    .description("Report asset files and optionally remove the unreferenced ones")
    .argument("<brand>", "Brand name")
    .option("--remove-unused", "Delete files the brand document does not reference", false)
    .action(async (brand: string, opts: { removeUnused: boolean }, command: Command) => {
      await runCommand(command, async ({ assets: registry }, output) => {
        const summary = await registry.cleanup(brand, { removeUnused: opts.removeUnused });
        emitResult(summary, output, printCleanup);
      });
    });
}

function printAssetListing(listing: AssetListing): void {
  if (listing.assets.length === 0) {
    console.log(`No assets found for brand ${listing.brand}.`);
    return;
  }
  printTable(
    ["File", "Path", "Type", "Bytes"],
    listing.assets.map((asset) => [asset.filename, asset.relativePath, asset.assetType, String(asset.size)]),
  );
  console.log(`Total: ${listing.totalSize} bytes`);
}

function printAssetValidation(report: AssetValidationReport): void {
  console.log(`${report.path}: ${report.status}`);
  console.log(report.message);
  if (report.checksum) console.log(`sha256 ${report.checksum}`);
}

function printCleanup(summary: CleanupSummary): void {
  console.log(
    `Processed ${summary.filesProcessed} files, removed ${summary.filesRemoved} (${summary.bytesReclaimed} bytes).`,
  );
  for (const removed of summary.removedPaths) {
    console.log(`  removed ${removed}`);
  }
  if (summary.emptyDirectoriesRemoved > 0) {
    console.log(`Removed ${summary.emptyDirectoriesRemoved} empty directories.`);
  }
  printWarnings(summary.warnings);
}
