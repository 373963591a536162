import type { Command } from "commander";

import type { Template, TemplateListing, TemplateValidationReport } from "../templates/template-catalog.js";

import { requireDocumentInput, runCommand } from "./context.js";
import { emitResult, printTable, printWarnings } from "./output.js";

export function registerTemplatesCommand(program: Command): void {
  const templates = program.command("templates").description("Manage reusable brand templates");

  templates
    .command("list")
    .description("List templates grouped by category")
    .option("--category <category>", "Only templates in this category")
    .action(async (opts: { category?: string }, command: Command) => {
      await runCommand(command, async ({ templates: catalog }, output) => {
        const listing = await catalog.list(opts.category);
        emitResult(listing, output, printTemplateListing);
      });
    });

  templates
    .command("show")
    .description("Show a template and its asset requirements")
    .argument("<name>", "Template name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ templates: catalog }, output) => {
        const template = await catalog.load(name);
        const { dir: _dir, ...rest } = template;
        emitResult(rest, output, () => printTemplate(template));
      });
    });

  templates
    .command("create")
    .description("Create a template from a document")
    .argument("<name>", "Template name")
    .option("--data <yaml>", "Inline YAML or JSON document")
    .option("--file <path>", "YAML or JSON document file")
    .option("--description <text>", "Template description")
    .option("--category <category>", "Template category", "custom")
    .option("--feature <feature...>", "Feature tags")
    .action(
      async (
        name: string,
        opts: { data?: string; file?: string; description?: string; category: string; feature?: string[] },
        command: Command,
      ) => {
        await runCommand(command, async ({ templates: catalog }, output) => {
          const document = await requireDocumentInput(opts, "template document");
          const result = await catalog.create(name, document, {
            description: opts.description,
            category: opts.category,
            features: opts.feature,
          });
          emitResult(result, output, (value) => {
            console.log(`Created template ${value.name} (${value.category}, version ${value.version}).`);
            printWarnings(value.warnings);
          });
        });
      },
    );

  templates
    .command("update")
    .description("Merge a partial document into a template")
    .argument("<name>", "Template name")
    .option("--data <yaml>", "Inline YAML or JSON partial document")
    .option("--file <path>", "YAML or JSON partial document file")
    .action(async (name: string, opts: { data?: string; file?: string }, command: Command) => {
      await runCommand(command, async ({ templates: catalog }, output) => {
        const partial = await requireDocumentInput(opts, "partial document");
        const result = await catalog.update(name, partial);
        emitResult(result, output, (value) => {
          console.log(`Updated template ${value.name}: ${value.updatedFields.join(", ")} (version ${value.version}).`);
          printWarnings(value.warnings);
        });
      });
    });

  templates
    .command("delete")
    .description("Delete a template")
    .argument("<name>", "Template name")
    .option("--confirm", "Confirm the deletion", false)
    .action(async (name: string, opts: { confirm: boolean }, command: Command) => {
      await runCommand(command, async ({ templates: catalog }, output) => {
        const result = await catalog.delete(name, { confirm: opts.confirm });
        emitResult(result, output, (value) => console.log(`Deleted template ${value.name}.`));
      });
    });

  templates
    .command("validate")
    .description("Check a template's structure and asset requirements")
    .argument("<name>", "Template name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await runCommand(command, async ({ templates: catalog }, output) => {
        const report = await catalog.validate(name);
        emitResult(report, output, printValidation);
        if (report.status === "error") process.exitCode = 1;
      });
    });
}

function printTemplateListing(listing: TemplateListing): void {
  if (listing.templates.length === 0) {
    console.log("No templates found.");
    return;
  }
  printTable(
    ["Name", "Category", "Version", "Description"],
    listing.templates.map((template) => [
      template.name,
      template.category,
      template.version,
      template.description,
    ]),
  );
}

function printTemplate(template: Template): void {
  console.log(`Template: ${template.name}`);
  console.log(`Category: ${template.category}`);
  console.log(`Version: ${template.version}`);
  if (template.description) console.log(`Description: ${template.description}`);
  if (template.features.length > 0) console.log(`Features: ${template.features.join(", ")}`);
  console.log(`Required assets: ${template.requiredAssets.join(", ") || "-"}`);
  console.log(`Optional assets: ${template.optionalAssets.join(", ") || "-"}`);
}

function printValidation(report: TemplateValidationReport): void {
  console.log(`Template ${report.name}: ${report.status}`);
  for (const issue of report.issues) {
    console.log(`  [${issue.type}] ${issue.message}`);
  }
}
