import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Command } from "commander";
import { expect, vi } from "vitest";

import { buildCli } from "../index.js";

const tempDirs: string[] = [];

// =============================================================================
// HELPERS
// =============================================================================

export type JsonEnvelope<T> =
  | { ok: true; result: T }
  | { ok: false; error: { code: string; title: string; message: string; hint: string | null } };

export type RegistryWorkspace = {
  root: string;
  brandsRoot: string;
  templatesRoot: string;
};

export async function createTempWorkspace(): Promise<RegistryWorkspace> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "registry-acceptance-"));
  tempDirs.push(root);

  return {
    root,
    brandsRoot: path.join(root, "brands"),
    templatesRoot: path.join(root, "templates"),
  };
}

export async function cleanupTempDirs(): Promise<void> {
  for (const dir of tempDirs) {
    await fs.rm(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
}

export function createRegistryRunner(
  workspace: RegistryWorkspace,
): {
  runJson: <T>(args: string[]) => Promise<JsonEnvelope<T>>;
  runText: (args: string[]) => Promise<string[]>;
} {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const roots = ["--root", workspace.brandsRoot, "--templates", workspace.templatesRoot];

  return {
    async runJson<T>(args: string[]): Promise<JsonEnvelope<T>> {
      logSpy.mockClear();
      await runCli(["node", "brand-registry", ...roots, "--json", ...args]);
      return parseLastJsonLine<JsonEnvelope<T>>(logSpy);
    },
    async runText(args: string[]): Promise<string[]> {
      logSpy.mockClear();
      await runCli(["node", "brand-registry", ...roots, ...args]);
      return logSpy.mock.calls.map((call: unknown[]) => call.join(" "));
    },
  };
}

export function expectOk<T>(payload: JsonEnvelope<T>): T {
  expect(payload.ok).toBe(true);
  if (payload.ok) {
    return payload.result;
  }
  throw new Error(payload.error.message);
}

async function runCli(argv: string[]): Promise<void> {
  const program = buildCli();
  installExitOverride(program);
  await program.parseAsync(argv);
}

function installExitOverride(command: Command): void {
  command.exitOverride();

  for (const child of command.commands) {
    installExitOverride(child);
  }
}

function parseLastJsonLine<T>(logSpy: ReturnType<typeof vi.spyOn>): T {
  const line = logSpy.mock.calls.map((call: unknown[]) => call.join(" ")).pop() ?? "";
  return JSON.parse(line) as T;
}
