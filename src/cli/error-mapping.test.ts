import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { BrandRegistry } from "../brand/brand-registry.js";
import { loadRegistryConfig } from "../core/config-loader.js";
import {
  InternalError,
  InvalidArgumentError,
  NotFoundError,
  ProtectionError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { KeyedMutex } from "../core/keyed-mutex.js";

import { toUserFacingError } from "./error-mapping.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("error mapping", () => {
  it("maps a missing brand to a not-found error", async () => {
    const registry = new BrandRegistry({
      brandsRoot: makeTempDir("error-mapping-brands-"),
      locks: new KeyedMutex(),
    });

    const result = toUserFacingError(await registry.load("ghost").catch((err: unknown) => err));

    expect(result).toBeInstanceOf(UserFacingError);
    const userError = result as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.notFound);
    expect(userError.title).toBe("Not found.");
    expect(userError.message).toBe("Brand 'ghost' not found");
    expect(userError.cause).toBeInstanceOf(NotFoundError);
  });

  it("maps protection failures with an unlock hint", () => {
    const userError = toUserFacingError(
      new ProtectionError("Cannot update protected brand 'acme': audit", "acme"),
    ) as UserFacingError;

    expect(userError.code).toBe(USER_FACING_ERROR_CODES.protection);
    expect(userError.title).toBe("Brand is protected.");
    expect(userError.hint).toContain("brands unlock");
  });

  it("maps invalid arguments and internal failures", () => {
    const invalid = toUserFacingError(
      new InvalidArgumentError("Deleting brand 'acme' requires confirmation", "acme"),
    ) as UserFacingError;
    expect(invalid.code).toBe(USER_FACING_ERROR_CODES.invalidArgument);

    const internal = toUserFacingError(
      new InternalError("Failed to read brand 'acme': EIO", "acme"),
    ) as UserFacingError;
    expect(internal.code).toBe(USER_FACING_ERROR_CODES.internal);
    expect(internal.hint).toBe("Rerun with --debug to see the underlying error.");
  });

  it("passes through errors outside the registry taxonomy", () => {
    const error = new Error("boom");
    expect(toUserFacingError(error)).toBe(error);
  });

  it("maps missing config paths to a user-facing config error", () => {
    const dir = makeTempDir("error-mapping-config-");
    const configPath = path.join(dir, "missing-config.yaml");

    let error: unknown;
    try {
      loadRegistryConfig({ configPath, cwd: dir, env: {} });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = error as UserFacingError;
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(userError.title).toBe("Registry config missing.");
    expect(userError.message).toBe(`Config file not found at ${path.resolve(configPath)}.`);
  });
});
