import { describe, expect, it, vi } from "vitest";

import { isTransientIoError, withReadRetry } from "./utils.js";

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  error.code = code;
  return error;
}

describe("withReadRetry", () => {
  it("retries once after a transient error", async () => {
    const read = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(errnoError("EBUSY"))
      .mockResolvedValueOnce("brand: Acme");

    await expect(withReadRetry(read)).resolves.toBe("brand: Acme");
    expect(read).toHaveBeenCalledTimes(2);
  });

  it("gives up after the single retry", async () => {
    const read = vi.fn<() => Promise<string>>().mockRejectedValue(errnoError("EMFILE"));

    await expect(withReadRetry(read)).rejects.toMatchObject({ code: "EMFILE" });
    expect(read).toHaveBeenCalledTimes(2);
  });

  it("does not retry other errors", async () => {
    const read = vi.fn<() => Promise<string>>().mockRejectedValue(errnoError("ENOENT"));

    await expect(withReadRetry(read)).rejects.toMatchObject({ code: "ENOENT" });
    expect(read).toHaveBeenCalledTimes(1);
  });
});

describe("isTransientIoError", () => {
  it("recognises the retryable errno codes only", () => {
    expect(["EBUSY", "EAGAIN", "EMFILE", "ENFILE"].map((code) => isTransientIoError(errnoError(code)))).toEqual([
      true,
      true,
      true,
      true,
    ]);
    expect(isTransientIoError(errnoError("EACCES"))).toBe(false);
    expect(isTransientIoError("EBUSY")).toBe(false);
  });
});
