import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import { rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { atomicWriteFile } from "../src/util/atomic-write.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rm: vi.fn(actual.rm) };
});

describe("atomicWriteFile", () => {
  let tmpDir: string;
  let target: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "releasectl-atomic-"));
    // A non-empty directory at the target makes the final rename fail.
    target = path.join(tmpDir, "releases.json");
    fs.mkdirSync(target);
    fs.writeFileSync(path.join(target, "keep"), "");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes content and leaves only the target", async () => {
    const file = path.join(tmpDir, "out.json");
    await atomicWriteFile(file, "[]\n");
    expect(fs.readFileSync(file, "utf8")).toBe("[]\n");
    expect(fs.readdirSync(tmpDir).sort()).toEqual(["out.json", "releases.json"]);
  });

  it("rethrows the rename failure and removes the temp file", async () => {
    await expect(atomicWriteFile(target, "[]\n")).rejects.toMatchObject({ code: "EISDIR" });
    expect(fs.readdirSync(tmpDir)).toEqual(["releases.json"]);
  });

  it("keeps the original failure first when cleanup also fails", async () => {
    vi.mocked(rm).mockRejectedValueOnce(new Error("rm refused"));

    const err = await atomicWriteFile(target, "[]\n").then(
      () => null,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(AggregateError);
    if (!(err instanceof AggregateError)) return;
    expect(err.message).toMatch(/cleanup of .*releases\.json\.tmp\..* also failed/);
    expect(err.errors[0]).toMatchObject({ code: "EISDIR" });
    expect(err.errors[1]).toMatchObject({ message: "rm refused" });
  });
});
