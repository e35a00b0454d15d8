import os from "node:os";
import path from "node:path";
import * as fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StatementIoError } from "./errors";
import { readInputFile, writeOutputFile } from "./files";

describe("files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ledger-files-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a file as text", async () => {
    const file = path.join(dir, "in.txt");
    await fs.writeFile(file, "a\tb\n");
    expect(await readInputFile(file)).toBe("a\tb\n");
  });

  it("wraps read failures", async () => {
    const file = path.join(dir, "missing.txt");
    const err = await readInputFile(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StatementIoError);
    expect(err).toMatchObject({ operation: "read", path: file, name: "StatementIoError" });
  });

  it("overwrites the target and leaves no temp file", async () => {
    const file = path.join(dir, "out.txt");
    await fs.writeFile(file, "previous");
    await writeOutputFile(file, "fresh\n");
    expect(await fs.readFile(file, "utf8")).toBe("fresh\n");
    expect(await fs.readdir(dir)).toEqual(["out.txt"]);
  });

  it("wraps write failures", async () => {
    const file = path.join(dir, "no-such-dir", "out.txt");
    await expect(writeOutputFile(file, "x")).rejects.toMatchObject({ operation: "write", path: file });
  });
});
