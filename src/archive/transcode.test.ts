import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ArchiveError } from "../utils/errors";
import { transcodeFile } from "./transcode";

vi.mock("../utils/logger");

describe("transcodeFile", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "transcode-"));
    file = path.join(dir, "names.txt");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should rewrite latin-1 content as utf-8", async () => {
    await fs.writeFile(file, Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));

    expect(await transcodeFile(file, "latin1")).toBe(true);

    expect(await fs.readFile(file, "utf8")).toBe("café\n");
    expect(await fs.readdir(dir)).toEqual(["names.txt"]);
  });

  it("should keep C1 bytes as code points when rewriting latin-1", async () => {
    await fs.writeFile(file, Buffer.from([0x80, 0x41]));

    expect(await transcodeFile(file, "iso-8859-1")).toBe(true);

    expect(await fs.readFile(file)).toEqual(Buffer.from([0xc2, 0x80, 0x41]));
  });

  it("should leave utf-8 files alone", async () => {
    await fs.writeFile(file, "café\n");
    expect(await transcodeFile(file, "utf8")).toBe(false);
    expect(await fs.readFile(file, "utf8")).toBe("café\n");
  });

  it("should leave files with an unknown encoding alone", async () => {
    await fs.writeFile(file, "abc");
    expect(await transcodeFile(file, "no-such-encoding")).toBe(false);
  });

  it("should refuse targets it cannot write", async () => {
    await fs.writeFile(file, "abc");
    expect(await transcodeFile(file, "latin1", "shift_jis")).toBe(false);
  });

  it("should fail for missing files", async () => {
    await expect(transcodeFile(file, "latin1")).rejects.toThrow(ArchiveError);
  });
});
