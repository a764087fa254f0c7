import fs from "fs/promises";
import path from "path";

import { MissingInputError, NoMediaFoundError } from "../errors";
import log from "../log";
import { scanMediaFiles, toMediaFile } from "../media/inventory";
import { makeTempDir } from "./fakes/pipeline";

import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";

const SUPPORTED = [".mkv", ".mp4", ".wav", ".mp3"];

describe("Media Inventory", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("inventory");
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("lists supported files sorted by path, matching extensions case-insensitively", async () => {
    const dir = path.join(tempDir, "mixed");
    await fs.mkdir(path.join(dir, "nested.mp4"), { recursive: true });
    for (const name of ["b.MP4", "a.wav", "notes.txt", "c.mkv", "A.mp3"]) {
      await fs.writeFile(path.join(dir, name), "");
    }

    const files = await scanMediaFiles(dir, SUPPORTED);

    expect(files.map((file) => file.name)).toEqual(["A.mp3", "a.wav", "b.MP4", "c.mkv"]);
    expect(files[2]).toEqual({
      path: path.join(dir, "b.MP4"),
      name: "b.MP4",
      extension: ".mp4",
      stem: "b",
    });
  });

  test("warns when files share a name apart from the extension", async () => {
    const dir = path.join(tempDir, "shared");
    await fs.mkdir(dir, { recursive: true });
    for (const name of ["talk.wav", "talk.mp4", "intro.mp3"]) {
      await fs.writeFile(path.join(dir, name), "");
    }
    const warn = vi.spyOn(log, "warn");

    const files = await scanMediaFiles(dir, SUPPORTED);

    expect(files.map((file) => file.name)).toEqual(["intro.mp3", "talk.mp4", "talk.wav"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "talk.mp4, talk.wav share the name 'talk'; only the last one's transcript_talk.txt is kept",
      { stem: "talk", files: ["talk.mp4", "talk.wav"] },
    );
  });

  test("fails with MissingInputError for a missing folder", async () => {
    const missing = path.join(tempDir, "nope");

    await expect(scanMediaFiles(missing, SUPPORTED)).rejects.toBeInstanceOf(MissingInputError);
    await expect(scanMediaFiles(missing, SUPPORTED)).rejects.toThrow(
      `Input folder '${missing}' does not exist`,
    );
  });

  test("fails with NoMediaFoundError when nothing is supported", async () => {
    const dir = path.join(tempDir, "empty");
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(path.join(dir, "readme.md"), "");

    const scan = scanMediaFiles(dir, SUPPORTED);

    await expect(scan).rejects.toBeInstanceOf(NoMediaFoundError);
    await expect(scan).rejects.toThrow(`No supported files (mkv, mp3, mp4, wav) in '${dir}'`);
  });
});

describe("toMediaFile", () => {
  test("keeps dots inside the stem", () => {
    expect(toMediaFile("/in/2024.05.01 standup.webm")).toEqual({
      path: "/in/2024.05.01 standup.webm",
      name: "2024.05.01 standup.webm",
      extension: ".webm",
      stem: "2024.05.01 standup",
    });
  });
});
