import { mkdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { imageExtensions } from "@/constants";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

const tmpDir = resolve("test/tmp/scanner");

describe("FileSystemScannerDefault", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "subdir", "deep"), { recursive: true });
    await mkdir(join(tmpDir, "album.jpg"), { recursive: true });
    await writeFile(join(tmpDir, "a.JPG"), "a");
    await writeFile(join(tmpDir, "notes.txt"), "n");
    await writeFile(join(tmpDir, "subdir", "b.png"), "b");
    await writeFile(join(tmpDir, "subdir", "deep", "c.webp"), "c");
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("非遞迴只列出第一層的影像檔", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, {
      allowExts: imageExtensions,
    });

    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "a.JPG")]);
  });

  test("遞迴列出整棵樹的影像檔，忽略資料夾與其他副檔名", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, {
      recursive: true,
      allowExts: imageExtensions,
    });

    expectOk(result);
    expect(new Set(result.value)).toEqual(
      new Set([
        join(tmpDir, "a.JPG"),
        join(tmpDir, "subdir", "b.png"),
        join(tmpDir, "subdir", "deep", "c.webp"),
      ])
    );
  });

  test("未指定副檔名時列出所有檔案", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value).toHaveLength(2);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path");
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });
});
