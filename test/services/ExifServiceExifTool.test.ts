import { Type as t } from "@sinclair/typebox";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { ExifServiceExifTool } from "@/services/ExifService";
import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { createJpeg } from "~test/fixture/images";

// 實際讀檔需要系統上的 perl，預設略過
const { TEST_SKIP_EXIFTOOL } = buildConfigFactoryEnv(
  t.Object({
    TEST_SKIP_EXIFTOOL: t.Optional(envBoolean()),
  })
)();

const tmpDir = resolve("test/tmp/exif");

describe("ExifServiceExifTool", () => {
  const service = new ExifServiceExifTool({ taskTimeoutMillis: 10_000 });

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  afterAll(async () => {
    await service[Symbol.asyncDispose]();
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("檔案不存在時回傳 FILE_NOT_FOUND", async () => {
    const result = await service.readTags(join(tmpDir, "missing.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("FILE_NOT_FOUND");
  });

  test.skipIf(TEST_SKIP_EXIFTOOL ?? true)(
    "沒有 TagsList 的影像回傳空陣列",
    async () => {
      const filePath = join(tmpDir, "plain.jpg");
      await writeFile(filePath, await createJpeg());
      const result = await service.readTags(filePath);
      expectOk(result);
      expect(result.value).toEqual([]);
    }
  );
});
