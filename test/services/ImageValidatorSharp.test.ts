import { describe, expect, test } from "vitest";

import { ImageValidatorSharp } from "@/services/ImageValidator";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { createBmp, createJpeg, createPng } from "~test/fixture/images";

const validator = new ImageValidatorSharp();

describe("ImageValidatorSharp", () => {
  test("完整的 PNG 與 JPEG 回傳偵測到的格式", async () => {
    const png = await validator.validate(await createPng(), "a.png");
    expectOk(png);
    expect(png.value).toBe("png");

    const jpeg = await validator.validate(await createJpeg(), "b.JPG");
    expectOk(jpeg);
    expect(jpeg.value).toBe("jpeg");
  });

  test("副檔名與內容不同時以內容為準", async () => {
    const result = await validator.validate(await createPng(), "photo.jpg");
    expectOk(result);
    expect(result.value).toBe("png");
  });

  test("不支援的副檔名不解碼直接拒絕", async () => {
    const result = await validator.validate(await createPng(), "notes.txt");
    expectErr(result);
    expect(result.error.type).toBe("UNSUPPORTED_EXTENSION");

    const noExt = await validator.validate(await createPng(), "README");
    expectErr(noExt);
    expect(noExt.error.type).toBe("UNSUPPORTED_EXTENSION");
  });

  test("隨機位元組無法解碼", async () => {
    const garbage = new TextEncoder().encode("this is not an image at all");
    const result = await validator.validate(garbage, "fake.png");
    expectErr(result);
    expect(result.error.type).toBe("DECODE_FAILED");
    expect(result.error.message.startsWith("Invalid image file:")).toBe(true);
  });

  test("截斷的 JPEG 在完整解碼時失敗", async () => {
    const jpeg = await createJpeg(64, 64);
    const truncated = jpeg.subarray(0, Math.floor(jpeg.length / 2));
    const result = await validator.validate(truncated, "cut.jpg");
    expectErr(result);
    expect(result.error.type).toBe("DECODE_FAILED");
  });

  describe("BMP", () => {
    test("結構完整的 BMP 通過", async () => {
      const result = await validator.validate(createBmp(), "tiny.bmp");
      expectOk(result);
      expect(result.value).toBe("bmp");
    });

    test("檔頭不足 26 位元組", async () => {
      const result = await validator.validate(
        createBmp().subarray(0, 20),
        "tiny.bmp"
      );
      expectErr(result);
      expect(result.error.message).toBe(
        "Invalid image file: BMP header is truncated"
      );
    });

    test("宣告大小超過實際長度", async () => {
      const bmp = createBmp();
      const result = await validator.validate(bmp.subarray(0, 60), "tiny.bmp");
      expectErr(result);
      expect(result.error.message).toBe(
        "Invalid image file: BMP declares 70 bytes but only 60 present"
      );
    });

    test("像素偏移超出範圍", async () => {
      const bmp = createBmp();
      bmp.writeUInt32LE(500, 10);
      const result = await validator.validate(bmp, "tiny.bmp");
      expectErr(result);
      expect(result.error.type).toBe("DECODE_FAILED");
      expect(result.error.message).toContain("offset out of range");
    });
  });
});
