import path from "node:path";
import sharp from "sharp";

import { type ImageFormat, imageExtensions, imageFormats } from "@/constants";
import { errorMessage } from "@/utils/helper";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ImageValidator, ValidationError } from "./ImageValidator";

const allowExts: ReadonlySet<string> = new Set(imageExtensions);
const allowFormats: ReadonlySet<string> = new Set(imageFormats);

function isImageFormat(format: string): format is ImageFormat {
  return allowFormats.has(format);
}

/**
 * 以 sharp (libvips) 完整解碼驗證影像。
 * libvips 沒有 BMP 解碼器，BMP 改以檔頭結構檢查。
 */
export class ImageValidatorSharp implements ImageValidator {
  async validate(
    bytes: Uint8Array,
    fileName: string
  ): Promise<Result<ImageFormat, ValidationError>> {
    const ext = path.extname(fileName).toLowerCase();
    if (!ext || !allowExts.has(ext)) {
      return err({
        type: "UNSUPPORTED_EXTENSION",
        message: `Unsupported file extension: ${ext || "(none)"}. Allowed: ${imageExtensions.join(", ")}`,
      });
    }

    if (looksLikeBmp(bytes)) return checkBmp(bytes);

    try {
      const image = sharp(bytes, { failOn: "truncated" });
      const { format } = await image.metadata();
      if (!format || !isImageFormat(format)) {
        return err({
          type: "UNSUPPORTED_FORMAT",
          message: `Unsupported image format: ${format ?? "unknown"}`,
        });
      }
      // 只讀檔頭抓不到截斷的檔案，強制解出全部像素
      await image.raw().toBuffer();
      return ok(format);
    } catch (error) {
      return err({
        type: "DECODE_FAILED",
        message: `Invalid image file: ${errorMessage(error)}`,
      });
    }
  }
}

function looksLikeBmp(bytes: Uint8Array) {
  return bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

const BMP_MIN_HEADER = 26;

function checkBmp(bytes: Uint8Array): Result<ImageFormat, ValidationError> {
  if (bytes.length < BMP_MIN_HEADER) {
    return err({
      type: "DECODE_FAILED",
      message: "Invalid image file: BMP header is truncated",
    });
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const declaredSize = view.getUint32(2, true);
  const pixelOffset = view.getUint32(10, true);
  if (declaredSize > bytes.length) {
    return err({
      type: "DECODE_FAILED",
      message: `Invalid image file: BMP declares ${declaredSize} bytes but only ${bytes.length} present`,
    });
  }
  if (pixelOffset < BMP_MIN_HEADER || pixelOffset >= bytes.length) {
    return err({
      type: "DECODE_FAILED",
      message: "Invalid image file: BMP pixel data offset out of range",
    });
  }
  return ok("bmp");
}
