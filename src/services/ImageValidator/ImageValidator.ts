import type { ImageFormat } from "@/constants";
import type { Result } from "~shared/utils/Result";

export type ValidationError = {
  type: "UNSUPPORTED_EXTENSION" | "UNSUPPORTED_FORMAT" | "DECODE_FAILED";
  message: string;
};

export interface ImageValidator {
  /**
   * 檢查上傳的位元組是否為支援格式且可完整解碼的影像。
   * 不拋出例外，解碼失敗一律轉為 ValidationError。
   */
  validate(
    bytes: Uint8Array,
    fileName: string
  ): Promise<Result<ImageFormat, ValidationError>>;
}
