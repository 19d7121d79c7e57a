export const appVersion = "0.1.0";

export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".bmp",
  ".tiff",
  ".tif",
  ".webp",
] as const;

/** 解碼後可接受的影像格式 */
export const imageFormats = ["jpeg", "png", "gif", "bmp", "tiff", "webp"] as const;

export type ImageFormat = (typeof imageFormats)[number];

/** SaveMode=suffix 時副本檔名的後綴 */
export const taggedSuffix = "_tagged";

/** 寫入關鍵字的 XMP 欄位 */
export const tagsField = "XMP-digiKam:TagsList";

export const recentStatusCapacity = 10;
