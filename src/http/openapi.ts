import type { TSchema } from "@sinclair/typebox";

import { appVersion } from "@/constants";

import {
  errorResponseSchema,
  folderRequestSchema,
  folderResponseSchema,
  imageResponseSchema,
  saveModeSchema,
  statusResponseSchema,
  tagModeSchema,
} from "./schemas";

export const openApiPath = "/api/openapi.json";

function ref(name: string) {
  return { $ref: `#/components/schemas/${name}` };
}

function jsonContent(schema: object) {
  return { "application/json": { schema } };
}

const badRequest = {
  description: "請求內容不合法",
  content: jsonContent(ref("ErrorResponse")),
};

/**
 * 由 typebox schema 組出 OpenAPI 3.1 文件；
 * typebox 輸出即為 JSON Schema，Kind 等 symbol 鍵在序列化時會被略過。
 */
export function buildOpenApiDocument() {
  const schemas: Record<string, TSchema> = {
    TagMode: tagModeSchema,
    SaveMode: saveModeSchema,
    FolderRequest: folderRequestSchema,
    FolderResponse: folderResponseSchema,
    ImageResponse: imageResponseSchema,
    StatusResponse: statusResponseSchema,
    ErrorResponse: errorResponseSchema,
  };

  return {
    openapi: "3.1.0",
    info: {
      title: "autotag",
      version: appVersion,
      description: "影像自動標籤服務，標籤寫入 XMP 中繼資料",
    },
    paths: {
      "/process/image": {
        post: {
          summary: "上傳單張影像並寫入標籤",
          parameters: [
            { name: "tag_mode", in: "query", schema: ref("TagMode") },
            { name: "save_mode", in: "query", schema: ref("SaveMode") },
          ],
          requestBody: {
            required: true,
            content: {
              "multipart/form-data": {
                schema: {
                  type: "object",
                  required: ["file"],
                  properties: {
                    file: { type: "string", format: "binary" },
                    tag_mode: ref("TagMode"),
                    save_mode: ref("SaveMode"),
                  },
                },
              },
            },
          },
          responses: {
            "200": {
              description: "處理完成",
              content: jsonContent(ref("ImageResponse")),
            },
            "400": badRequest,
          },
        },
      },
      "/process/folder": {
        post: {
          summary: "於背景處理整個資料夾",
          requestBody: {
            required: true,
            content: jsonContent(ref("FolderRequest")),
          },
          responses: {
            "200": {
              description: "已開始處理",
              content: jsonContent(ref("FolderResponse")),
            },
            "400": badRequest,
          },
        },
      },
      "/status": {
        get: {
          summary: "目前批次的進度",
          responses: {
            "200": {
              description: "狀態快照",
              content: jsonContent(ref("StatusResponse")),
            },
          },
        },
      },
      "/health": {
        get: {
          summary: "存活檢查",
          responses: { "200": { description: "服務運作中" } },
        },
      },
    },
    components: { schemas },
  };
}
