export * from "./MetadataWriter";
export * from "./MetadataWriterExifTool";
