export * from "./ExifService";
export * from "./ExifServiceExifTool";
