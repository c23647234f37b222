export * from "./CaptureTime";
export * from "./MetadataExtractor";
export * from "./MetadataExtractorExifTool";
export * from "./MetadataValue";
