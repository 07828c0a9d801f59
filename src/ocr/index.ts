export * from "./discover";
export * from "./ocrProcessor";
export * from "./tesseractTextExtractor";
export * from "./textExtractor";
