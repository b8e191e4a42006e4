/**
 * Copyright (c) 2024 Discover Financial Services
*/
export * from "./box.js";
export * from "./config.js";
export * from "./context.js";
export * from "./contour.js";
export * from "./cropper.js";
export * from "./detector.js";
export * from "./dictionary.js";
export * from "./grouping.js";
export * from "./image.js";
export * from "./log.js";
export * from "./ocr.js";
export * from "./ocv.js";
export * from "./outcome.js";
export * from "./pipeline.js";
export * from "./readingOrder.js";
export * from "./recognizer.js";
export * from "./util.js";
