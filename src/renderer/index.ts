export { hexToRgb, renderAnsi, styleToAnsi } from "./ansi.ts";
export { segmentText, type TextSegment } from "./segments.ts";
