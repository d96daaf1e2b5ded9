export * from "./node";

export type { HeatmapClickListener, HeatmapRendererOptions } from "./rendering/HeatmapRenderer";
export { HeatmapRenderer } from "./rendering/HeatmapRenderer";
export type { CanvasSize } from "./rendering/HiDpiCanvas";
export { sanitizeDevicePixelRatio, setupHiDpiCanvas } from "./rendering/HiDpiCanvas";
export { createCanvasTextMeasurer } from "./text/TextMeasurer";

export type { ActivityHeatmapProps, HeatmapApi } from "./react/ActivityHeatmap";
export { ActivityHeatmap } from "./react/ActivityHeatmap";
