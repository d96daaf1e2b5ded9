// DOM-free entrypoint: layout, data binding, hit-testing and the paint pipeline.
//
// `src/index.ts` also re-exports the React host (TSX). Server-side renderers and
// scripts that draw onto a non-DOM canvas import from this module instead.

export type { AxisPosition, HeatmapConfig, HeatmapConfigOverrides, HeatmapPadding } from "./config/HeatmapConfig";
export {
  AxisPositionSchema,
  DEFAULT_COLUMN_HEADERS,
  DEFAULT_HEATMAP_CONFIG,
  DEFAULT_HEATMAP_FONT_FAMILY,
  HeatmapConfigOverridesSchema,
  HeatmapConfigSchema,
  HeatmapPaddingSchema,
  ZERO_PADDING,
  heatmapConfigsEqual,
  paddingsEqual,
  resolveHeatmapConfig,
  resolveHeatmapPadding
} from "./config/HeatmapConfig";

export { HeatmapConfigError, HeatmapError, HeatmapReentrancyError } from "./errors";
export type { HeatmapConfigIssue } from "./errors";

export type {
  BindResult,
  BindStats,
  ColumnIndexMapper,
  DetailExtractor,
  HeatmapRow,
  HeatmapSnapshot,
  LabelExtractor
} from "./model/HeatmapData";
export { bindRows, bindRowsWithStats, copyRows, createSnapshot, isColumnIndex, nextSnapshot } from "./model/HeatmapData";

export type { CellBounds, HeatmapGeometry, MeasureHeatmapInput } from "./layout/measureHeatmap";
export { cellBounds, computeCellSide, headerFont, labelFont, measureHeatmap, spanOf } from "./layout/measureHeatmap";

export type { HeatmapHit } from "./interaction/hitTest";
export { pointInBounds, resolveCell } from "./interaction/hitTest";

export type {
  CellFill,
  HeatmapCellDrawer,
  HeatmapColorAdapter,
  HeatmapSurface,
  PaintHeatmapInput,
  PaintStats
} from "./rendering/paintHeatmap";
export { paintHeatmap, traceRoundedRect } from "./rendering/paintHeatmap";

export type { FontSpec, MeasureContext, TextMeasurement, TextMeasurer } from "./text/TextMeasurer";
export { CanvasTextMeasurer, measureFontExtent, toFontString } from "./text/TextMeasurer";

export type { CreateLoggerOptions, Logger } from "./logging/logger";
export { DEFAULT_LOG_LEVEL, createLogger } from "./logging/logger";

export { LruCache } from "./utils/LruCache";
