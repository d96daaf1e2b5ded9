import type { HeatmapConfig, HeatmapPadding } from "../config/HeatmapConfig";
import type { HeatmapRow } from "../model/HeatmapData";
import { measureFontExtent, type FontSpec, type TextMeasurer } from "../text/TextMeasurer";

export interface HeatmapGeometry {
  /** Side length of every (square) cell. */
  cellSide: number;
  cellGap: number;
  maxLabelWidth: number;
  /** Width reserved for row labels, including the label/grid gap. Zero when there are no rows. */
  labelAreaWidth: number;
  /** Height reserved for column headers, including the header/grid gap. */
  headerAreaHeight: number;
  /** Grid origin relative to the padded content box. */
  gridOffsetX: number;
  gridOffsetY: number;
  /** Extent of the drawn cells, gaps between them included. */
  gridWidth: number;
  gridHeight: number;
  contentHeight: number;
  /** Width the host offered; the widget never asks for more. */
  measuredWidth: number;
  /** Height the widget needs, padding included. */
  measuredHeight: number;
  rowCount: number;
  columnCount: number;
  padding: HeatmapPadding;
}

export interface MeasureHeatmapInput {
  availableWidth: number;
  padding: HeatmapPadding;
  rows: readonly Pick<HeatmapRow<unknown>, "label">[];
  columnCount: number;
  config: HeatmapConfig;
  measurer: TextMeasurer;
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function labelFont(config: HeatmapConfig): FontSpec {
  return { family: config.fontFamily, sizePx: config.labelTextSize };
}

export function headerFont(config: HeatmapConfig): FontSpec {
  return { family: config.fontFamily, sizePx: config.headerTextSize };
}

/** `(available − (count − 1)·gap) / count`, clamped at 0; 0 columns yields 0. */
export function computeCellSide(gridAvailableWidth: number, columnCount: number, cellGap: number): number {
  const count = Math.floor(nonNegative(columnCount));
  if (count === 0) return 0;
  const side = (nonNegative(gridAvailableWidth) - (count - 1) * nonNegative(cellGap)) / count;
  return side > 0 ? side : 0;
}

/** Total extent of `count` cells laid out with `gap` between neighbours. */
export function spanOf(count: number, cellSide: number, gap: number): number {
  if (count <= 0) return 0;
  return count * cellSide + (count - 1) * gap;
}

export function measureHeatmap(input: MeasureHeatmapInput): HeatmapGeometry {
  const { config, measurer, rows } = input;
  const padding: HeatmapPadding = {
    top: nonNegative(input.padding.top),
    right: nonNegative(input.padding.right),
    bottom: nonNegative(input.padding.bottom),
    left: nonNegative(input.padding.left)
  };
  const availableWidth = nonNegative(input.availableWidth);
  const columnCount = Math.floor(nonNegative(input.columnCount));
  const rowCount = rows.length;
  const cellGap = config.cellGap;

  const font = labelFont(config);
  let maxLabelWidth = 0;
  for (const row of rows) {
    const width = nonNegative(measurer.measure(row.label, font).width);
    if (width > maxLabelWidth) maxLabelWidth = width;
  }
  const labelAreaWidth = rowCount > 0 ? maxLabelWidth + config.labelGridGap : 0;

  const gridAvailableWidth = Math.max(0, availableWidth - padding.left - padding.right - labelAreaWidth);
  const cellSide = computeCellSide(gridAvailableWidth, columnCount, cellGap);

  const headerExtent = measureFontExtent(measurer, headerFont(config));
  const headerAreaHeight = config.headerGridGap + headerExtent.ascent + headerExtent.descent;

  const gridOffsetX = config.labelPosition === "leading" ? labelAreaWidth : 0;
  const gridOffsetY = config.headerPosition === "leading" ? headerAreaHeight : 0;

  const gridWidth = spanOf(columnCount, cellSide, cellGap);
  const gridHeight = spanOf(rowCount, cellSide, cellGap);
  const contentHeight = gridHeight + headerAreaHeight;

  return {
    cellSide,
    cellGap,
    maxLabelWidth,
    labelAreaWidth,
    headerAreaHeight,
    gridOffsetX,
    gridOffsetY,
    gridWidth,
    gridHeight,
    contentHeight,
    measuredWidth: availableWidth,
    measuredHeight: contentHeight + padding.top + padding.bottom,
    rowCount,
    columnCount,
    padding
  };
}

export interface CellBounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** Surface coordinates of a cell under `geometry`. */
export function cellBounds(geometry: HeatmapGeometry, row: number, col: number): CellBounds {
  const step = geometry.cellSide + geometry.cellGap;
  const left = geometry.padding.left + geometry.gridOffsetX + col * step;
  const top = geometry.padding.top + geometry.gridOffsetY + row * step;
  return { left, top, right: left + geometry.cellSide, bottom: top + geometry.cellSide };
}
