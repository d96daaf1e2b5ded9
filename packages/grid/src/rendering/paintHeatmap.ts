import type { HeatmapConfig } from "../config/HeatmapConfig";
import { cellBounds, headerFont, labelFont, type CellBounds, type HeatmapGeometry } from "../layout/measureHeatmap";
import type { HeatmapRow } from "../model/HeatmapData";
import { measureFontExtent, toFontString, type TextMeasurer } from "../text/TextMeasurer";

/** The slice of the 2D canvas API the pipeline draws through. */
export type HeatmapSurface = Pick<
  CanvasRenderingContext2D,
  | "fillStyle"
  | "font"
  | "textAlign"
  | "textBaseline"
  | "save"
  | "restore"
  | "beginPath"
  | "moveTo"
  | "arcTo"
  | "closePath"
  | "fill"
  | "fillText"
  | "createLinearGradient"
>;

export type CellFill = string | CanvasGradient;

/**
 * Picks a fill for a cell, with or without data. Returning `null`, `undefined`
 * or an empty string keeps the default active/inactive fill.
 */
export type HeatmapColorAdapter<V> = (data: V | undefined, row: number, col: number) => string | null | undefined;

/** Draws extra content over a cell that has data, after its fill. */
export type HeatmapCellDrawer<V, S = CanvasRenderingContext2D> = (
  surface: S,
  bounds: CellBounds,
  row: number,
  col: number,
  data: V
) => void;

export interface PaintHeatmapInput<V, S extends HeatmapSurface> {
  rows: readonly HeatmapRow<V>[];
  headers: readonly string[];
  columnCount: number;
  geometry: HeatmapGeometry;
  config: HeatmapConfig;
  measurer: TextMeasurer;
  colorAdapter?: HeatmapColorAdapter<V> | null;
  cellDrawer?: HeatmapCellDrawer<V, S> | null;
}

export type PaintStats = {
  labels: number;
  cells: number;
  overlays: number;
  headers: number;
  gradients: number;
};

type RowFills = { active: CellFill; inactive: CellFill; gradients: number };

function verticalFill(surface: HeatmapSurface, top: number, bottom: number, start: string, end: string): CellFill {
  // Equal stops stay a flat color: a degenerate gradient is not guaranteed to match it.
  if (start === end) return start;
  const gradient = surface.createLinearGradient(0, top, 0, bottom);
  gradient.addColorStop(0, start);
  gradient.addColorStop(1, end);
  return gradient;
}

function resolveRowFills(surface: HeatmapSurface, top: number, bottom: number, config: HeatmapConfig): RowFills {
  const active = verticalFill(surface, top, bottom, config.activeColorStart, config.activeColorEnd);
  const inactive = verticalFill(surface, top, bottom, config.inactiveColorStart, config.inactiveColorEnd);
  return { active, inactive, gradients: (typeof active === "string" ? 0 : 1) + (typeof inactive === "string" ? 0 : 1) };
}

export function traceRoundedRect(surface: HeatmapSurface, bounds: CellBounds, radius: number): void {
  const width = bounds.right - bounds.left;
  const height = bounds.bottom - bounds.top;
  const r = Math.max(0, Math.min(radius, width / 2, height / 2));

  surface.beginPath();
  surface.moveTo(bounds.left + r, bounds.top);
  surface.arcTo(bounds.right, bounds.top, bounds.right, bounds.bottom, r);
  surface.arcTo(bounds.right, bounds.bottom, bounds.left, bounds.bottom, r);
  surface.arcTo(bounds.left, bounds.bottom, bounds.left, bounds.top, r);
  surface.arcTo(bounds.left, bounds.top, bounds.right, bounds.top, r);
  surface.closePath();
}

function adapterColor<V>(adapter: HeatmapColorAdapter<V> | null | undefined, data: V | undefined, row: number, col: number): string | null {
  if (!adapter) return null;
  const color = adapter(data, row, col);
  if (typeof color !== "string") return null;
  const trimmed = color.trim();
  return trimmed ? trimmed : null;
}

/**
 * Paints labels, cells, overlays and headers for one frame.
 *
 * Reads the model only. Cells are skipped entirely when the geometry has no
 * visible cells; labels are still drawn.
 */
export function paintHeatmap<V, S extends HeatmapSurface>(surface: S, input: PaintHeatmapInput<V, S>): PaintStats {
  const { rows, headers, geometry, config, measurer, colorAdapter, cellDrawer } = input;
  const stats: PaintStats = { labels: 0, cells: 0, overlays: 0, headers: 0, gradients: 0 };
  if (rows.length === 0) return stats;

  const columnCount = Math.min(Math.max(0, Math.floor(input.columnCount)), geometry.columnCount);
  const drawCells = geometry.cellSide > 0 && columnCount > 0;

  const labelFontSpec = labelFont(config);
  const labelFontString = toFontString(labelFontSpec);
  const labelExtent = measureFontExtent(measurer, labelFontSpec);
  // Baseline offset that centres the font box on a row's vertical midpoint.
  const labelBaselineOffset = (labelExtent.ascent - labelExtent.descent) / 2;
  const labelX =
    config.labelPosition === "leading" ? geometry.padding.left : geometry.measuredWidth - geometry.padding.right;

  const headerFontString = toFontString(headerFont(config));
  const headerExtent = measureFontExtent(measurer, headerFont(config));
  const headerRow = config.headerPosition === "leading" ? 0 : rows.length - 1;

  rows.forEach((row, rowIndex) => {
    const rowTop = cellBounds(geometry, rowIndex, 0).top;
    const rowBottom = rowTop + geometry.cellSide;

    surface.font = labelFontString;
    surface.fillStyle = config.labelTextColor;
    surface.textAlign = config.labelPosition === "leading" ? "left" : "right";
    surface.textBaseline = "alphabetic";
    surface.fillText(row.label, labelX, rowTop + geometry.cellSide / 2 + labelBaselineOffset);
    stats.labels += 1;

    if (!drawCells) return;

    const fills = resolveRowFills(surface, rowTop, rowBottom, config);
    stats.gradients += fills.gradients;

    // Values are opaque: a stored `undefined` still counts as data, so overlays look up entries, not values.
    const overlayEntries = cellDrawer
      ? new Map(Array.from(row.cells, ([col, value]): [number, { value: V }] => [col, { value }]))
      : null;

    for (let col = 0; col < columnCount; col++) {
      const bounds = cellBounds(geometry, rowIndex, col);
      const hasData = row.cells.has(col);
      const data = row.cells.get(col);

      surface.fillStyle = adapterColor(colorAdapter, data, rowIndex, col) ?? (hasData ? fills.active : fills.inactive);
      traceRoundedRect(surface, bounds, config.cellCornerRadius);
      surface.fill();
      stats.cells += 1;

      const entry = overlayEntries?.get(col);
      if (cellDrawer && entry) {
        surface.save();
        try {
          cellDrawer(surface, bounds, rowIndex, col, entry.value);
        } finally {
          surface.restore();
        }
        stats.overlays += 1;
      }

      if (rowIndex === headerRow) {
        const text = headers[col];
        if (!text) continue;
        surface.font = headerFontString;
        surface.fillStyle = config.headerTextColor;
        surface.textAlign = "center";
        surface.textBaseline = "alphabetic";
        const baseline =
          config.headerPosition === "leading"
            ? bounds.top - config.headerGridGap - headerExtent.descent
            : bounds.bottom + config.headerGridGap + headerExtent.ascent;
        surface.fillText(text, bounds.left + geometry.cellSide / 2, baseline);
        stats.headers += 1;
      }
    }
  });

  return stats;
}
