import { describe, expect, it } from "vitest";
import { DEFAULT_HEATMAP_CONFIG, ZERO_PADDING, resolveHeatmapConfig, type HeatmapConfig } from "../../config/HeatmapConfig";
import { measureHeatmap, type CellBounds } from "../../layout/measureHeatmap";
import type { HeatmapRow } from "../../model/HeatmapData";
import type { TextMeasurer } from "../../text/TextMeasurer";
import { paintHeatmap, type HeatmapCellDrawer, type HeatmapColorAdapter, type HeatmapSurface } from "../paintHeatmap";

type Op =
  | { op: "fill"; fillStyle: string | CanvasGradient | CanvasPattern }
  | { op: "fillText"; text: string; x: number; y: number; font: string; align: CanvasTextAlign; fillStyle: string | CanvasGradient | CanvasPattern }
  | { op: "save" }
  | { op: "restore" }
  | { op: "overlay"; row: number; col: number };

type RecordedGradient = CanvasGradient & { coords: number[]; stops: Array<[number, string]> };

class RecordingSurface implements HeatmapSurface {
  fillStyle: string | CanvasGradient | CanvasPattern = "#000000";
  font = "10px sans-serif";
  textAlign: CanvasTextAlign = "start";
  textBaseline: CanvasTextBaseline = "alphabetic";

  readonly ops: Op[] = [];
  readonly gradients: RecordedGradient[] = [];

  save(): void {
    this.ops.push({ op: "save" });
  }
  restore(): void {
    this.ops.push({ op: "restore" });
  }
  beginPath(): void {}
  moveTo(): void {}
  arcTo(): void {}
  closePath(): void {}
  fill(): void {
    this.ops.push({ op: "fill", fillStyle: this.fillStyle });
  }
  fillText(text: string, x: number, y: number): void {
    this.ops.push({ op: "fillText", text, x, y, font: this.font, align: this.textAlign, fillStyle: this.fillStyle });
  }
  createLinearGradient(x0: number, y0: number, x1: number, y1: number): CanvasGradient {
    const stops: Array<[number, string]> = [];
    const gradient: RecordedGradient = {
      coords: [x0, y0, x1, y1],
      stops,
      addColorStop: (offset: number, color: string) => {
        stops.push([offset, color]);
      }
    };
    this.gradients.push(gradient);
    return gradient;
  }

  fills(): Array<string | CanvasGradient | CanvasPattern> {
    return this.ops.flatMap((op) => (op.op === "fill" ? [op.fillStyle] : []));
  }

  texts(): Array<Extract<Op, { op: "fillText" }>> {
    return this.ops.flatMap((op) => (op.op === "fillText" ? [op] : []));
  }
}

const measurer: TextMeasurer = {
  measure: (text) => ({ width: text.length * 6, ascent: 8, descent: 2 })
};

const WEEK = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];

type Detail = { count: number };

function allenRows(...extraLabels: string[]): HeatmapRow<Detail>[] {
  return [
    {
      label: "Allen",
      cells: new Map<number, Detail>([
        [0, { count: 7000 }],
        [2, { count: 3000 }]
      ])
    },
    ...extraLabels.map((label) => ({ label, cells: new Map<number, Detail>() }))
  ];
}

function paint(
  rows: HeatmapRow<Detail>[],
  options: {
    config?: HeatmapConfig;
    headers?: string[];
    columnCount?: number;
    colorAdapter?: HeatmapColorAdapter<Detail>;
    cellDrawer?: HeatmapCellDrawer<Detail, RecordingSurface>;
  } = {}
) {
  const config = options.config ?? DEFAULT_HEATMAP_CONFIG;
  const headers = options.headers ?? WEEK;
  const columnCount = options.columnCount ?? 7;
  // 368px with an "Allen" label leaves 40px cells.
  const geometry = measureHeatmap({ availableWidth: 368, padding: ZERO_PADDING, rows, columnCount, config, measurer });
  const surface = new RecordingSurface();
  const stats = paintHeatmap(surface, {
    rows,
    headers,
    columnCount,
    geometry,
    config,
    measurer,
    colorAdapter: options.colorAdapter,
    cellDrawer: options.cellDrawer
  });
  return { surface, stats, geometry };
}

describe("paintHeatmap", () => {
  it("draws the label vertically centred on its row", () => {
    const { surface } = paint(allenRows());
    expect(surface.texts()[0]).toEqual({
      op: "fillText",
      text: "Allen",
      x: 0,
      y: 23,
      font: "14px system-ui",
      align: "left",
      fillStyle: "#ffffff"
    });
  });

  it("fills cells with data using the active gradient and the rest with the inactive color", () => {
    const { surface, stats } = paint(allenRows());

    expect(surface.gradients).toHaveLength(1);
    const [gradient] = surface.gradients;
    expect(gradient.coords).toEqual([0, 0, 0, 40]);
    expect(gradient.stops).toEqual([
      [0, "#116329"],
      [1, "#2DA44E"]
    ]);

    expect(surface.fills()).toEqual([gradient, "#222222", gradient, "#222222", "#222222", "#222222", "#222222"]);
    expect(stats).toEqual({ labels: 1, cells: 7, overlays: 0, headers: 7, gradients: 1 });
  });

  it("uses a flat color when both stops are equal", () => {
    const config = resolveHeatmapConfig({ activeColorStart: "#116329" });
    const { surface, stats } = paint(allenRows(), { config });
    expect(surface.gradients).toHaveLength(0);
    expect(stats.gradients).toBe(0);
    expect(surface.fills().slice(0, 3)).toEqual(["#116329", "#222222", "#116329"]);
  });

  it("prefers the color adapter and falls back on blank results", () => {
    const calls: Array<[Detail | undefined, number, number]> = [];
    const adapter: HeatmapColorAdapter<Detail> = (data, row, col) => {
      calls.push([data, row, col]);
      if (col === 1) return "#ff0000";
      if (col === 3) return "   ";
      return null;
    };
    const { surface } = paint(allenRows(), { colorAdapter: adapter });

    const fills = surface.fills();
    expect(fills[1]).toBe("#ff0000");
    expect(fills[3]).toBe("#222222");
    expect(fills[0]).toBe(surface.gradients[0]);
    expect(calls).toHaveLength(7);
    expect(calls[0]).toEqual([{ count: 7000 }, 0, 0]);
    expect(calls[1]).toEqual([undefined, 0, 1]);
  });

  it("runs the cell drawer after the fill for cells with data only", () => {
    const drawn: Array<{ col: number; bounds: CellBounds; count: number }> = [];
    const drawer: HeatmapCellDrawer<Detail, RecordingSurface> = (surface, bounds, row, col, data) => {
      surface.ops.push({ op: "overlay", row, col });
      drawn.push({ col, bounds, count: data.count });
    };
    const { surface, stats } = paint(allenRows(), { cellDrawer: drawer });

    expect(stats.overlays).toBe(2);
    expect(drawn).toEqual([
      { col: 0, bounds: { left: 40, top: 0, right: 80, bottom: 40 }, count: 7000 },
      { col: 2, bounds: { left: 136, top: 0, right: 176, bottom: 40 }, count: 3000 }
    ]);

    const kinds = surface.ops.map((op) => op.op);
    const firstOverlay = kinds.indexOf("overlay");
    expect(kinds.slice(firstOverlay - 3, firstOverlay + 2)).toEqual(["fillText", "fill", "save", "overlay", "restore"]);
  });

  it("treats a stored undefined value as data for overlays", () => {
    const rows: HeatmapRow<undefined>[] = [{ label: "Allen", cells: new Map([[0, undefined]]) }];
    const geometry = measureHeatmap({
      availableWidth: 368,
      padding: ZERO_PADDING,
      rows,
      columnCount: 7,
      config: DEFAULT_HEATMAP_CONFIG,
      measurer
    });
    const surface = new RecordingSurface();
    const drawn: Array<[CellBounds, number, number, undefined]> = [];
    const stats = paintHeatmap(surface, {
      rows,
      headers: WEEK,
      columnCount: 7,
      geometry,
      config: DEFAULT_HEATMAP_CONFIG,
      measurer,
      cellDrawer: (_surface, bounds, row, col, data) => {
        drawn.push([bounds, row, col, data]);
      }
    });

    expect(stats.overlays).toBe(1);
    expect(drawn).toEqual([[{ left: 40, top: 0, right: 80, bottom: 40 }, 0, 0, undefined]]);
    expect(surface.fills()[0]).toBe(surface.gradients[0]);
  });

  it("restores the surface when the drawer throws", () => {
    const drawer: HeatmapCellDrawer<Detail, RecordingSurface> = () => {
      throw new Error("overlay failed");
    };
    const rows = allenRows();
    const geometry = measureHeatmap({
      availableWidth: 368,
      padding: ZERO_PADDING,
      rows,
      columnCount: 7,
      config: DEFAULT_HEATMAP_CONFIG,
      measurer
    });
    const surface = new RecordingSurface();
    expect(() =>
      paintHeatmap(surface, {
        rows,
        headers: WEEK,
        columnCount: 7,
        geometry,
        config: DEFAULT_HEATMAP_CONFIG,
        measurer,
        cellDrawer: drawer
      })
    ).toThrow("overlay failed");
    expect(surface.ops.at(-1)).toEqual({ op: "restore" });
  });

  it("draws trailing headers once, below the last row", () => {
    const { surface, stats } = paint(allenRows("Bea"));
    const headers = surface.texts().filter((op) => op.font === "12px system-ui");

    expect(stats.headers).toBe(7);
    expect(headers.map((op) => op.text)).toEqual(WEEK);
    // Second row spans 48..88; baseline = 88 + 10 gap + 8 ascent.
    expect(headers[0]).toMatchObject({ x: 60, y: 106, align: "center", fillStyle: "#808080" });
    expect(headers[6]).toMatchObject({ x: 348, y: 106 });
  });

  it("draws leading headers once, above the first row", () => {
    const config = resolveHeatmapConfig({ headerPosition: "leading" });
    const { surface } = paint(allenRows("Bea"), { config });
    const headers = surface.texts().filter((op) => op.font === "12px system-ui");

    expect(headers).toHaveLength(7);
    // First row starts at 20; baseline = 20 - 10 gap - 2 descent.
    expect(headers[0]).toMatchObject({ text: "Mon", x: 60, y: 8 });
  });

  it("right-aligns trailing labels at the content edge", () => {
    const config = resolveHeatmapConfig({ labelPosition: "trailing" });
    const { surface } = paint(allenRows(), { config });
    expect(surface.texts()[0]).toMatchObject({ text: "Allen", x: 368, align: "right" });
    expect(surface.texts()[1]).toMatchObject({ text: "Mon", x: 20 });
  });

  it("skips missing or empty headers", () => {
    const { stats } = paint(allenRows(), { headers: ["Mon", "", "Wed"] });
    expect(stats.headers).toBe(2);
    expect(stats.cells).toBe(7);
  });

  it("draws labels but no cells when there are no columns", () => {
    const { surface, stats } = paint(allenRows(), { headers: [], columnCount: 0 });
    expect(stats).toEqual({ labels: 1, cells: 0, overlays: 0, headers: 0, gradients: 0 });
    expect(surface.texts().map((op) => op.text)).toEqual(["Allen"]);
  });

  it("draws nothing without rows", () => {
    const { surface, stats } = paint([]);
    expect(stats).toEqual({ labels: 0, cells: 0, overlays: 0, headers: 0, gradients: 0 });
    expect(surface.ops).toEqual([]);
  });

  it("ignores values stored beyond the column axis", () => {
    const rows: HeatmapRow<Detail>[] = [{ label: "Allen", cells: new Map([[99, { count: 1 }]]) }];
    const seen: number[] = [];
    const { stats } = paint(rows, {
      cellDrawer: (_surface, _bounds, _row, col) => {
        seen.push(col);
      }
    });
    expect(stats.cells).toBe(7);
    expect(seen).toEqual([]);
    expect(rows[0].cells.size).toBe(1);
  });
});
