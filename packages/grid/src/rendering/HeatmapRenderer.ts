import {
  heatmapConfigsEqual,
  paddingsEqual,
  resolveHeatmapConfig,
  resolveHeatmapPadding,
  type AxisPosition,
  type HeatmapConfig,
  type HeatmapConfigOverrides,
  type HeatmapPadding
} from "../config/HeatmapConfig";
import { HeatmapReentrancyError } from "../errors";
import { resolveCell, type HeatmapHit } from "../interaction/hitTest";
import { measureHeatmap, type HeatmapGeometry } from "../layout/measureHeatmap";
import { createLogger, type Logger } from "../logging/logger";
import {
  bindRowsWithStats,
  copyRows,
  createSnapshot,
  nextSnapshot,
  type ColumnIndexMapper,
  type DetailExtractor,
  type HeatmapRow,
  type HeatmapSnapshot,
  type LabelExtractor
} from "../model/HeatmapData";
import { createCanvasTextMeasurer, type TextMeasurer } from "../text/TextMeasurer";
import { sanitizeDevicePixelRatio, setupHiDpiCanvas } from "./HiDpiCanvas";
import { paintHeatmap, type HeatmapCellDrawer, type HeatmapColorAdapter, type PaintStats } from "./paintHeatmap";

export type HeatmapClickListener<V> = (row: number, col: number, data: V | undefined) => void;

export interface HeatmapRendererOptions {
  config?: HeatmapConfigOverrides;
  padding?: Partial<HeatmapPadding>;
  /** Initial column headers; defaults to month abbreviations. */
  headers?: readonly string[];
  /** Text metrics service. Defaults to a canvas-backed measurer created on {@link HeatmapRenderer.attach}. */
  measurer?: TextMeasurer;
  logger?: Logger;
  /** Called whenever a measurement pass changes the height the widget needs. */
  onLayout?: (geometry: HeatmapGeometry) => void;
}

type BusyPhase = "painting" | "measuring" | "dispatching a click";

export class HeatmapRenderer<V = unknown> {
  private snapshot: HeatmapSnapshot<V>;
  private config: HeatmapConfig;
  private padding: HeatmapPadding;

  private colorAdapter: HeatmapColorAdapter<V> | null = null;
  private cellDrawer: HeatmapCellDrawer<V> | null = null;
  private clickListener: HeatmapClickListener<V> | null = null;

  private canvas?: HTMLCanvasElement;
  private ctx?: CanvasRenderingContext2D;
  private measurer?: TextMeasurer;

  private availableWidth: number | null = null;
  private devicePixelRatio = 1;
  private geometry: HeatmapGeometry | null = null;
  private lastLayoutHeight: number | null = null;
  private lastPaintStats: PaintStats | null = null;

  private scheduled = false;
  private busy: BusyPhase | null = null;

  private readonly logger: Logger;
  private readonly onLayout?: (geometry: HeatmapGeometry) => void;

  constructor(options: HeatmapRendererOptions = {}) {
    this.config = resolveHeatmapConfig(options.config);
    this.padding = resolveHeatmapPadding(options.padding);
    this.snapshot = createSnapshot<V>(options.headers);
    this.measurer = options.measurer;
    this.logger = options.logger ?? createLogger();
    this.onLayout = options.onLayout;
  }

  attach(canvas: HTMLCanvasElement): void {
    const ctx = canvas.getContext("2d");
    if (!ctx) {
      throw new Error("Failed to acquire canvas 2D context.");
    }
    this.canvas = canvas;
    this.ctx = ctx;
    if (!this.measurer) {
      this.measurer = createCanvasTextMeasurer();
    }
    this.invalidate();
  }

  destroy(): void {
    this.canvas = undefined;
    this.ctx = undefined;
    this.clickListener = null;
  }

  resize(width: number, devicePixelRatio: number): void {
    this.assertIdle("resize");
    const nextWidth = Number.isFinite(width) && width > 0 ? width : 0;
    const nextDpr = sanitizeDevicePixelRatio(devicePixelRatio);
    if (nextWidth === this.availableWidth && nextDpr === this.devicePixelRatio) return;
    this.availableWidth = nextWidth;
    this.devicePixelRatio = nextDpr;
    this.invalidate();
  }

  // --- Data -----------------------------------------------------------------

  /**
   * Binds business items to rows. Each detail lands in column `indexOf(detail, position)`,
   * or its position when no mapper is given; negative indices are dropped.
   *
   * Supplying `headers` replaces the column axis. Omitting them keeps the
   * current headers and column count so data can be refreshed on its own.
   */
  bindData<T>(
    items: Iterable<T>,
    labelOf: LabelExtractor<T>,
    detailsOf: DetailExtractor<T, V>,
    indexOf?: ColumnIndexMapper<V> | null,
    headers?: readonly string[] | null
  ): void {
    this.assertIdle("bindData");
    const { rows, stats } = bindRowsWithStats(items, labelOf, detailsOf, indexOf);
    this.replaceSnapshot(rows, headers);
    this.logger.debug({ ...stats, columnCount: this.snapshot.columnCount }, "heatmap data bound");
  }

  setRows(rows: Iterable<HeatmapRow<V>>, headers?: readonly string[] | null): void {
    this.assertIdle("setRows");
    const copied = copyRows(rows);
    this.replaceSnapshot(copied, headers);
    this.logger.debug({ rows: copied.length, columnCount: this.snapshot.columnCount }, "heatmap rows set");
  }

  getRows(): readonly HeatmapRow<V>[] {
    return this.snapshot.rows;
  }

  getHeaders(): readonly string[] {
    return this.snapshot.headers;
  }

  getColumnCount(): number {
    return this.snapshot.columnCount;
  }

  // --- Adapters -------------------------------------------------------------

  setColorAdapter(adapter: HeatmapColorAdapter<V> | null | undefined): void {
    this.colorAdapter = adapter ?? null;
    this.requestRender();
  }

  setCellDrawer(drawer: HeatmapCellDrawer<V> | null | undefined): void {
    this.cellDrawer = drawer ?? null;
    this.requestRender();
  }

  setClickListener(listener: HeatmapClickListener<V> | null | undefined): void {
    this.clickListener = listener ?? null;
  }

  hasClickListener(): boolean {
    return this.clickListener !== null;
  }

  // --- Style ----------------------------------------------------------------

  getConfig(): HeatmapConfig {
    return { ...this.config };
  }

  setConfig(overrides: HeatmapConfigOverrides): void {
    this.assertIdle("setConfig");
    const next = resolveHeatmapConfig(this.config, overrides);
    if (heatmapConfigsEqual(this.config, next)) return;
    this.config = next;
    this.invalidate();
  }

  setLabelTextSize(sizePx: number): void {
    this.setConfig({ labelTextSize: sizePx });
  }

  setHeaderTextSize(sizePx: number): void {
    this.setConfig({ headerTextSize: sizePx });
  }

  setLabelGridGap(gap: number): void {
    this.setConfig({ labelGridGap: gap });
  }

  setHeaderGridGap(gap: number): void {
    this.setConfig({ headerGridGap: gap });
  }

  setCellGap(gap: number): void {
    this.setConfig({ cellGap: gap });
  }

  setCellCornerRadius(radius: number): void {
    this.setConfig({ cellCornerRadius: radius });
  }

  setLabelPosition(position: AxisPosition): void {
    this.setConfig({ labelPosition: position });
  }

  setHeaderPosition(position: AxisPosition): void {
    this.setConfig({ headerPosition: position });
  }

  setLabelTextColor(color: string): void {
    this.setConfig({ labelTextColor: color });
  }

  setHeaderTextColor(color: string): void {
    this.setConfig({ headerTextColor: color });
  }

  /** Omitting `end` paints cells with data in the solid `start` color. */
  setActiveColors(start: string, end?: string): void {
    this.setConfig({ activeColorStart: start, activeColorEnd: end ?? start });
  }

  setInactiveColors(start: string, end?: string): void {
    this.setConfig({ inactiveColorStart: start, inactiveColorEnd: end ?? start });
  }

  getPadding(): HeatmapPadding {
    return { ...this.padding };
  }

  setPadding(padding: Partial<HeatmapPadding>): void {
    this.assertIdle("setPadding");
    const next = resolveHeatmapPadding({
      top: padding.top ?? this.padding.top,
      right: padding.right ?? this.padding.right,
      bottom: padding.bottom ?? this.padding.bottom,
      left: padding.left ?? this.padding.left
    });
    if (paddingsEqual(this.padding, next)) return;
    this.padding = next;
    this.invalidate();
  }

  // --- Layout and hit-testing -------------------------------------------------

  /**
   * Returns the geometry for the current snapshot, measuring first when data,
   * style or size changed since the last pass. `null` until a width and a text
   * measurer are known.
   */
  measure(): HeatmapGeometry | null {
    if (this.geometry) return this.geometry;
    if (this.availableWidth === null || !this.measurer) return null;

    const geometry = measureHeatmap({
      availableWidth: this.availableWidth,
      padding: this.padding,
      rows: this.snapshot.rows,
      columnCount: this.snapshot.columnCount,
      config: this.config,
      measurer: this.measurer
    });
    this.geometry = geometry;
    this.logger.debug(
      {
        width: geometry.measuredWidth,
        height: geometry.measuredHeight,
        cellSide: geometry.cellSide,
        rows: geometry.rowCount,
        columns: geometry.columnCount
      },
      "heatmap measured"
    );

    if (geometry.measuredHeight !== this.lastLayoutHeight) {
      this.lastLayoutHeight = geometry.measuredHeight;
      this.notifyLayout(geometry);
    }
    return geometry;
  }

  pickCellAt(x: number, y: number): HeatmapHit<V> | null {
    const geometry = this.measure();
    if (!geometry) return null;
    return resolveCell({ x, y }, geometry, this.snapshot.rows);
  }

  /**
   * Dispatches a click at surface coordinates. Returns `true` only when a
   * listener received a cell, so hosts can leave every other event to their
   * scroll containers.
   */
  handleClick(x: number, y: number): boolean {
    const listener = this.clickListener;
    if (!listener) return false;
    this.assertIdle("handleClick");
    const hit = this.pickCellAt(x, y);
    if (!hit) return false;

    this.busy = "dispatching a click";
    try {
      listener(hit.row, hit.col, hit.data);
    } finally {
      this.busy = null;
    }
    return true;
  }

  // --- Painting ---------------------------------------------------------------

  getLastPaintStats(): Readonly<PaintStats> | null {
    return this.lastPaintStats;
  }

  renderImmediately(): void {
    this.assertIdle("renderImmediately");
    this.renderFrame();
  }

  requestRender(): void {
    if (this.scheduled || !this.ctx) return;
    this.scheduled = true;
    requestAnimationFrame(() => {
      this.scheduled = false;
      this.renderFrame();
    });
  }

  private invalidate(): void {
    this.geometry = null;
    this.requestRender();
  }

  private replaceSnapshot(rows: readonly HeatmapRow<V>[], headers: readonly string[] | null | undefined): void {
    this.snapshot = nextSnapshot(this.snapshot, rows, headers);
    this.invalidate();
  }

  // onLayout receives the geometry about to be painted or hit-tested; it must not replace it.
  private notifyLayout(geometry: HeatmapGeometry): void {
    const onLayout = this.onLayout;
    if (!onLayout) return;
    const previous = this.busy;
    this.busy = "measuring";
    try {
      onLayout(geometry);
    } finally {
      this.busy = previous;
    }
  }

  private assertIdle(operation: string): void {
    if (this.busy) throw new HeatmapReentrancyError(operation, this.busy);
  }

  private renderFrame(): void {
    const canvas = this.canvas;
    const ctx = this.ctx;
    const measurer = this.measurer;
    if (!canvas || !ctx || !measurer) return;

    const snapshot = this.snapshot;
    const geometry = this.measure();
    if (!geometry) {
      this.logger.debug("heatmap paint skipped: no width has been measured yet");
      return;
    }

    this.devicePixelRatio = setupHiDpiCanvas(
      canvas,
      ctx,
      { width: geometry.measuredWidth, height: geometry.measuredHeight },
      this.devicePixelRatio
    );
    ctx.clearRect(0, 0, geometry.measuredWidth, geometry.measuredHeight);

    this.busy = "painting";
    try {
      this.lastPaintStats = paintHeatmap(ctx, {
        rows: snapshot.rows,
        headers: snapshot.headers,
        columnCount: snapshot.columnCount,
        geometry,
        config: this.config,
        measurer,
        colorAdapter: this.colorAdapter,
        cellDrawer: this.cellDrawer
      });
    } finally {
      this.busy = null;
    }
  }
}
