import React, { useImperativeHandle, useLayoutEffect, useEffect, useMemo, useRef, useState } from "react";
import {
  resolveHeatmapConfig,
  resolveHeatmapPadding,
  type HeatmapConfigOverrides,
  type HeatmapPadding
} from "../config/HeatmapConfig";
import type { HeatmapHit } from "../interaction/hitTest";
import type { HeatmapGeometry } from "../layout/measureHeatmap";
import type { Logger } from "../logging/logger";
import type { ColumnIndexMapper, DetailExtractor, HeatmapRow, LabelExtractor } from "../model/HeatmapData";
import { HeatmapRenderer, type HeatmapClickListener } from "../rendering/HeatmapRenderer";
import type { HeatmapCellDrawer, HeatmapColorAdapter } from "../rendering/paintHeatmap";
import type { TextMeasurer } from "../text/TextMeasurer";

export interface HeatmapApi<V> {
  pickCellAt(x: number, y: number): HeatmapHit<V> | null;
  getGeometry(): HeatmapGeometry | null;
  getRows(): readonly HeatmapRow<V>[];
  getHeaders(): readonly string[];
  renderImmediately(): void;
}

export interface ActivityHeatmapProps<T, V> {
  items: readonly T[];
  getLabel: LabelExtractor<T>;
  getDetails: DetailExtractor<T, V>;
  /** Column for each detail. Defaults to the detail's position within its item. */
  getColumnIndex?: ColumnIndexMapper<V> | null;
  /**
   * Column headers. Leaving this unset keeps whatever headers were bound last
   * (month abbreviations initially).
   */
  headers?: readonly string[] | null;
  config?: HeatmapConfigOverrides;
  padding?: Partial<HeatmapPadding>;
  colorAdapter?: HeatmapColorAdapter<V> | null;
  cellDrawer?: HeatmapCellDrawer<V> | null;
  /** Cell clicks are only consumed while this is set. */
  onCellClick?: HeatmapClickListener<V> | null;
  apiRef?: React.Ref<HeatmapApi<V>>;
  measurer?: TextMeasurer;
  logger?: Logger;
  style?: React.CSSProperties;
}

export function ActivityHeatmap<T, V>(props: ActivityHeatmapProps<T, V>): React.ReactElement {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const rendererRef = useRef<HeatmapRenderer<V> | null>(null);
  const [height, setHeight] = useState(0);

  // Renderer construction options are read once; later changes flow through the setters below.
  const initialOptionsRef = useRef({ measurer: props.measurer, logger: props.logger });

  useImperativeHandle(
    props.apiRef,
    () => ({
      pickCellAt: (x, y) => rendererRef.current?.pickCellAt(x, y) ?? null,
      getGeometry: () => rendererRef.current?.measure() ?? null,
      getRows: () => rendererRef.current?.getRows() ?? [],
      getHeaders: () => rendererRef.current?.getHeaders() ?? [],
      renderImmediately: () => rendererRef.current?.renderImmediately()
    }),
    []
  );

  useLayoutEffect(() => {
    const container = containerRef.current;
    const canvas = canvasRef.current;
    if (!container || !canvas) return;

    const renderer = new HeatmapRenderer<V>({
      measurer: initialOptionsRef.current.measurer,
      logger: initialOptionsRef.current.logger,
      onLayout: (geometry) => setHeight(geometry.measuredHeight)
    });
    rendererRef.current = renderer;
    renderer.attach(canvas);

    const resize = () => {
      const rect = container.getBoundingClientRect();
      renderer.resize(rect.width, window.devicePixelRatio || 1);
    };

    resize();

    const ro = new ResizeObserver(resize);
    ro.observe(container);

    return () => {
      ro.disconnect();
      renderer.destroy();
      rendererRef.current = null;
    };
  }, []);

  const resolvedConfig = useMemo(() => resolveHeatmapConfig(props.config), [props.config]);
  const resolvedPadding = useMemo(() => resolveHeatmapPadding(props.padding), [props.padding]);

  useLayoutEffect(() => {
    rendererRef.current?.setConfig(resolvedConfig);
  }, [resolvedConfig]);

  useLayoutEffect(() => {
    rendererRef.current?.setPadding(resolvedPadding);
  }, [resolvedPadding]);

  const { items, getLabel, getDetails, getColumnIndex, headers } = props;
  useLayoutEffect(() => {
    rendererRef.current?.bindData(items, getLabel, getDetails, getColumnIndex, headers);
  }, [items, getLabel, getDetails, getColumnIndex, headers]);

  useLayoutEffect(() => {
    rendererRef.current?.setColorAdapter(props.colorAdapter);
  }, [props.colorAdapter]);

  useLayoutEffect(() => {
    rendererRef.current?.setCellDrawer(props.cellDrawer);
  }, [props.cellDrawer]);

  useLayoutEffect(() => {
    rendererRef.current?.setClickListener(props.onCellClick);
  }, [props.onCellClick]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const onClick = (event: MouseEvent) => {
      const renderer = rendererRef.current;
      if (!renderer?.hasClickListener()) return;
      const rect = canvas.getBoundingClientRect();
      if (renderer.handleClick(event.clientX - rect.left, event.clientY - rect.top)) {
        event.preventDefault();
      }
    };

    canvas.addEventListener("click", onClick);
    return () => canvas.removeEventListener("click", onClick);
  }, []);

  const clickable = Boolean(props.onCellClick);

  const containerStyle: React.CSSProperties = useMemo(
    () => ({
      position: "relative",
      width: "100%",
      height,
      ...props.style
    }),
    [height, props.style]
  );

  return (
    <div ref={containerRef} style={containerStyle} data-testid="activity-heatmap">
      <canvas
        ref={canvasRef}
        style={{ display: "block", cursor: clickable ? "pointer" : "default" }}
        data-testid="activity-heatmap-canvas"
        aria-hidden="true"
      />
    </div>
  );
}
