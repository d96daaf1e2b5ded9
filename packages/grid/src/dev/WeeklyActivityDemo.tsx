import React, { useCallback, useMemo, useState } from "react";

import type { CellBounds } from "../layout/measureHeatmap";
import { ActivityHeatmap } from "../react/ActivityHeatmap";
import {
  formatWeekRange,
  sampleActivity,
  seededRandom,
  type ActivitySample,
  type DailyCount,
  type WeekRangeFormat
} from "./weekRange";

const WEEKDAY_LABELS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];
const MONTH_HEADERS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const EXERCISE_LABELS = ["Pulse", "Track", "Lift", "Strength"];
const DAY_HEADERS = ["M", "T", "W", "T", "F", "S", "S"];

const getLabel = (sample: ActivitySample) => sample.label;
const getDetails = (sample: ActivitySample) => sample.days;
const getColumnIndex = (detail: DailyCount) => detail.day - 1;

function drawCount(ctx: CanvasRenderingContext2D, bounds: CellBounds, _row: number, _col: number, detail: DailyCount): void {
  const side = bounds.right - bounds.left;
  if (side < 18) return;
  ctx.fillStyle = "rgba(255, 255, 255, 0.85)";
  ctx.font = `${Math.round(side / 3)}px system-ui`;
  ctx.textAlign = "center";
  ctx.textBaseline = "middle";
  const label = detail.count >= 1000 ? `${Math.round(detail.count / 1000)}k` : String(detail.count);
  ctx.fillText(label, (bounds.left + bounds.right) / 2, (bounds.top + bounds.bottom) / 2);
}

function WeekPanel(props: {
  title: string;
  labels: readonly string[];
  headers: readonly string[];
  format: WeekRangeFormat;
  showCounts?: boolean;
}): React.ReactElement {
  const { labels, headers } = props;
  const [weekOffset, setWeekOffset] = useState(0);
  const [clicked, setClicked] = useState<string>("Click a cell");

  // Seeding by week keeps a page stable when navigating back to it.
  const items = useMemo(
    () => sampleActivity(labels, headers.length, seededRandom(weekOffset * 7919 + labels.length)),
    [labels, headers, weekOffset]
  );

  const onCellClick = useCallback(
    (row: number, col: number, detail: DailyCount | undefined) => {
      const day = headers[col] ?? String(col + 1);
      setClicked(detail ? `${labels[row]} / ${day}: ${detail.count}` : `${labels[row]} / ${day}: no activity`);
    },
    [labels, headers]
  );

  const range = formatWeekRange(new Date(), weekOffset, props.format);

  return (
    <section style={{ padding: 16, background: "#0d1117", color: "#e6edf3", borderRadius: 8, marginBottom: 16 }}>
      <div style={{ display: "flex", alignItems: "center", gap: 8, marginBottom: 12 }}>
        <strong style={{ flex: 1 }}>{props.title}</strong>
        <button type="button" onClick={() => setWeekOffset((offset) => offset - 1)}>
          Prev
        </button>
        <span>{range}</span>
        <button type="button" onClick={() => setWeekOffset((offset) => offset + 1)}>
          Next
        </button>
      </div>
      <ActivityHeatmap
        items={items}
        getLabel={getLabel}
        getDetails={getDetails}
        getColumnIndex={getColumnIndex}
        headers={headers}
        padding={{ top: 4, right: 4, bottom: 4, left: 4 }}
        cellDrawer={props.showCounts ? drawCount : null}
        onCellClick={onCellClick}
      />
      <div style={{ marginTop: 8, fontSize: 12, opacity: 0.8 }}>{clicked}</div>
    </section>
  );
}

export function WeeklyActivityDemo(): React.ReactElement {
  return (
    <div style={{ maxWidth: 720, margin: "0 auto", fontFamily: "system-ui, sans-serif" }}>
      <WeekPanel title="Activity by weekday" labels={WEEKDAY_LABELS} headers={MONTH_HEADERS} format="short" />
      <WeekPanel title="Training" labels={EXERCISE_LABELS} headers={DAY_HEADERS} format="numeric" showCounts />
    </div>
  );
}
