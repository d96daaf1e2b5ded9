import { DEFAULT_COLUMN_HEADERS } from "../config/HeatmapConfig";

export type WeekRangeFormat = "short" | "numeric";

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local midnight of the Monday starting the week `weekOffset` weeks away from `reference`. */
export function startOfWeek(reference: Date, weekOffset = 0): Date {
  const start = new Date(reference.getFullYear(), reference.getMonth(), reference.getDate());
  const daysSinceMonday = (start.getDay() + 6) % 7;
  start.setDate(start.getDate() - daysSinceMonday + weekOffset * 7);
  return start;
}

export function formatDay(date: Date, format: WeekRangeFormat): string {
  if (format === "short") {
    return `${DEFAULT_COLUMN_HEADERS[date.getMonth()]} ${pad2(date.getDate())}`;
  }
  return `${pad2(date.getDate())}.${pad2(date.getMonth() + 1)}.${date.getFullYear()}.`;
}

/** `"Jan 08 - Jan 14"` (short) or `"08.01.2024. - 14.01.2024."` (numeric). */
export function formatWeekRange(reference: Date, weekOffset: number, format: WeekRangeFormat): string {
  const start = startOfWeek(reference, weekOffset);
  const end = new Date(start.getFullYear(), start.getMonth(), start.getDate() + 6);
  return `${formatDay(start, format)} - ${formatDay(end, format)}`;
}

export type DailyCount = {
  /** 1-based position of the day within the displayed range. */
  day: number;
  count: number;
};

export type ActivitySample = {
  label: string;
  days: DailyCount[];
};

/** Deterministic generator in [0, 1) (mulberry32). */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Random sample rows: each label gets between 1 and `columnCount` active days
 * picked without repetition.
 */
export function sampleActivity(
  labels: readonly string[],
  columnCount: number,
  random: () => number = Math.random
): ActivitySample[] {
  return labels.map((label) => {
    const pool = Array.from({ length: columnCount }, (_, index) => index + 1);
    for (let i = pool.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    const activeCount = 1 + Math.floor(random() * columnCount);
    const days = pool
      .slice(0, activeCount)
      .sort((a, b) => a - b)
      .map((day) => ({ day, count: 1 + Math.floor(random() * 10_000) }));
    return { label, days };
  });
}
