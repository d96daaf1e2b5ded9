import { DEFAULT_COLUMN_HEADERS } from "../config/HeatmapConfig";

/**
 * One labeled row of the heatmap.
 *
 * `cells` maps a column index to the caller's value for that cell. A missing key
 * means the cell has no data and renders with the inactive fill.
 */
export interface HeatmapRow<V> {
  readonly label: string;
  readonly cells: ReadonlyMap<number, V>;
}

export type LabelExtractor<T> = (item: T) => string;
export type DetailExtractor<T, D> = (item: T) => Iterable<D>;
/** Maps a detail to its column; `position` is the detail's 0-based position within its item. */
export type ColumnIndexMapper<D> = (detail: D, position: number) => number;

/**
 * Immutable data the widget paints from. Every data-set call produces a new
 * snapshot; a paint in progress keeps reading the one it started with.
 */
export interface HeatmapSnapshot<V> {
  readonly rows: readonly HeatmapRow<V>[];
  readonly headers: readonly string[];
  readonly columnCount: number;
}

export type BindStats = {
  rows: number;
  cells: number;
  /** Details discarded because their column index was negative or not an integer. */
  dropped: number;
};

export type BindResult<V> = {
  rows: HeatmapRow<V>[];
  stats: BindStats;
};

export function isColumnIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0;
}

/**
 * Projects business items onto heatmap rows.
 *
 * Errors thrown by the extractors propagate unchanged; nothing is partially bound.
 */
export function bindRowsWithStats<T, D>(
  items: Iterable<T>,
  labelOf: LabelExtractor<T>,
  detailsOf: DetailExtractor<T, D>,
  indexOf?: ColumnIndexMapper<D> | null
): BindResult<D> {
  const rows: HeatmapRow<D>[] = [];
  const stats: BindStats = { rows: 0, cells: 0, dropped: 0 };

  for (const item of items) {
    const label = labelOf(item);
    const cells = new Map<number, D>();
    let position = 0;
    for (const detail of detailsOf(item)) {
      const index = indexOf ? indexOf(detail, position) : position;
      position += 1;
      if (!isColumnIndex(index)) {
        stats.dropped += 1;
        continue;
      }
      cells.set(index, detail);
    }
    stats.cells += cells.size;
    rows.push({ label, cells });
  }

  stats.rows = rows.length;
  return { rows, stats };
}

export function bindRows<T, D>(
  items: Iterable<T>,
  labelOf: LabelExtractor<T>,
  detailsOf: DetailExtractor<T, D>,
  indexOf?: ColumnIndexMapper<D> | null
): HeatmapRow<D>[] {
  return bindRowsWithStats(items, labelOf, detailsOf, indexOf).rows;
}

/** Copies caller-built rows so later mutation of their maps cannot leak into a snapshot. */
export function copyRows<V>(rows: Iterable<HeatmapRow<V>>): HeatmapRow<V>[] {
  const copied: HeatmapRow<V>[] = [];
  for (const row of rows) {
    const cells = new Map<number, V>();
    for (const [index, value] of row.cells) {
      if (isColumnIndex(index)) cells.set(index, value);
    }
    copied.push({ label: row.label, cells });
  }
  return copied;
}

export function createSnapshot<V>(headers: readonly string[] = DEFAULT_COLUMN_HEADERS): HeatmapSnapshot<V> {
  const frozen = [...headers];
  return { rows: [], headers: frozen, columnCount: frozen.length };
}

/**
 * Replaces the rows of `previous`. Supplying `headers` also replaces the headers
 * and makes their length the column count; omitting them keeps the previous axis.
 */
export function nextSnapshot<V>(
  previous: HeatmapSnapshot<unknown>,
  rows: readonly HeatmapRow<V>[],
  headers?: readonly string[] | null
): HeatmapSnapshot<V> {
  if (headers) {
    const nextHeaders = [...headers];
    return { rows, headers: nextHeaders, columnCount: nextHeaders.length };
  }
  return { rows, headers: previous.headers, columnCount: previous.columnCount };
}
