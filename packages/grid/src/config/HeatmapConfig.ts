import { z, type ZodIssue } from "zod";
import { HeatmapConfigError, type HeatmapConfigIssue } from "../errors";

/**
 * Default font family for labels and headers.
 *
 * Keep this unquoted so it can be embedded into `CanvasRenderingContext2D.font`
 * strings without escaping.
 */
export const DEFAULT_HEATMAP_FONT_FAMILY = "system-ui";

/** Month abbreviations used as column headers until the caller supplies its own. */
export const DEFAULT_COLUMN_HEADERS: readonly string[] = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec"
];

const ColorSchema = z.string().trim().min(1, "color must not be empty");
const LengthSchema = z.number().finite().nonnegative();
const FontSizeSchema = z.number().finite().positive();

/** Where labels (or headers) sit relative to the grid along their axis. */
export const AxisPositionSchema = z.enum(["leading", "trailing"]);
export type AxisPosition = z.infer<typeof AxisPositionSchema>;

export const HeatmapConfigSchema = z.object({
  /** Top stop of the vertical gradient for cells with data. */
  activeColorStart: ColorSchema,
  /** Bottom stop of the vertical gradient for cells with data. */
  activeColorEnd: ColorSchema,
  /** Top stop of the vertical gradient for cells without data. */
  inactiveColorStart: ColorSchema,
  /** Bottom stop of the vertical gradient for cells without data. */
  inactiveColorEnd: ColorSchema,
  cellGap: LengthSchema,
  cellCornerRadius: LengthSchema,
  /** Space between the label column and the grid. */
  labelGridGap: LengthSchema,
  labelTextColor: ColorSchema,
  labelTextSize: FontSizeSchema,
  labelPosition: AxisPositionSchema,
  /** Space between the header band text and the grid. */
  headerGridGap: LengthSchema,
  headerTextColor: ColorSchema,
  headerTextSize: FontSizeSchema,
  headerPosition: AxisPositionSchema,
  fontFamily: z.string().trim().min(1)
});

export type HeatmapConfig = z.infer<typeof HeatmapConfigSchema>;

export const HeatmapConfigOverridesSchema = HeatmapConfigSchema.partial();

export type HeatmapConfigOverrides = z.input<typeof HeatmapConfigOverridesSchema>;

export const DEFAULT_HEATMAP_CONFIG: HeatmapConfig = {
  activeColorStart: "#116329",
  activeColorEnd: "#2DA44E",
  inactiveColorStart: "#222222",
  inactiveColorEnd: "#222222",
  cellGap: 8,
  cellCornerRadius: 4,
  labelGridGap: 10,
  labelTextColor: "#ffffff",
  labelTextSize: 14,
  labelPosition: "leading",
  headerGridGap: 10,
  headerTextColor: "#808080",
  headerTextSize: 12,
  headerPosition: "trailing",
  fontFamily: DEFAULT_HEATMAP_FONT_FAMILY
};

const HEATMAP_CONFIG_KEYS = HeatmapConfigSchema.keyof().options;

export const HeatmapPaddingSchema = z.object({
  top: LengthSchema,
  right: LengthSchema,
  bottom: LengthSchema,
  left: LengthSchema
});

export type HeatmapPadding = z.infer<typeof HeatmapPaddingSchema>;

export const ZERO_PADDING: HeatmapPadding = { top: 0, right: 0, bottom: 0, left: 0 };

function toIssues(issues: readonly ZodIssue[]): HeatmapConfigIssue[] {
  return issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

function assignDefined<K extends keyof HeatmapConfig>(
  target: HeatmapConfig,
  source: Partial<HeatmapConfig>,
  key: K
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Layers validated overrides on top of {@link DEFAULT_HEATMAP_CONFIG}; later
 * sources win.
 *
 * A source that sets a gradient start color without its end color gets a solid
 * fill: the end stop follows the start stop.
 */
export function resolveHeatmapConfig(
  ...overrides: Array<HeatmapConfigOverrides | null | undefined>
): HeatmapConfig {
  const config: HeatmapConfig = { ...DEFAULT_HEATMAP_CONFIG };
  for (const override of overrides) {
    if (!override) continue;
    const parsed = HeatmapConfigOverridesSchema.strict().safeParse(override);
    if (!parsed.success) {
      throw new HeatmapConfigError("configuration", toIssues(parsed.error.issues));
    }

    const source = parsed.data;
    for (const key of HEATMAP_CONFIG_KEYS) {
      assignDefined(config, source, key);
    }

    if (source.activeColorStart !== undefined && source.activeColorEnd === undefined) {
      config.activeColorEnd = source.activeColorStart;
    }
    if (source.inactiveColorStart !== undefined && source.inactiveColorEnd === undefined) {
      config.inactiveColorEnd = source.inactiveColorStart;
    }
  }
  return config;
}

export function heatmapConfigsEqual(a: HeatmapConfig, b: HeatmapConfig): boolean {
  for (const key of HEATMAP_CONFIG_KEYS) {
    if (a[key] !== b[key]) return false;
  }
  return true;
}

export function resolveHeatmapPadding(padding: Partial<HeatmapPadding> | null | undefined): HeatmapPadding {
  const parsed = HeatmapPaddingSchema.safeParse({
    top: padding?.top ?? ZERO_PADDING.top,
    right: padding?.right ?? ZERO_PADDING.right,
    bottom: padding?.bottom ?? ZERO_PADDING.bottom,
    left: padding?.left ?? ZERO_PADDING.left
  });
  if (!parsed.success) {
    throw new HeatmapConfigError("padding", toIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function paddingsEqual(a: HeatmapPadding, b: HeatmapPadding): boolean {
  return a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left;
}
