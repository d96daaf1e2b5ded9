import { LruCache } from "../utils/LruCache";

export type FontSpec = {
  family: string;
  sizePx: number;
  weight?: string | number;
};

export type TextMeasurement = {
  width: number;
  /** Distance from the baseline to the top of the font box (non-negative). */
  ascent: number;
  /** Distance from the baseline to the bottom of the font box (non-negative). */
  descent: number;
};

/** Text metrics service consumed by layout and painting. */
export interface TextMeasurer {
  measure(text: string, font: FontSpec): TextMeasurement;
}

export type MeasureContext = Pick<CanvasRenderingContext2D, "font" | "measureText">;

type VerticalMetrics = { ascent: number; descent: number };

// Vertical metrics are taken from glyphs that reach both the cap height and the descender.
const VERTICAL_PROBE = "Mg";

export function toFontString(font: FontSpec): string {
  const weight = font.weight === undefined ? "" : `${font.weight} `;
  return `${weight}${font.sizePx}px ${font.family}`;
}

function firstFinite(fallback: number, ...values: Array<number | undefined>): number {
  for (const value of values) {
    if (typeof value === "number" && Number.isFinite(value)) return Math.abs(value);
  }
  return fallback;
}

export class CanvasTextMeasurer implements TextMeasurer {
  private readonly ctx: MeasureContext;
  private readonly widthCache = new LruCache<string, number>(10_000);
  private readonly verticalCache = new LruCache<string, VerticalMetrics>(64);

  constructor(ctx: MeasureContext) {
    this.ctx = ctx;
  }

  measure(text: string, font: FontSpec): TextMeasurement {
    const fontString = toFontString(font);
    const vertical = this.verticalCache.getOrCompute(fontString, () => this.measureVertical(fontString, font.sizePx));
    const width = this.widthCache.getOrCompute(`${fontString}\u0000${text}`, () => {
      if (text.length === 0) return 0;
      this.ctx.font = fontString;
      return firstFinite(0, this.ctx.measureText(text).width);
    });
    return { width, ascent: vertical.ascent, descent: vertical.descent };
  }

  private measureVertical(fontString: string, sizePx: number): VerticalMetrics {
    this.ctx.font = fontString;
    const metrics = this.ctx.measureText(VERTICAL_PROBE);
    // Font-box metrics are missing on older engines; fall back to the glyph box, then to
    // a typical 80/20 split of the em square.
    return {
      ascent: firstFinite(sizePx * 0.8, metrics.fontBoundingBoxAscent, metrics.actualBoundingBoxAscent),
      descent: firstFinite(sizePx * 0.2, metrics.fontBoundingBoxDescent, metrics.actualBoundingBoxDescent)
    };
  }
}

/** Ascent and descent of a font, read through any {@link TextMeasurer}. */
export function measureFontExtent(measurer: TextMeasurer, font: FontSpec): { ascent: number; descent: number } {
  const { ascent, descent } = measurer.measure(VERTICAL_PROBE, font);
  return { ascent: firstFinite(0, ascent), descent: firstFinite(0, descent) };
}

/** Creates a measurer backed by its own canvas so layout never touches a render context. */
export function createCanvasTextMeasurer(): CanvasTextMeasurer {
  const ctx = document.createElement("canvas").getContext("2d");
  if (!ctx) {
    throw new Error("Failed to acquire a canvas 2D context for text measurement.");
  }
  return new CanvasTextMeasurer(ctx);
}
