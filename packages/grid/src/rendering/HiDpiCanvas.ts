export type CanvasSize = { width: number; height: number };

export function sanitizeDevicePixelRatio(devicePixelRatio: number): number {
  return Number.isFinite(devicePixelRatio) && devicePixelRatio > 0 ? devicePixelRatio : 1;
}

/**
 * Sizes the canvas backing store for `devicePixelRatio` and scales the context
 * so drawing code works in CSS pixels. Returns the ratio actually applied.
 */
export function setupHiDpiCanvas(
  canvas: HTMLCanvasElement,
  ctx: Pick<CanvasRenderingContext2D, "setTransform">,
  size: CanvasSize,
  devicePixelRatio: number
): number {
  const dpr = sanitizeDevicePixelRatio(devicePixelRatio);
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);

  canvas.style.width = `${width}px`;
  canvas.style.height = `${height}px`;

  // Backing stores cannot be zero-sized in every engine; keep at least one device pixel.
  const nextWidth = Math.max(1, Math.ceil(width * dpr));
  const nextHeight = Math.max(1, Math.ceil(height * dpr));

  if (canvas.width !== nextWidth) canvas.width = nextWidth;
  if (canvas.height !== nextHeight) canvas.height = nextHeight;

  ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
  return dpr;
}
