/**
 * Viewport Controller
 *
 * Pure geometry between the page, the rendered bitmap and the terminal
 * frame. No state: callers pass the current ViewportState and get back the
 * render request and the per-frame placement.
 *
 * Coordinate systems:
 * - page space: points (1/72 in), from the document
 * - bitmap space: pixels of the rasterized page
 * - frame space: terminal cells; `cell` gives the pixel size of one cell
 *
 * Pan and crop live in bitmap space. The display scale maps bitmap pixels to
 * frame pixels: at zoom Z a bitmap rendered at `base × Z/100` is shown 1:1,
 * and a bitmap that had to be capped below that is stretched back up.
 */

import type { ViewportState } from './viewport-state';
import { isFitView } from './viewport-state';

export type ColorMode = 'color' | 'grayscale';

export interface PageSize {
  width: number;
  height: number;
}

export interface CellSize {
  widthPx: number;
  heightPx: number;
}

export interface RenderRequest {
  pageIndex: number;
  targetPixelWidth: number;
  targetPixelHeight: number;
  colorMode: ColorMode;
}

export interface RenderBudget {
  /** Upper bound on bitmap pixel count */
  maxRenderPixels: number;
  /** Upper bound on either bitmap side */
  maxRenderDimension: number;
  /** Upper bound on transmitted pixel count */
  maxTransmitPixels: number;
}

export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CellRect {
  col: number;
  row: number;
  cols: number;
  rows: number;
}

export interface PlacementGeometry {
  /** Region of the bitmap to show; always inside the bitmap */
  cropRect: PixelRect;
  /** Where the image goes, centered in the frame */
  targetCellRect: CellRect;
  /** Buffer size actually sent; ≤ maxTransmitPixels */
  transmitWidth: number;
  transmitHeight: number;
  /** 1 when no downscale was needed */
  downscaleFactor: number;
  /** Pan after clamping; write back into ViewportState */
  clampedPan: { panX: number; panY: number };
}

export interface RenderPlan {
  request: RenderRequest;
  /** Width the frame would want at zoom 100 */
  baseWidth: number;
  fitToFrame: boolean;
}

const MIN_PAGE_RATIO = 0.05;
const MAX_PAGE_RATIO = 20;

export function pageAspectRatio(page: PageSize): number {
  const ratio = page.width / Math.max(1, page.height);
  if (!Number.isFinite(ratio) || ratio <= 0) return 1;
  return Math.min(MAX_PAGE_RATIO, Math.max(MIN_PAGE_RATIO, ratio));
}

export function framePixelSize(state: Pick<ViewportState, 'frameWidthCells' | 'frameHeightCells'>, cell: CellSize) {
  return {
    width: Math.max(1, state.frameWidthCells * Math.max(1, cell.widthPx)),
    height: Math.max(1, state.frameHeightCells * Math.max(1, cell.heightPx)),
  };
}

/**
 * Compute the bitmap to rasterize for the current view.
 *
 * At zoom 100 without pan the page fills the frame height first and is
 * centered horizontally; otherwise the base width is the frame width and
 * zoom scales it.
 */
export function computeRenderPlan(
  pageIndex: number,
  page: PageSize,
  state: ViewportState,
  cell: CellSize,
  budget: RenderBudget,
  colorMode: ColorMode = 'color'
): RenderPlan {
  const frame = framePixelSize(state, cell);
  const ratio = pageAspectRatio(page);
  const fitToFrame = isFitView(state);

  const baseWidth = fitToFrame
    ? Math.min(frame.width, Math.max(1, Math.round(frame.height * ratio)))
    : frame.width;

  const zoomed = Math.floor((baseWidth * Math.max(1, state.zoomPercent)) / 100);
  const maxWidthByPixels = Math.max(1, Math.floor(Math.sqrt(budget.maxRenderPixels * ratio)));
  const maxWidthByHeight = Math.max(1, Math.floor(budget.maxRenderDimension * ratio));

  const width = Math.max(1, Math.min(zoomed, budget.maxRenderDimension, maxWidthByPixels, maxWidthByHeight));
  const height = Math.max(1, Math.min(budget.maxRenderDimension, Math.round(width / ratio)));

  return {
    request: { pageIndex, targetPixelWidth: width, targetPixelHeight: height, colorMode },
    baseWidth,
    fitToFrame,
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Scale factor that brings `width × height` under `budget` pixels.
 */
export function transmissionScale(width: number, height: number, budget: number): number {
  const area = width * height;
  if (area <= budget) return 1;
  return Math.sqrt(budget / Math.max(1, area));
}

/**
 * Transmitted size of a `width × height` crop: scaled by
 * `transmissionScale`, floored, and never more than `budget` pixels.
 */
export function transmitSize(
  width: number,
  height: number,
  budget: number
): { width: number; height: number; factor: number } {
  const factor = transmissionScale(width, height, budget);
  if (factor >= 1) return { width, height, factor };

  const limit = Math.max(1, Math.floor(budget));
  let w = Math.max(1, Math.floor(width * factor));
  let h = Math.max(1, Math.floor(height * factor));
  // A side held at one pixel leaves the other free to exceed the budget.
  while (w * h > limit) {
    if (w >= h) w = Math.max(1, Math.min(w - 1, Math.floor(limit / h)));
    else h = Math.max(1, Math.min(h - 1, Math.floor(limit / w)));
  }
  return { width: w, height: h, factor };
}

/**
 * Compute the crop, transmit size and target cell rect for one frame.
 */
export function computePlacement(
  bitmap: { width: number; height: number },
  plan: Pick<RenderPlan, 'baseWidth' | 'fitToFrame'>,
  state: ViewportState,
  cell: CellSize,
  maxTransmitPixels: number
): PlacementGeometry {
  const frame = framePixelSize(state, cell);
  const cellW = Math.max(1, cell.widthPx);
  const cellH = Math.max(1, cell.heightPx);

  // Bitmap pixels → frame pixels.
  const zoomFactor = Math.max(1, state.zoomPercent) / 100;
  const bitmapScale = bitmap.width / Math.max(1, plan.baseWidth);
  const displayScale = plan.fitToFrame
    ? Math.min(frame.width / bitmap.width, frame.height / bitmap.height, 1 / Math.max(bitmapScale, 1e-9))
    : zoomFactor / Math.max(bitmapScale, 1e-9);

  let cropRect: PixelRect;
  if (plan.fitToFrame) {
    cropRect = { x: 0, y: 0, width: bitmap.width, height: bitmap.height };
  } else {
    const cropW = clamp(Math.floor(frame.width / displayScale), 1, bitmap.width);
    const cropH = clamp(Math.floor(frame.height / displayScale), 1, bitmap.height);
    cropRect = {
      x: clamp(Math.round(state.panX), 0, bitmap.width - cropW),
      y: clamp(Math.round(state.panY), 0, bitmap.height - cropH),
      width: cropW,
      height: cropH,
    };
  }

  const transmit = transmitSize(cropRect.width, cropRect.height, maxTransmitPixels);

  // Placement is sized from the crop, not the transmitted buffer: the sink
  // stretches a downscaled buffer back over the full area.
  const displayW = Math.min(frame.width, cropRect.width * displayScale);
  const displayH = Math.min(frame.height, cropRect.height * displayScale);
  const cols = clamp(Math.ceil(displayW / cellW - 1e-9), 1, state.frameWidthCells);
  const rows = clamp(Math.ceil(displayH / cellH - 1e-9), 1, state.frameHeightCells);

  return {
    cropRect,
    targetCellRect: {
      col: Math.floor((state.frameWidthCells - cols) / 2),
      row: Math.floor((state.frameHeightCells - rows) / 2),
      cols,
      rows,
    },
    transmitWidth: transmit.width,
    transmitHeight: transmit.height,
    downscaleFactor: transmit.factor,
    clampedPan: { panX: cropRect.x, panY: cropRect.y },
  };
}

/**
 * True when `inner` lies entirely inside a `width × height` bitmap.
 */
export function rectWithinBitmap(inner: PixelRect, width: number, height: number): boolean {
  return (
    inner.x >= 0 &&
    inner.y >= 0 &&
    inner.width >= 1 &&
    inner.height >= 1 &&
    inner.x + inner.width <= width &&
    inner.y + inner.height <= height
  );
}
