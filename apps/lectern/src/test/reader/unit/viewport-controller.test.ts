/**
 * Unit tests for the viewport geometry: render plan, crop, downscale and
 * placement.
 */

import { describe, it, expect } from 'vitest';
import {
  computePlacement,
  computeRenderPlan,
  pageAspectRatio,
  rectWithinBitmap,
  transmissionScale,
  transmitSize,
  type CellSize,
  type RenderBudget,
} from '@/reader/renderer/pdf/viewport-controller';
import type { ViewportState } from '@/reader/renderer/pdf/viewport-state';

const LETTER = { width: 612, height: 792 };
const CELL: CellSize = { widthPx: 8, heightPx: 16 };
const BUDGET: RenderBudget = { maxRenderPixels: 4_000_000, maxRenderDimension: 8192, maxTransmitPixels: 2_000_000 };

function view(partial: Partial<ViewportState> = {}): ViewportState {
  return { zoomPercent: 100, panX: 0, panY: 0, frameWidthCells: 80, frameHeightCells: 24, ...partial };
}

describe('pageAspectRatio', () => {
  it('should return width over height', () => {
    expect(pageAspectRatio({ width: 100, height: 50 })).toBe(2);
  });

  it('should clamp degenerate pages', () => {
    expect(pageAspectRatio({ width: 10000, height: 1 })).toBe(20);
    expect(pageAspectRatio({ width: 1, height: 10000 })).toBe(0.05);
    expect(pageAspectRatio({ width: 0, height: 100 })).toBe(1);
  });
});

describe('computeRenderPlan', () => {
  it('should fit the page height at zoom 100 without pan', () => {
    // frame 640x384 px; 384 * (612/792) = 296.7
    const plan = computeRenderPlan(0, LETTER, view(), CELL, BUDGET);

    expect(plan.fitToFrame).toBe(true);
    expect(plan.baseWidth).toBe(297);
    expect(plan.request).toEqual({ pageIndex: 0, targetPixelWidth: 297, targetPixelHeight: 384, colorMode: 'color' });
  });

  it('should scale the frame width by zoom', () => {
    const plan = computeRenderPlan(2, LETTER, view({ zoomPercent: 200 }), CELL, BUDGET, 'grayscale');

    expect(plan.fitToFrame).toBe(false);
    expect(plan.baseWidth).toBe(640);
    expect(plan.request).toEqual({ pageIndex: 2, targetPixelWidth: 1280, targetPixelHeight: 1656, colorMode: 'grayscale' });
  });

  it('should cap the bitmap at the render pixel budget', () => {
    const plan = computeRenderPlan(0, LETTER, view({ zoomPercent: 400 }), CELL, BUDGET);
    const { targetPixelWidth, targetPixelHeight } = plan.request;

    expect(targetPixelWidth).toBe(1758);
    expect(targetPixelHeight).toBe(2275);
    expect(targetPixelWidth * targetPixelHeight).toBeLessThanOrEqual(BUDGET.maxRenderPixels);
  });

  it('should cap both sides at the render dimension', () => {
    const tall = { width: 100, height: 2000 };
    const plan = computeRenderPlan(0, tall, view({ zoomPercent: 400 }), CELL, {
      ...BUDGET,
      maxRenderPixels: 100_000_000,
      maxRenderDimension: 1000,
    });

    // width limited by height: 1000 * 0.05 = 50
    expect(plan.request.targetPixelWidth).toBe(50);
    expect(plan.request.targetPixelHeight).toBe(1000);
  });
});

describe('computePlacement', () => {
  it('should center a fitted page in the frame', () => {
    const plan = computeRenderPlan(0, LETTER, view(), CELL, BUDGET);
    const bitmap = { width: plan.request.targetPixelWidth, height: plan.request.targetPixelHeight };
    const placement = computePlacement(bitmap, plan, view(), CELL, BUDGET.maxTransmitPixels);

    expect(placement.cropRect).toEqual({ x: 0, y: 0, width: 297, height: 384 });
    expect(placement.downscaleFactor).toBe(1);
    expect(placement.transmitWidth).toBe(297);
    expect(placement.transmitHeight).toBe(384);
    // 297 / 8 = 37.1 → 38 columns, centered in 80
    expect(placement.targetCellRect).toEqual({ col: 21, row: 0, cols: 38, rows: 24 });
  });

  it('should keep the target rect when only the transmit budget changes', () => {
    // cell 10x20, frame 200x100 cells → 2000x2000 px; square page at zoom 200
    const cell = { widthPx: 10, heightPx: 20 };
    const state = view({ zoomPercent: 200, frameWidthCells: 200, frameHeightCells: 100 });
    const budget = { maxRenderPixels: 16_000_000, maxRenderDimension: 8192, maxTransmitPixels: 1_000_000 };
    const plan = computeRenderPlan(0, { width: 1000, height: 1000 }, state, cell, budget);
    const bitmap = { width: plan.request.targetPixelWidth, height: plan.request.targetPixelHeight };

    expect(bitmap).toEqual({ width: 4000, height: 4000 });

    const limited = computePlacement(bitmap, plan, state, cell, 1_000_000);
    const roomy = computePlacement(bitmap, plan, state, cell, 10_000_000);

    expect(limited.cropRect).toEqual({ x: 0, y: 0, width: 2000, height: 2000 });
    expect(limited.downscaleFactor).toBe(0.5);
    expect(limited.transmitWidth).toBe(1000);
    expect(limited.transmitHeight).toBe(1000);
    expect(limited.targetCellRect).toEqual({ col: 0, row: 0, cols: 200, rows: 100 });

    expect(roomy.downscaleFactor).toBe(1);
    expect(roomy.targetCellRect).toEqual(limited.targetCellRect);
  });

  it('should clamp pan so the crop stays inside the bitmap', () => {
    const cell = { widthPx: 10, heightPx: 20 };
    const state = view({ zoomPercent: 200, frameWidthCells: 200, frameHeightCells: 100, panX: 5000, panY: 10 });
    const plan = { baseWidth: 2000, fitToFrame: false };
    const placement = computePlacement({ width: 4000, height: 4000 }, plan, state, cell, 10_000_000);

    expect(placement.cropRect).toEqual({ x: 2000, y: 10, width: 2000, height: 2000 });
    expect(placement.clampedPan).toEqual({ panX: 2000, panY: 10 });
  });

  it('should keep every crop inside the bitmap across zoom, pan and frame sizes', () => {
    for (const zoomPercent of [50, 75, 100, 150, 300, 400]) {
      for (const [frameWidthCells, frameHeightCells] of [
        [1, 1],
        [40, 12],
        [80, 24],
        [250, 70],
      ]) {
        for (const [panX, panY] of [
          [0, 0],
          [37, 911],
          [100_000, 100_000],
        ]) {
          const state = view({ zoomPercent, frameWidthCells, frameHeightCells, panX, panY });
          const plan = computeRenderPlan(0, LETTER, state, CELL, BUDGET);
          const bitmap = { width: plan.request.targetPixelWidth, height: plan.request.targetPixelHeight };
          const placement = computePlacement(bitmap, plan, state, CELL, BUDGET.maxTransmitPixels);

          expect(rectWithinBitmap(placement.cropRect, bitmap.width, bitmap.height)).toBe(true);
          expect(placement.transmitWidth * placement.transmitHeight).toBeLessThanOrEqual(BUDGET.maxTransmitPixels);
          expect(placement.targetCellRect.cols).toBeLessThanOrEqual(frameWidthCells);
          expect(placement.targetCellRect.rows).toBeLessThanOrEqual(frameHeightCells);
        }
      }
    }
  });
});

describe('transmissionScale', () => {
  it('should not scale buffers within budget', () => {
    expect(transmissionScale(1000, 1000, 1_000_000)).toBe(1);
  });

  it('should bring odd sizes under budget after flooring', () => {
    const factor = transmissionScale(1001, 999, 500_000);
    const w = Math.floor(1001 * factor);
    const h = Math.floor(999 * factor);

    expect(factor).toBeLessThan(1);
    expect(w * h).toBeLessThanOrEqual(500_000);
  });
});

describe('transmitSize', () => {
  it('should honour a budget far below the crop area', () => {
    expect(transmitSize(2048, 2048, 64)).toEqual({ width: 8, height: 8, factor: 0.00390625 });
  });

  it('should shrink the long side when the short side is held at one pixel', () => {
    expect(transmitSize(4096, 1, 64)).toEqual({ width: 64, height: 1, factor: 0.125 });
  });

  it('should keep a tiny budget through computePlacement', () => {
    const state = view({ frameWidthCells: 100, frameHeightCells: 50 });
    const plan = { baseWidth: 800, fitToFrame: true };
    const placement = computePlacement({ width: 800, height: 800 }, plan, state, CELL, 16);

    expect(placement.cropRect).toEqual({ x: 0, y: 0, width: 800, height: 800 });
    expect(placement.transmitWidth * placement.transmitHeight).toBeLessThanOrEqual(16);
    expect(placement.downscaleFactor).toBeLessThan(0.01);
  });
});
