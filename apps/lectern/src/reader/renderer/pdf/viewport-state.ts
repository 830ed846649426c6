/**
 * Viewport State
 *
 * Reducer over the user's view of the current page. Every navigation action
 * goes through `viewportReducer`; the RenderCoordinator owns the resulting
 * state and exposes it as a readable store so the UI sees corrected pan.
 *
 * Pan is stored in bitmap pixels. Its upper bound depends on the rendered
 * bitmap, so the reducer only enforces the lower bound (0); the viewport
 * controller clamps the rest each frame and reports back via PAN_CLAMPED.
 */

import type { ZoomConfig } from '../../../config/viewer-config';

export interface ViewportState {
  zoomPercent: number;
  panX: number;
  panY: number;
  frameWidthCells: number;
  frameHeightCells: number;
}

export type ViewportAction =
  | { type: 'ZOOM_IN' }
  | { type: 'ZOOM_OUT' }
  | { type: 'SET_ZOOM'; payload: number }
  | { type: 'RESET_VIEW' }
  | { type: 'PAN_PIXELS'; payload: { dx: number; dy: number } }
  | { type: 'PAN_CLAMPED'; payload: { panX: number; panY: number } }
  | { type: 'RESIZE'; payload: { widthCells: number; heightCells: number } }
  | { type: 'RESET_PAN' };

export const DEFAULT_ZOOM: ZoomConfig = { min: 50, max: 400, step: 25, default: 100 };

export function initialViewportState(zoom: ZoomConfig = DEFAULT_ZOOM, frame = { widthCells: 80, heightCells: 24 }): ViewportState {
  return {
    zoomPercent: clampZoom(zoom.default, zoom),
    panX: 0,
    panY: 0,
    frameWidthCells: Math.max(1, Math.floor(frame.widthCells)),
    frameHeightCells: Math.max(1, Math.floor(frame.heightCells)),
  };
}

export function clampZoom(zoomPercent: number, zoom: ZoomConfig): number {
  return Math.min(zoom.max, Math.max(zoom.min, Math.round(zoomPercent)));
}

function withZoom(state: ViewportState, zoomPercent: number, zoom: ZoomConfig): ViewportState {
  const next = clampZoom(zoomPercent, zoom);
  if (next === state.zoomPercent) return state;
  // Pan is in bitmap pixels of the old zoom level; it has no meaning at the new one.
  return { ...state, zoomPercent: next, panX: 0, panY: 0 };
}

export function viewportReducer(
  state: ViewportState,
  action: ViewportAction,
  zoom: ZoomConfig = DEFAULT_ZOOM
): ViewportState {
  switch (action.type) {
    case 'ZOOM_IN':
      return withZoom(state, state.zoomPercent + zoom.step, zoom);

    case 'ZOOM_OUT':
      return withZoom(state, state.zoomPercent - zoom.step, zoom);

    case 'SET_ZOOM':
      return withZoom(state, action.payload, zoom);

    case 'RESET_VIEW':
      return { ...state, zoomPercent: 100, panX: 0, panY: 0 };

    case 'PAN_PIXELS':
      return {
        ...state,
        panX: Math.max(0, Math.round(state.panX + action.payload.dx)),
        panY: Math.max(0, Math.round(state.panY + action.payload.dy)),
      };

    case 'PAN_CLAMPED':
      if (action.payload.panX === state.panX && action.payload.panY === state.panY) {
        return state;
      }
      return { ...state, panX: action.payload.panX, panY: action.payload.panY };

    case 'RESIZE': {
      const frameWidthCells = Math.max(1, Math.floor(action.payload.widthCells));
      const frameHeightCells = Math.max(1, Math.floor(action.payload.heightCells));
      if (frameWidthCells === state.frameWidthCells && frameHeightCells === state.frameHeightCells) {
        return state;
      }
      return { ...state, frameWidthCells, frameHeightCells };
    }

    case 'RESET_PAN':
      if (state.panX === 0 && state.panY === 0) return state;
      return { ...state, panX: 0, panY: 0 };

    default:
      return state;
  }
}

export function isFitView(state: Pick<ViewportState, 'zoomPercent' | 'panX' | 'panY'>): boolean {
  return state.zoomPercent === 100 && state.panX === 0 && state.panY === 0;
}
