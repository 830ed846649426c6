/**
 * PDF image pipeline: rasterization on a worker thread, the bitmap cache,
 * viewport geometry and the coordinator that drives them.
 */

export {
  RenderCoordinator,
  openReaderSession,
  applyPreferences,
  RENDER_FAILED_NOTICE,
  NO_TEXT_FALLBACK,
  NON_TEXT_LABEL,
} from './render-coordinator';
export type {
  Frame,
  ReaderImageTimings,
  ReaderPreferences,
  ReaderSessionDeps,
  ReaderSessionInit,
  ReaderSnapshot,
  ReaderState,
  RenderCoordinatorOptions,
} from './render-coordinator';

export { DocumentSession } from './document-session';
export type { DocumentBackend, DocumentSessionOptions, OpenedDocument, PixelBuffer } from './document-session';

export { MuPDFBridge, nodeWorkerFactory } from './mupdf-bridge';
export type { MuPDFBridgeOptions, WorkerFactory, WorkerHandle, WorkerTuning } from './mupdf-bridge';
export type { WorkerRequest, WorkerResponse } from './worker-protocol';

export { PageBitmapCache, cacheKeyFor, serializeCacheKey } from './page-bitmap-cache';
export type { BitmapCacheStats, BitmapView, CacheKey, ProducedBitmap } from './page-bitmap-cache';

export {
  computePlacement,
  computeRenderPlan,
  framePixelSize,
  pageAspectRatio,
  rectWithinBitmap,
  transmissionScale,
  transmitSize,
} from './viewport-controller';
export type {
  CellRect,
  CellSize,
  ColorMode,
  PageSize,
  PixelRect,
  PlacementGeometry,
  RenderBudget,
  RenderPlan,
  RenderRequest,
} from './viewport-controller';

export { DEFAULT_ZOOM, clampZoom, initialViewportState, isFitView, viewportReducer } from './viewport-state';
export type { ViewportAction, ViewportState } from './viewport-state';

export { DirtyTracker, diffFrameState } from './dirty-tracker';
export type { DirtyFlag, DirtyReason, FrameState } from './dirty-tracker';

export { RenderSessionManager } from './render-session';
export type { DisplayMode, RenderSession } from './render-session';

export { cropRgba, resizeRgba } from './pixel-ops';
export type { RgbaImage } from './pixel-ops';
