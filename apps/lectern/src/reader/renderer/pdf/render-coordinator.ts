/**
 * Render Coordinator
 *
 * Owns one reader session: the open document, the viewport, the bitmap cache,
 * the text engine and the active sink. Navigation methods only change state;
 * `renderFrame()` turns the current state into output.
 *
 * Features:
 * - No work while nothing changed (dirty tracking against the last frame)
 * - Results from superseded frame requests are dropped, never shown
 * - Page-scoped failures become placeholder frames; navigation continues
 * - Per-frame timings for a debug overlay
 *
 * @example
 * ```typescript
 * const reader = await openReaderSession({ path: 'paper.pdf', lastPage: 3 }, config, { sink });
 * reader.zoomIn();
 * const frame = await reader.renderFrame();
 * if (frame.kind === 'text') draw(frame.lines);
 * ```
 */

import { get, writable, type Readable, type Writable } from 'svelte/store';
import type { Logger } from 'pino';
import {
  IMAGE_QUALITY_PRESETS,
  type ImageQuality,
  type TextDisplayMode,
  type ViewerConfig,
} from '../../../config/viewer-config';
import { componentLogger } from '../../../logging/logger';
import { errorMessage, isPageScopedError, OpenFailed } from '../errors';
import type { ActiveSink, SinkKind } from '../sinks/protocol-sink';
import { TextStructuringEngine } from '../text/text-structuring-engine';
import { nonTextPlaceholder } from '../text/wrap';
import { DirtyTracker, diffFrameState, type DirtyReason, type FrameState } from './dirty-tracker';
import { DocumentSession, type DocumentBackend } from './document-session';
import { MuPDFBridge, type WorkerTuning } from './mupdf-bridge';
import { PageBitmapCache, cacheKeyFor, serializeCacheKey } from './page-bitmap-cache';
import { cropRgba, resizeRgba } from './pixel-ops';
import { RenderSessionManager, type DisplayMode, type RenderSession } from './render-session';
import {
  computePlacement,
  computeRenderPlan,
  type CellSize,
  type ColorMode,
  type PlacementGeometry,
  type RenderRequest,
} from './viewport-controller';
import { initialViewportState, viewportReducer, type ViewportAction, type ViewportState } from './viewport-state';

export const RENDER_FAILED_NOTICE = '(image render failed; showing text)';
export const NO_TEXT_FALLBACK = 'no text found';
export const NON_TEXT_LABEL = 'image/chart';

const TEXT_MODE_CYCLE: readonly TextDisplayMode[] = ['raw', 'wrap', 'reflow'];

export interface ReaderImageTimings {
  totalMs: number;
  rasterizeMs: number;
  viewportMs: number;
  downscaleMs: number;
  protocolMs: number;
  viewportPixels: number;
  transmitPixels: number;
  renderWidth: number;
  cacheHit: boolean;
}

export type Frame =
  | {
      kind: 'image';
      pageIndex: number;
      request: RenderRequest;
      placement: PlacementGeometry;
      sink: SinkKind;
      timings: ReaderImageTimings;
    }
  | {
      kind: 'text';
      pageIndex: number;
      textMode: TextDisplayMode;
      lines: string[];
      scroll: number;
      totalLines: number;
    }
  | {
      kind: 'placeholder';
      pageIndex: number;
      reason: 'render-failed' | 'text-failed' | 'no-text';
      lines: string[];
      error?: string;
    }
  | { kind: 'superseded' };

export interface ReaderState extends FrameState {
  pageCount: number;
}

export interface ReaderPreferences {
  defaultZoom?: number;
  textMode?: TextDisplayMode;
  imageQuality?: ImageQuality;
  maxTransmitPixels?: number;
  trimHeadersFooters?: boolean;
}

/**
 * What the application knows at session start, from its catalog.
 */
export interface ReaderSessionInit {
  path: string;
  /** 1-based, as stored */
  lastPage?: number;
  lastMode?: DisplayMode;
  preferences?: ReaderPreferences;
  frame?: { widthCells: number; heightCells: number };
}

/**
 * What the application should store when the session ends.
 */
export interface ReaderSnapshot {
  /** 1-based */
  lastPage: number;
  mode: DisplayMode;
  textMode: TextDisplayMode;
}

export interface RenderCoordinatorOptions {
  sink: ActiveSink;
  cellSize?: CellSize;
  colorMode?: ColorMode;
  logger?: Logger;
}

export interface ReaderSessionDeps extends RenderCoordinatorOptions {
  /** Rasterization backend; a worker-thread MuPDFBridge when omitted */
  backend?: DocumentBackend;
  /** Worker thread limits for the default backend */
  tuning?: WorkerTuning;
}

const DEFAULT_CELL_SIZE: CellSize = { widthPx: 8, heightPx: 16 };

/**
 * Fold session-start preferences into the loaded configuration.
 */
export function applyPreferences(config: ViewerConfig, preferences: ReaderPreferences = {}): ViewerConfig {
  const next: ViewerConfig = { ...config, zoom: { ...config.zoom }, text: { ...config.text } };

  if (preferences.imageQuality) {
    const preset = IMAGE_QUALITY_PRESETS[preferences.imageQuality];
    next.imageQuality = preferences.imageQuality;
    next.maxRenderPixels = preset.maxRenderPixels;
    next.maxTransmitPixels = preset.maxTransmitPixels;
  }
  if (preferences.maxTransmitPixels !== undefined && preferences.maxTransmitPixels > 0) {
    next.maxTransmitPixels = Math.floor(preferences.maxTransmitPixels);
  }
  if (preferences.defaultZoom !== undefined) {
    next.zoom.default = Math.min(next.zoom.max, Math.max(next.zoom.min, Math.round(preferences.defaultZoom)));
  }
  if (preferences.textMode) next.text.mode = preferences.textMode;
  if (preferences.trimHeadersFooters !== undefined) next.text.trimHeadersFooters = preferences.trimHeadersFooters;

  return next;
}

export class RenderCoordinator {
  private readonly store: Writable<ReaderState>;
  private readonly cache: PageBitmapCache;
  private readonly engine: TextStructuringEngine;
  private readonly dirty = new DirtyTracker();
  private readonly sessions = new RenderSessionManager();
  private readonly sink: ActiveSink;
  private readonly colorMode: ColorMode;
  private readonly log: Logger;

  private lastFrame: Frame | null = null;
  private lastTextLineCount: number | null = null;
  private imageOnScreen = false;
  private closed = false;

  constructor(
    private readonly document: DocumentSession,
    private readonly config: ViewerConfig,
    options: RenderCoordinatorOptions,
    initial: { pageIndex?: number; mode?: DisplayMode; frame?: { widthCells: number; heightCells: number } } = {}
  ) {
    this.log = componentLogger('RenderCoordinator', options.logger);
    this.sink = options.sink;
    this.colorMode = options.colorMode ?? 'color';
    this.cache = new PageBitmapCache({ capacity: config.cacheCapacity, logger: options.logger });
    this.engine = new TextStructuringEngine(document, { ...config.text, logger: options.logger });

    this.store = writable<ReaderState>({
      pageIndex: clampPage(initial.pageIndex ?? 0, document.pageCount),
      pageCount: document.pageCount,
      mode: initial.mode ?? 'image',
      textMode: config.text.mode,
      viewport: initialViewportState(config.zoom, initial.frame),
      textScroll: 0,
      generation: this.cache.getGeneration(),
      cell: { ...(options.cellSize ?? DEFAULT_CELL_SIZE) },
    });
  }

  /** Reactive view of the reader state, including corrected pan. */
  get state(): Readable<ReaderState> {
    return { subscribe: this.store.subscribe };
  }

  get pageCount(): number {
    return this.document.pageCount;
  }

  getState(): ReaderState {
    return get(this.store);
  }

  isDirty(): boolean {
    return this.dirty.isDirty(this.frameState());
  }

  private frameState(): FrameState {
    const { pageCount: _pageCount, ...frame } = get(this.store);
    return frame;
  }

  private update(patch: (state: ReaderState) => ReaderState): void {
    this.store.update(patch);
  }

  private dispatch(action: ViewportAction): void {
    this.update((state) => {
      const viewport = viewportReducer(state.viewport, action, this.config.zoom);
      return viewport === state.viewport ? state : { ...state, viewport };
    });
  }

  // ===========================================================================
  // Navigation
  // ===========================================================================

  /**
   * Go to a 1-based page number, clamped to the document.
   */
  gotoPage(pageNumber: number): void {
    this.setPageIndex(Math.round(pageNumber) - 1);
  }

  nextPage(): void {
    this.setPageIndex(this.getState().pageIndex + 1);
  }

  prevPage(): void {
    this.setPageIndex(this.getState().pageIndex - 1);
  }

  private setPageIndex(pageIndex: number): void {
    const next = clampPage(pageIndex, this.document.pageCount);
    this.update((state) => {
      if (state.pageIndex === next) return state;
      return {
        ...state,
        pageIndex: next,
        textScroll: 0,
        viewport: viewportReducer(state.viewport, { type: 'RESET_PAN' }, this.config.zoom),
      };
    });
    this.lastTextLineCount = null;
  }

  zoomIn(): void {
    this.dispatch({ type: 'ZOOM_IN' });
  }

  zoomOut(): void {
    this.dispatch({ type: 'ZOOM_OUT' });
  }

  setZoom(zoomPercent: number): void {
    this.dispatch({ type: 'SET_ZOOM', payload: zoomPercent });
  }

  /**
   * Back to zoom 100 with no pan. Always produces a new frame.
   */
  resetView(): void {
    this.dispatch({ type: 'RESET_VIEW' });
    this.dirty.markDirty('reset');
  }

  /** Pan by bitmap pixels. */
  pan(dx: number, dy: number): void {
    this.dispatch({ type: 'PAN_PIXELS', payload: { dx, dy } });
  }

  /** Pan by terminal cells, converted with the current cell size. */
  panCells(dCols: number, dRows: number): void {
    const { cell } = this.getState();
    this.pan(dCols * cell.widthPx, dRows * cell.heightPx);
  }

  resize(widthCells: number, heightCells: number): void {
    this.dispatch({ type: 'RESIZE', payload: { widthCells, heightCells } });
  }

  setCellSize(cell: CellSize): void {
    const widthPx = Math.max(1, Math.round(cell.widthPx));
    const heightPx = Math.max(1, Math.round(cell.heightPx));
    this.update((state) =>
      state.cell.widthPx === widthPx && state.cell.heightPx === heightPx
        ? state
        : { ...state, cell: { widthPx, heightPx } }
    );
  }

  /**
   * Scroll the text view by `lines`, clamped to the page's line count once
   * it is known.
   */
  scroll(lines: number): void {
    this.update((state) => {
      const maxScroll =
        this.lastTextLineCount === null
          ? Infinity
          : Math.max(0, this.lastTextLineCount - state.viewport.frameHeightCells);
      const textScroll = Math.min(maxScroll, Math.max(0, state.textScroll + Math.round(lines)));
      return textScroll === state.textScroll ? state : { ...state, textScroll };
    });
  }

  setMode(mode: DisplayMode): void {
    this.update((state) => (state.mode === mode ? state : { ...state, mode, textScroll: 0 }));
  }

  toggleMode(): void {
    this.setMode(this.getState().mode === 'image' ? 'text' : 'image');
  }

  setTextMode(textMode: TextDisplayMode): void {
    this.update((state) => (state.textMode === textMode ? state : { ...state, textMode, textScroll: 0 }));
    this.lastTextLineCount = null;
  }

  /** raw → wrap → reflow → raw */
  cycleTextMode(): TextDisplayMode {
    const current = this.getState().textMode;
    const next = TEXT_MODE_CYCLE[(TEXT_MODE_CYCLE.indexOf(current) + 1) % TEXT_MODE_CYCLE.length];
    this.setTextMode(next);
    return next;
  }

  /**
   * The document changed on disk: drop every bitmap and text structure.
   */
  reload(): number {
    const generation = this.cache.bumpGeneration();
    this.engine.setGeneration(generation);
    this.lastTextLineCount = null;
    this.update((state) => ({ ...state, generation }));
    this.log.info({ generation }, 'document reloaded');
    return generation;
  }

  snapshot(): ReaderSnapshot {
    const state = this.getState();
    return { lastPage: state.pageIndex + 1, mode: state.mode, textMode: state.textMode };
  }

  getCacheStats() {
    return this.cache.getStats();
  }

  // ===========================================================================
  // Frame production
  // ===========================================================================

  /**
   * Produce output for the current state. Returns the previous frame
   * unchanged when nothing is dirty; returns `superseded` when a newer
   * request was made, or the state changed, while this one was in flight.
   */
  async renderFrame(): Promise<Frame> {
    if (this.closed) return { kind: 'superseded' };

    const state = this.frameState();
    const flag = this.dirty.check(state);
    if (!flag.dirty && this.lastFrame) {
      return this.lastFrame;
    }

    const session = this.sessions.createSession(state, flag.reasons);
    this.log.debug({ session: session.sessionId, reasons: flag.reasons, page: state.pageIndex }, 'frame requested');

    const frame = state.mode === 'image' ? await this.renderImageFrame(session) : await this.renderTextFrame(session);

    if (frame.kind === 'superseded') return frame;

    this.lastFrame = frame;
    this.dirty.commit(committedState(session.snapshot, frame), session.reasons);
    return frame;
  }

  /**
   * A result is stale once a newer frame was requested or the state it was
   * built from has moved on. Checked before the frame writes its own pan or
   * scroll corrections back.
   */
  private isStale(session: RenderSession): boolean {
    if (this.closed || !this.sessions.isCurrent(session)) return true;
    return diffFrameState(session.snapshot, this.frameState()).length > 0;
  }

  private dropStale(session: RenderSession): Frame {
    this.log.debug({ session: session.sessionId }, 'stale result dropped');
    return { kind: 'superseded' };
  }

  private async renderImageFrame(session: RenderSession): Promise<Frame> {
    const { pageIndex, viewport, cell, generation } = session.snapshot;
    const started = performance.now();

    try {
      const pageSize = await this.document.pageSizePoints(pageIndex);
      const plan = computeRenderPlan(
        pageIndex,
        pageSize,
        viewport,
        cell,
        {
          maxRenderPixels: this.config.maxRenderPixels,
          maxRenderDimension: this.config.maxRenderDimension,
          maxTransmitPixels: this.config.maxTransmitPixels,
        },
        this.colorMode
      );

      const key = cacheKeyFor(plan.request, generation);
      const cacheHit = this.cache.has(key);
      const rasterStarted = performance.now();
      const bitmap = await this.cache.getOrInsert(key, () =>
        this.document.rasterize(
          pageIndex,
          plan.request.targetPixelWidth,
          plan.request.targetPixelHeight,
          plan.request.colorMode
        )
      );
      const rasterizeMs = performance.now() - rasterStarted;

      if (this.isStale(session)) return this.dropStale(session);

      const viewportStarted = performance.now();
      const placement = computePlacement(bitmap, plan, viewport, cell, this.config.maxTransmitPixels);
      const panMoved = placement.clampedPan.panX !== viewport.panX || placement.clampedPan.panY !== viewport.panY;
      if (panMoved && sameViewport(this.getState().viewport, viewport)) {
        this.dispatch({ type: 'PAN_CLAMPED', payload: placement.clampedPan });
      }
      const viewportMs = performance.now() - viewportStarted;

      const downscaleStarted = performance.now();
      const crop = cropRgba(bitmap, placement.cropRect);
      const buffer =
        placement.downscaleFactor < 1 ? resizeRgba(crop, placement.transmitWidth, placement.transmitHeight) : crop;
      const downscaleMs = performance.now() - downscaleStarted;
      if (placement.downscaleFactor < 1) {
        this.log.debug({ factor: placement.downscaleFactor, width: buffer.width, height: buffer.height }, 'downscaled');
      }

      const protocolStarted = performance.now();
      const { cropRect } = placement;
      const contentKey = `${serializeCacheKey(key)}@${cropRect.x},${cropRect.y},${cropRect.width}x${cropRect.height}>${buffer.width}x${buffer.height}`;
      this.sink.emit(buffer, placement.targetCellRect, contentKey);
      this.imageOnScreen = true;
      const protocolMs = performance.now() - protocolStarted;

      const timings: ReaderImageTimings = {
        totalMs: performance.now() - started,
        rasterizeMs,
        viewportMs,
        downscaleMs,
        protocolMs,
        viewportPixels: cropRect.width * cropRect.height,
        transmitPixels: buffer.width * buffer.height,
        renderWidth: bitmap.width,
        cacheHit,
      };
      this.log.debug({ page: pageIndex, ...timings }, 'image frame');

      return { kind: 'image', pageIndex, request: plan.request, placement, sink: this.sink.kind, timings };
    } catch (error) {
      if (!isPageScopedError(error)) throw error;
      if (this.isStale(session)) return this.dropStale(session);

      this.log.warn({ page: pageIndex, err: error }, 'rasterization failed');
      return this.renderFailureFrame(session, error);
    }
  }

  /**
   * Image failed: show the page's text under a notice instead.
   */
  private async renderFailureFrame(session: RenderSession, error: unknown): Promise<Frame> {
    const { pageIndex, viewport } = session.snapshot;
    this.clearImage();

    let body: string[];
    try {
      const layout = await this.engine.layoutPage(pageIndex, 'wrap', viewport.frameWidthCells);
      body = layout.kind === 'lines' ? layout.lines : [NO_TEXT_FALLBACK];
    } catch (textError) {
      if (!isPageScopedError(textError)) throw textError;
      this.log.warn({ page: pageIndex, err: textError }, 'text fallback failed');
      body = [NO_TEXT_FALLBACK];
    }

    if (this.isStale(session)) return this.dropStale(session);

    const message = errorMessage(error);
    return {
      kind: 'placeholder',
      pageIndex,
      reason: 'render-failed',
      lines: [RENDER_FAILED_NOTICE, `(error: ${message})`, '', ...body],
      error: message,
    };
  }

  private async renderTextFrame(session: RenderSession): Promise<Frame> {
    const { pageIndex, viewport, textMode, textScroll, generation } = session.snapshot;
    this.clearImage();
    this.engine.setGeneration(generation);

    try {
      const layout = await this.engine.layoutPage(pageIndex, textMode, viewport.frameWidthCells);
      if (this.isStale(session)) return this.dropStale(session);

      if (layout.kind === 'empty') {
        this.lastTextLineCount = 0;
        return {
          kind: 'placeholder',
          pageIndex,
          reason: 'no-text',
          lines: nonTextPlaceholder(viewport.frameWidthCells, viewport.frameHeightCells, NON_TEXT_LABEL),
        };
      }

      const totalLines = layout.lines.length;
      this.lastTextLineCount = totalLines;
      const maxScroll = Math.max(0, totalLines - viewport.frameHeightCells);
      const scroll = Math.min(maxScroll, textScroll);
      if (scroll !== textScroll) {
        this.update((state) => (state.textScroll === textScroll ? { ...state, textScroll: scroll } : state));
      }

      return {
        kind: 'text',
        pageIndex,
        textMode,
        lines: layout.lines.slice(scroll, scroll + viewport.frameHeightCells),
        scroll,
        totalLines,
      };
    } catch (error) {
      if (!isPageScopedError(error)) throw error;
      if (this.isStale(session)) return this.dropStale(session);

      this.log.warn({ page: pageIndex, err: error }, 'text extraction failed');
      const message = errorMessage(error);
      return {
        kind: 'placeholder',
        pageIndex,
        reason: 'text-failed',
        lines: [`(text extraction failed: ${message})`],
        error: message,
      };
    }
  }

  private clearImage(): void {
    if (!this.imageOnScreen) return;
    this.sink.clear();
    this.imageOnScreen = false;
  }

  /**
   * End the session: in-flight results are dropped and the document closed.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.sessions.invalidate();
    this.clearImage();
    this.cache.clear();
    await this.document.close();
  }
}

function sameViewport(a: ViewportState, b: ViewportState): boolean {
  return (
    a.zoomPercent === b.zoomPercent &&
    a.panX === b.panX &&
    a.panY === b.panY &&
    a.frameWidthCells === b.frameWidthCells &&
    a.frameHeightCells === b.frameHeightCells
  );
}

/**
 * The state a produced frame actually shows: the request snapshot with the
 * pan or scroll corrections made while producing it.
 */
function committedState(snapshot: FrameState, frame: Frame): FrameState {
  if (frame.kind === 'image') {
    return { ...snapshot, viewport: { ...snapshot.viewport, ...frame.placement.clampedPan } };
  }
  if (frame.kind === 'text') {
    return { ...snapshot, textScroll: frame.scroll };
  }
  return snapshot;
}

function clampPage(pageIndex: number, pageCount: number): number {
  if (!Number.isFinite(pageIndex)) return 0;
  return Math.min(Math.max(0, pageCount - 1), Math.max(0, Math.floor(pageIndex)));
}

/**
 * Open a document and build the coordinator for it. Fails with OpenFailed;
 * the backend is shut down before the error propagates.
 */
export async function openReaderSession(
  init: ReaderSessionInit,
  config: ViewerConfig,
  deps: ReaderSessionDeps
): Promise<RenderCoordinator> {
  const log = componentLogger('ReaderSession', deps.logger);
  const effective = applyPreferences(config, init.preferences);
  const backend = deps.backend ?? new MuPDFBridge({ tuning: deps.tuning, logger: deps.logger });

  let document: DocumentSession;
  try {
    document = await DocumentSession.open(backend, init.path, {
      maxRenderDimension: effective.maxRenderDimension,
      logger: deps.logger,
    });
  } catch (error) {
    try {
      await backend.close();
    } catch (closeError) {
      log.warn({ err: closeError }, 'backend did not close after failed open');
    }
    throw error instanceof OpenFailed ? error : new OpenFailed(init.path, errorMessage(error), { cause: error });
  }

  const lastPage = init.lastPage ?? 1;
  const coordinator = new RenderCoordinator(document, effective, deps, {
    pageIndex: lastPage - 1,
    mode: init.lastMode,
    frame: init.frame,
  });
  log.info({ path: init.path, pages: document.pageCount, page: coordinator.getState().pageIndex + 1 }, 'session opened');
  return coordinator;
}

export type { DirtyReason, ViewportState };
