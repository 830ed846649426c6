/**
 * Document Session
 *
 * Owns one open document on a rasterization backend. All calls against the
 * document go through a single-slot queue: mupdf documents are not
 * reentrant, and a second caller simply waits its turn.
 *
 * Requests are validated here, before anything is posted to the worker.
 */

import PQueue from 'p-queue';
import type { Logger } from 'pino';
import { componentLogger } from '../../../logging/logger';
import {
  InvalidRenderRequest,
  LecternError,
  OpenFailed,
  RasterizationFailed,
  TextExtractionFailed,
  errorMessage,
} from '../errors';
import type { TextSource } from '../text/text-structuring-engine';
import type { TextOp } from '../text/types';
import type { RgbaImage } from './pixel-ops';
import type { ColorMode, PageSize } from './viewport-controller';

export type PixelBuffer = RgbaImage;

export interface OpenedDocument {
  pageCount: number;
}

/**
 * What the session needs from a rasterizer. MuPDFBridge implements this over
 * a worker thread; tests use an in-process fake.
 */
export interface DocumentBackend {
  open(path: string): Promise<OpenedDocument>;
  pageSizePoints(pageIndex: number): Promise<PageSize>;
  rasterize(pageIndex: number, width: number, height: number, colorMode: ColorMode): Promise<PixelBuffer>;
  positionedTextOps(pageIndex: number): Promise<TextOp[]>;
  close(): Promise<void>;
}

export interface DocumentSessionOptions {
  maxRenderDimension?: number;
  logger?: Logger;
}

const COLOR_MODES: readonly ColorMode[] = ['color', 'grayscale'];

export class DocumentSession implements TextSource {
  private readonly lock = new PQueue({ concurrency: 1 });
  private readonly pageSizes = new Map<number, PageSize>();
  private readonly maxRenderDimension: number;
  private readonly log: Logger;
  private closed = false;

  private constructor(
    private readonly backend: DocumentBackend,
    readonly path: string,
    readonly pageCount: number,
    options: DocumentSessionOptions
  ) {
    this.maxRenderDimension = options.maxRenderDimension ?? 8192;
    this.log = componentLogger('DocumentSession', options.logger);
  }

  /**
   * Open `path` on `backend`. Any failure is reported as OpenFailed.
   */
  static async open(
    backend: DocumentBackend,
    path: string,
    options: DocumentSessionOptions = {}
  ): Promise<DocumentSession> {
    let opened: OpenedDocument;
    try {
      opened = await backend.open(path);
    } catch (error) {
      if (error instanceof OpenFailed) throw error;
      throw new OpenFailed(path, errorMessage(error), { cause: error });
    }

    if (!Number.isInteger(opened.pageCount) || opened.pageCount < 1) {
      await backend.close();
      throw new OpenFailed(path, 'document has no pages');
    }

    const session = new DocumentSession(backend, path, opened.pageCount, options);
    session.log.info({ path, pages: opened.pageCount }, 'document opened');
    return session;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private checkPage(pageIndex: number): void {
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= this.pageCount) {
      throw new InvalidRenderRequest(pageIndex, `page index out of range [0, ${this.pageCount})`);
    }
  }

  private checkOpen(pageIndex: number): void {
    if (this.closed) {
      throw new InvalidRenderRequest(pageIndex, 'document is closed');
    }
  }

  /**
   * Reject a request that the backend must never see.
   */
  validateRequest(pageIndex: number, width: number, height: number, colorMode: ColorMode): void {
    this.checkOpen(pageIndex);
    this.checkPage(pageIndex);
    for (const [name, value] of [
      ['width', width],
      ['height', height],
    ] as const) {
      if (!Number.isInteger(value) || value < 1) {
        throw new InvalidRenderRequest(pageIndex, `${name} must be a positive integer, got ${value}`);
      }
      if (value > this.maxRenderDimension) {
        throw new InvalidRenderRequest(pageIndex, `${name} ${value} exceeds ${this.maxRenderDimension}`);
      }
    }
    if (!COLOR_MODES.includes(colorMode)) {
      throw new InvalidRenderRequest(pageIndex, `unsupported color mode ${String(colorMode)}`);
    }
  }

  async pageSizePoints(pageIndex: number): Promise<PageSize> {
    this.checkOpen(pageIndex);
    this.checkPage(pageIndex);

    const cached = this.pageSizes.get(pageIndex);
    if (cached) return cached;

    try {
      const size = await this.lock.add(() => this.backend.pageSizePoints(pageIndex), { throwOnTimeout: true });
      this.pageSizes.set(pageIndex, size);
      return size;
    } catch (error) {
      if (error instanceof LecternError) throw error;
      throw new RasterizationFailed(pageIndex, `page size unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Rasterize one page to exactly `width × height` RGBA pixels.
   */
  async rasterize(pageIndex: number, width: number, height: number, colorMode: ColorMode): Promise<PixelBuffer> {
    this.validateRequest(pageIndex, width, height, colorMode);

    const started = performance.now();
    let buffer: PixelBuffer;
    try {
      buffer = await this.lock.add(() => this.backend.rasterize(pageIndex, width, height, colorMode), {
        throwOnTimeout: true,
      });
    } catch (error) {
      if (error instanceof LecternError) throw error;
      throw new RasterizationFailed(pageIndex, errorMessage(error), { cause: error });
    }

    if (buffer.width !== width || buffer.height !== height || buffer.pixels.length !== width * height * 4) {
      throw new RasterizationFailed(
        pageIndex,
        `backend returned ${buffer.width}x${buffer.height} (${buffer.pixels.length} bytes) for ${width}x${height}`
      );
    }

    this.log.debug(
      { page: pageIndex, width, height, colorMode, ms: Math.round(performance.now() - started) },
      'rasterized'
    );
    return buffer;
  }

  async positionedTextOps(pageIndex: number): Promise<TextOp[]> {
    this.checkPage(pageIndex);
    if (this.closed) {
      throw new TextExtractionFailed(pageIndex, 'document is closed');
    }

    try {
      return await this.lock.add(() => this.backend.positionedTextOps(pageIndex), { throwOnTimeout: true });
    } catch (error) {
      if (error instanceof LecternError) throw error;
      throw new TextExtractionFailed(pageIndex, errorMessage(error), { cause: error });
    }
  }

  /**
   * Wait for queued calls, then release the document.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.lock.onIdle();
    await this.backend.close();
    this.pageSizes.clear();
    this.log.info({ path: this.path }, 'document closed');
  }
}
