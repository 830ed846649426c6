/**
 * MuPDF Bridge
 *
 * Main-thread side of the mupdf worker. Each call posts a request with a
 * fresh id and resolves when the matching response arrives. Error responses
 * are mapped back to the reader's error classes by code; a worker crash
 * rejects everything still pending.
 */

import { Worker, type ResourceLimits } from 'node:worker_threads';
import type { Logger } from 'pino';
import { componentLogger } from '../../../logging/logger';
import {
  InvalidRenderRequest,
  type LecternError,
  type LecternErrorCode,
  OpenFailed,
  RasterizationFailed,
  TextExtractionFailed,
} from '../errors';
import type { TextOp } from '../text/types';
import type { DocumentBackend, OpenedDocument, PixelBuffer } from './document-session';
import type { ColorMode, PageSize } from './viewport-controller';
import {
  type WorkerRequest,
  type WorkerResponse,
  responseEnvelopeSchema,
  workerResponseSchema,
} from './worker-protocol';

/**
 * Process tuning for the worker thread.
 */
export interface WorkerTuning {
  resourceLimits?: Omit<ResourceLimits, 'stackSizeMb'>;
  stackSizeMb?: number;
}

/**
 * The slice of a worker thread the bridge talks to. Tests pass an
 * in-process implementation.
 */
export interface WorkerHandle {
  postMessage(request: WorkerRequest): void;
  onMessage(listener: (message: unknown) => void): void;
  onError(listener: (error: Error) => void): void;
  onExit(listener: (code: number) => void): void;
  terminate(): Promise<void>;
}

export type WorkerFactory = (tuning: WorkerTuning) => WorkerHandle;

export interface MuPDFBridgeOptions {
  tuning?: WorkerTuning;
  workerFactory?: WorkerFactory;
  logger?: Logger;
}

type PendingRequest = {
  resolve: (response: WorkerResponse) => void;
  reject: (error: Error) => void;
  type: WorkerRequest['type'];
  pageIndex: number;
};

const WORKER_URL = new URL('./mupdf-worker.ts', import.meta.url);

/**
 * Default factory: a real worker thread running mupdf-worker.ts. The worker
 * inherits the parent's execArgv, so the same TypeScript loader applies.
 */
export const nodeWorkerFactory: WorkerFactory = (tuning) => {
  const worker = new Worker(WORKER_URL, {
    resourceLimits: { ...tuning.resourceLimits, stackSizeMb: tuning.stackSizeMb },
  });
  return {
    postMessage: (request) => worker.postMessage(request),
    onMessage: (listener) => {
      worker.on('message', listener);
    },
    onError: (listener) => {
      worker.on('error', listener);
    },
    onExit: (listener) => {
      worker.on('exit', listener);
    },
    terminate: async () => {
      await worker.terminate();
    },
  };
};

function errorFromCode(code: LecternErrorCode, pageIndex: number, message: string, path: string): LecternError {
  switch (code) {
    case 'OPEN_FAILED':
      return new OpenFailed(path, message);
    case 'TEXT_EXTRACTION_FAILED':
      return new TextExtractionFailed(pageIndex, message);
    case 'INVALID_RENDER_REQUEST':
      return new InvalidRenderRequest(pageIndex, message);
    default:
      return new RasterizationFailed(pageIndex, message);
  }
}

export class MuPDFBridge implements DocumentBackend {
  private worker: WorkerHandle | null = null;
  private pendingRequests = new Map<number, PendingRequest>();
  private requestIdCounter = 0;
  private isReady = false;
  private readyPromise: Promise<void> | null = null;
  private path = '';
  private readonly tuning: WorkerTuning;
  private readonly workerFactory: WorkerFactory;
  private readonly log: Logger;

  /** Worker-side time of the most recent rasterization */
  lastRenderMs = 0;

  constructor(options: MuPDFBridgeOptions = {}) {
    this.tuning = options.tuning ?? {};
    this.workerFactory = options.workerFactory ?? nodeWorkerFactory;
    this.log = componentLogger('MuPDFBridge', options.logger);
  }

  get ready(): boolean {
    return this.isReady;
  }

  /**
   * Start the worker and wait for its READY message.
   */
  initialize(): Promise<void> {
    if (this.readyPromise) return this.readyPromise;

    this.readyPromise = new Promise<void>((resolve, reject) => {
      const worker = this.workerFactory(this.tuning);
      this.worker = worker;

      worker.onMessage((message) => {
        if (!this.isReady && isReadyMessage(message)) {
          this.isReady = true;
          resolve();
          return;
        }
        this.handleMessage(message);
      });

      worker.onError((error) => {
        this.log.error({ err: error }, 'worker error');
        this.failAll(`worker error: ${error.message}`, error);
        if (!this.isReady) reject(error);
      });

      worker.onExit((code) => {
        if (this.worker !== worker) return;
        this.worker = null;
        this.isReady = false;
        if (this.pendingRequests.size > 0 || code !== 0) {
          this.log.error({ code, pending: this.pendingRequests.size }, 'worker exited');
        }
        this.failAll(`worker exited with code ${code}`);
        reject(new Error(`worker exited with code ${code} before becoming ready`));
      });
    });

    return this.readyPromise;
  }

  private handleMessage(message: unknown): void {
    const parsed = workerResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues.length }, 'malformed worker message');
      this.failMalformed(message, parsed.error);
      return;
    }

    const response = parsed.data;
    if (response.type === 'READY') return;

    const pending = this.pendingRequests.get(response.requestId);
    if (!pending) {
      this.log.warn({ requestId: response.requestId }, 'no pending request for response');
      return;
    }
    this.pendingRequests.delete(response.requestId);

    if (response.type === 'ERROR') {
      pending.reject(errorFromCode(response.code, response.pageIndex ?? pending.pageIndex, response.message, this.path));
      return;
    }
    pending.resolve(response);
  }

  /**
   * A malformed response that still names a live request fails that request.
   */
  private failMalformed(message: unknown, cause: unknown): void {
    const envelope = responseEnvelopeSchema.safeParse(message);
    if (!envelope.success) return;

    const { requestId } = envelope.data;
    const pending = this.pendingRequests.get(requestId);
    if (!pending) return;
    this.pendingRequests.delete(requestId);
    pending.reject(this.pendingError(pending, 'malformed worker response', cause));
  }

  private failAll(reason: string, cause?: unknown): void {
    for (const [id, pending] of this.pendingRequests) {
      pending.reject(this.pendingError(pending, reason, cause));
      this.pendingRequests.delete(id);
    }
  }

  private pendingError(pending: PendingRequest, reason: string, cause: unknown): LecternError {
    switch (pending.type) {
      case 'OPEN':
        return new OpenFailed(this.path, reason, { cause });
      case 'TEXT_OPS':
        return new TextExtractionFailed(pending.pageIndex, reason, { cause });
      default:
        return new RasterizationFailed(pending.pageIndex, reason, { cause });
    }
  }

  private async send(build: (requestId: number) => WorkerRequest, pageIndex = -1): Promise<WorkerResponse> {
    await this.initialize();
    const worker = this.worker;
    if (!worker) {
      throw new RasterizationFailed(pageIndex, 'worker is not running');
    }

    const request = build(++this.requestIdCounter);
    return new Promise<WorkerResponse>((resolve, reject) => {
      this.pendingRequests.set(request.requestId, { resolve, reject, type: request.type, pageIndex });
      worker.postMessage(request);
    });
  }

  async open(path: string): Promise<OpenedDocument> {
    this.path = path;
    const response = await this.send((requestId) => ({ type: 'OPEN', requestId, path }));
    if (response.type !== 'OPENED') {
      throw new OpenFailed(path, `unexpected response ${response.type}`);
    }
    return { pageCount: response.pageCount };
  }

  async pageSizePoints(pageIndex: number): Promise<PageSize> {
    const response = await this.send((requestId) => ({ type: 'PAGE_SIZE', requestId, pageIndex }), pageIndex);
    if (response.type !== 'PAGE_SIZE') {
      throw new RasterizationFailed(pageIndex, `unexpected response ${response.type}`);
    }
    return { width: response.width, height: response.height };
  }

  async rasterize(pageIndex: number, width: number, height: number, colorMode: ColorMode): Promise<PixelBuffer> {
    const response = await this.send(
      (requestId) => ({ type: 'RASTERIZE', requestId, pageIndex, width, height, colorMode }),
      pageIndex
    );
    if (response.type !== 'RASTERIZED') {
      throw new RasterizationFailed(pageIndex, `unexpected response ${response.type}`);
    }
    this.lastRenderMs = response.renderMs;
    return { width: response.width, height: response.height, pixels: response.pixels };
  }

  async positionedTextOps(pageIndex: number): Promise<TextOp[]> {
    const response = await this.send((requestId) => ({ type: 'TEXT_OPS', requestId, pageIndex }), pageIndex);
    if (response.type !== 'TEXT_OPS') {
      throw new TextExtractionFailed(pageIndex, `unexpected response ${response.type}`);
    }
    return response.ops;
  }

  /**
   * Close the document and stop the worker.
   */
  async close(): Promise<void> {
    if (!this.worker) return;
    try {
      await this.send((requestId) => ({ type: 'CLOSE', requestId }));
    } finally {
      await this.terminate();
    }
  }

  async terminate(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.worker = null;
    this.isReady = false;
    this.readyPromise = null;
    this.failAll('worker terminated');
    await worker.terminate();
  }
}

function isReadyMessage(message: unknown): boolean {
  const parsed = workerResponseSchema.safeParse(message);
  return parsed.success && parsed.data.type === 'READY';
}
