/**
 * MuPDF Worker
 *
 * Runs mupdf on a worker thread so rasterization and text extraction never
 * block the interactive loop. Holds at most one open document; the bridge
 * serializes requests, so handlers here are plain synchronous calls.
 *
 * Page output is always RGBA at exactly the requested size. Text is emitted
 * as positioned draw operations in points, y growing downward.
 */

import { readFile } from 'node:fs/promises';
import { parentPort } from 'node:worker_threads';
import * as mupdf from 'mupdf';
import { componentLogger } from '../../../logging/logger';
import type { LecternErrorCode } from '../errors';
import type { TextOp } from '../text/types';
import { grayToRgba, rgbToRgba } from './pixel-ops';
import type { ColorMode } from './viewport-controller';
import type { WorkerRequest, WorkerResponse } from './worker-protocol';

const log = componentLogger('MuPDFWorker');

let document: mupdf.Document | null = null;

function requireDocument(): mupdf.Document {
  if (!document) {
    throw new Error('no document open');
  }
  return document;
}

async function openDocument(path: string): Promise<number> {
  closeDocument();
  const data = await readFile(path);
  const doc = mupdf.Document.openDocument(new Uint8Array(data), 'application/pdf');
  document = doc;
  return doc.countPages();
}

function closeDocument(): void {
  if (document) {
    document.destroy();
    document = null;
  }
}

function pageSize(pageIndex: number): { width: number; height: number } {
  const page = requireDocument().loadPage(pageIndex);
  try {
    const [x0, y0, x1, y1] = page.getBounds();
    return { width: x1 - x0, height: y1 - y0 };
  } finally {
    page.destroy();
  }
}

/**
 * Render a page scaled independently on each axis so the pixmap is exactly
 * `width × height`; the caller already derived both from the page ratio.
 */
function rasterize(pageIndex: number, width: number, height: number, colorMode: ColorMode): Uint8Array {
  const page = requireDocument().loadPage(pageIndex);
  const gray = colorMode === 'grayscale';
  const colorspace = gray ? mupdf.ColorSpace.DeviceGray : mupdf.ColorSpace.DeviceRGB;
  const pixmap = new mupdf.Pixmap(colorspace, [0, 0, width, height], false);
  const device = new mupdf.DrawDevice(mupdf.Matrix.identity, pixmap);

  try {
    pixmap.clear(255);

    // Pages can have a non-zero origin; move it to (0,0) before scaling.
    const [x0, y0, x1, y1] = page.getBounds();
    const matrix = mupdf.Matrix.concat(
      mupdf.Matrix.translate(-x0, -y0),
      mupdf.Matrix.scale(width / Math.max(1e-6, x1 - x0), height / Math.max(1e-6, y1 - y0))
    );
    page.run(device, matrix);
    device.close();

    const channels = gray ? 1 : 3;
    const packed = packRows(pixmap.getPixels(), width, height, pixmap.getStride(), channels);
    return gray ? grayToRgba(packed, width, height, false) : rgbToRgba(packed, width, height);
  } finally {
    device.destroy();
    pixmap.destroy();
    page.destroy();
  }
}

function packRows(samples: Uint8ClampedArray, width: number, height: number, stride: number, channels: number): Uint8Array {
  const rowBytes = width * channels;
  const bytes = new Uint8Array(samples.buffer, samples.byteOffset, samples.byteLength);
  if (stride === rowBytes) {
    return bytes.slice(0, rowBytes * height);
  }
  const out = new Uint8Array(rowBytes * height);
  for (let y = 0; y < height; y++) {
    out.set(bytes.subarray(y * stride, y * stride + rowBytes), y * rowBytes);
  }
  return out;
}

/**
 * Walk structured text into draw operations. Glyph gaps become spacing
 * adjustments in thousandths of an em; each line ends with a newline and
 * each block with one more, so blocks stay separate paragraphs.
 */
function textOps(pageIndex: number): TextOp[] {
  const page = requireDocument().loadPage(pageIndex);
  const stext = page.toStructuredText('preserve-whitespace');
  const ops: TextOp[] = [];

  let lastLineY: number | null = null;
  let penX: number | null = null;

  try {
    stext.walk({
      beginLine(bbox: mupdf.Rect) {
        const dy = lastLineY === null ? 0 : bbox[1] - lastLineY;
        ops.push({ kind: 'move', dx: 0, dy });
        lastLineY = bbox[1];
        penX = null;
      },

      onChar(c: string, origin: mupdf.Point, _font: mupdf.Font, size: number, quad: mupdf.Quad) {
        if (penX !== null && size > 0) {
          const gap = origin[0] - penX;
          if (gap > size * 0.05) {
            ops.push({ kind: 'adjust', amount: -Math.round((gap / size) * 1000) });
          }
        }
        ops.push({ kind: 'text', text: c });
        penX = Math.max(quad[2], quad[6]);
      },

      endLine() {
        ops.push({ kind: 'newline' });
      },

      endTextBlock() {
        ops.push({ kind: 'newline' });
      },
    });
  } finally {
    stext.destroy();
    page.destroy();
  }

  return mergeTextRuns(ops);
}

/** Collapse consecutive single-glyph text ops into runs. */
function mergeTextRuns(ops: TextOp[]): TextOp[] {
  const out: TextOp[] = [];
  for (const op of ops) {
    const last = out[out.length - 1];
    if (op.kind === 'text' && last?.kind === 'text') {
      out[out.length - 1] = { kind: 'text', text: last.text + op.text };
    } else {
      out.push(op);
    }
  }
  return out;
}

function errorCodeFor(request: WorkerRequest): LecternErrorCode {
  switch (request.type) {
    case 'OPEN':
      return 'OPEN_FAILED';
    case 'TEXT_OPS':
      return 'TEXT_EXTRACTION_FAILED';
    default:
      return 'RASTERIZATION_FAILED';
  }
}

async function handleRequest(request: WorkerRequest): Promise<void> {
  const port = parentPort;
  if (!port) return;

  const send = (response: WorkerResponse, transfer: ArrayBuffer[] = []) => port.postMessage(response, transfer);

  try {
    switch (request.type) {
      case 'OPEN': {
        const pageCount = await openDocument(request.path);
        send({ type: 'OPENED', requestId: request.requestId, pageCount });
        break;
      }

      case 'PAGE_SIZE': {
        const size = pageSize(request.pageIndex);
        send({ type: 'PAGE_SIZE', requestId: request.requestId, ...size });
        break;
      }

      case 'RASTERIZE': {
        const started = performance.now();
        const pixels = rasterize(request.pageIndex, request.width, request.height, request.colorMode);
        const transfer = pixels.buffer instanceof ArrayBuffer ? [pixels.buffer] : [];
        send(
          {
            type: 'RASTERIZED',
            requestId: request.requestId,
            width: request.width,
            height: request.height,
            pixels,
            renderMs: performance.now() - started,
          },
          transfer
        );
        break;
      }

      case 'TEXT_OPS':
        send({ type: 'TEXT_OPS', requestId: request.requestId, ops: textOps(request.pageIndex) });
        break;

      case 'CLOSE':
        closeDocument();
        send({ type: 'CLOSED', requestId: request.requestId });
        break;
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn({ request: request.type, err: error }, 'request failed');
    send({
      type: 'ERROR',
      requestId: request.requestId,
      code: errorCodeFor(request),
      pageIndex: 'pageIndex' in request ? request.pageIndex : undefined,
      message,
    });
  }
}

// Requests are handled strictly in arrival order.
let chain: Promise<void> = Promise.resolve();

parentPort?.on('message', (request: WorkerRequest) => {
  chain = chain
    .then(() => handleRequest(request))
    .catch((error: unknown) => {
      log.error({ err: error }, 'worker could not answer request');
    });
});

parentPort?.postMessage({ type: 'READY' } satisfies WorkerResponse);
