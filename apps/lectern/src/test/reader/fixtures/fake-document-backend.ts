import type { DocumentBackend, OpenedDocument, PixelBuffer } from '@/reader/renderer/pdf/document-session';
import type { ColorMode, PageSize } from '@/reader/renderer/pdf/viewport-controller';
import type { TextOp } from '@/reader/renderer/text/types';

export interface FakePage {
  /** Points */
  width: number;
  height: number;
  ops?: TextOp[];
  /** RGBA fill; defaults to opaque white */
  fill?: readonly [number, number, number, number];
  failRasterize?: string;
  failText?: string;
}

export interface FakeBackendOptions {
  failOpen?: string;
  pageCountOverride?: number;
}

export interface RasterizeCall {
  pageIndex: number;
  width: number;
  height: number;
  colorMode: ColorMode;
}

/**
 * Text ops drawing each argument as its own line.
 */
export function lineOps(...lines: string[]): TextOp[] {
  const ops: TextOp[] = [];
  for (const line of lines) {
    ops.push({ kind: 'text', text: line }, { kind: 'newline' });
  }
  return ops;
}

export function solidRgba(width: number, height: number, fill: readonly [number, number, number, number]): Uint8Array {
  const pixels = new Uint8Array(width * height * 4);
  for (let i = 0; i < pixels.length; i += 4) {
    pixels[i] = fill[0];
    pixels[i + 1] = fill[1];
    pixels[i + 2] = fill[2];
    pixels[i + 3] = fill[3];
  }
  return pixels;
}

/**
 * In-process backend. Records every call; `holdNextRasterize` parks the next
 * rasterization until the returned release function runs.
 */
export class FakeDocumentBackend implements DocumentBackend {
  readonly openCalls: string[] = [];
  readonly rasterizeCalls: RasterizeCall[] = [];
  readonly textCalls: number[] = [];
  closeCalls = 0;
  /** Highest number of backend calls running at once */
  maxConcurrent = 0;

  private running = 0;
  private held: Promise<void> | null = null;

  constructor(
    private readonly pages: FakePage[],
    private readonly options: FakeBackendOptions = {}
  ) {}

  holdNextRasterize(): () => void {
    let release = () => {};
    this.held = new Promise<void>((resolve) => {
      release = resolve;
    });
    return release;
  }

  private page(pageIndex: number): FakePage {
    const page = this.pages[pageIndex];
    if (!page) throw new Error(`no page ${pageIndex}`);
    return page;
  }

  private async track<T>(work: () => Promise<T>): Promise<T> {
    this.running++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.running);
    try {
      return await work();
    } finally {
      this.running--;
    }
  }

  async open(path: string): Promise<OpenedDocument> {
    this.openCalls.push(path);
    if (this.options.failOpen) throw new Error(this.options.failOpen);
    return { pageCount: this.options.pageCountOverride ?? this.pages.length };
  }

  pageSizePoints(pageIndex: number): Promise<PageSize> {
    return this.track(async () => {
      const page = this.page(pageIndex);
      return { width: page.width, height: page.height };
    });
  }

  rasterize(pageIndex: number, width: number, height: number, colorMode: ColorMode): Promise<PixelBuffer> {
    this.rasterizeCalls.push({ pageIndex, width, height, colorMode });
    const held = this.held;
    this.held = null;

    return this.track(async () => {
      if (held) await held;
      const page = this.page(pageIndex);
      if (page.failRasterize) throw new Error(page.failRasterize);
      return { width, height, pixels: solidRgba(width, height, page.fill ?? [255, 255, 255, 255]) };
    });
  }

  positionedTextOps(pageIndex: number): Promise<TextOp[]> {
    this.textCalls.push(pageIndex);
    return this.track(async () => {
      const page = this.page(pageIndex);
      if (page.failText) throw new Error(page.failText);
      return page.ops ?? [];
    });
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}
