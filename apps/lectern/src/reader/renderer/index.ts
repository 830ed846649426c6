/**
 * Page renderer for the terminal reader.
 *
 * Two output paths share one session: image frames go through a protocol
 * sink (kitty graphics or half-blocks), text frames are returned as lines
 * for the caller to draw.
 *
 * @example
 * ```typescript
 * const capability = await probeTerminal(process.stdin, process.stdout);
 * const sink = createActiveSink(capability, process.stdout);
 * const reader = await openReaderSession({ path }, loadViewerConfig(), { sink });
 * const frame = await reader.renderFrame();
 * ```
 */

export * from './pdf';

export {
  LecternError,
  OpenFailed,
  RasterizationFailed,
  InvalidRenderRequest,
  TextExtractionFailed,
  ConfigError,
  isPageScopedError,
  errorMessage,
} from './errors';
export type { LecternErrorCode } from './errors';

export { KittySink, tmuxPassthrough } from './sinks/kitty-sink';
export { HalfBlockSink, halfBlockRows } from './sinks/halfblock-sink';
export {
  createActiveSink,
  probeTerminal,
  queryTimeoutMs,
  shouldQueryTerminal,
} from './sinks/capability';
export type { TerminalCapability, TerminalEnv, InputStream } from './sinks/capability';
export type { ActiveSink, OutputStream, ProtocolSink, SinkKind } from './sinks/protocol-sink';

export { TextStructuringEngine } from './text/text-structuring-engine';
export type { TextLayout, TextSource, TextEngineOptions } from './text/text-structuring-engine';
export { tokenizeTextOps } from './text/tokenizer';
export { reflowParagraphs } from './text/paragraphs';
export { detectPageFurniture, stripPageFurniture } from './text/furniture';
export { wrapText, wrapParagraphs, wrapPreservingLines, nonTextPlaceholder, displayWidth } from './text/wrap';
export type { TextOp, FurnitureProfile, StructuredPage, TextPageResult } from './text/types';
