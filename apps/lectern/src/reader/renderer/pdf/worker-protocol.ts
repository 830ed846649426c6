/**
 * Messages between MuPDFBridge and the mupdf worker thread.
 *
 * Responses are validated on arrival; a malformed message is treated like a
 * worker crash for the request it names.
 */

import { z } from 'zod';
import type { LecternErrorCode } from '../errors';
import type { TextOp } from '../text/types';
import type { ColorMode } from './viewport-controller';

export type WorkerRequest =
  | { type: 'OPEN'; requestId: number; path: string }
  | { type: 'PAGE_SIZE'; requestId: number; pageIndex: number }
  | { type: 'RASTERIZE'; requestId: number; pageIndex: number; width: number; height: number; colorMode: ColorMode }
  | { type: 'TEXT_OPS'; requestId: number; pageIndex: number }
  | { type: 'CLOSE'; requestId: number };

const textOpSchema: z.ZodType<TextOp> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('move'), dx: z.number(), dy: z.number() }),
  z.object({ kind: z.literal('adjust'), amount: z.number() }),
  z.object({ kind: z.literal('newline') }),
]);

const errorCodeSchema: z.ZodType<LecternErrorCode> = z.enum([
  'OPEN_FAILED',
  'RASTERIZATION_FAILED',
  'INVALID_RENDER_REQUEST',
  'TEXT_EXTRACTION_FAILED',
  'CONFIG_INVALID',
]);

export const workerResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('READY') }),
  z.object({ type: z.literal('OPENED'), requestId: z.number(), pageCount: z.number().int() }),
  z.object({ type: z.literal('PAGE_SIZE'), requestId: z.number(), width: z.number(), height: z.number() }),
  z.object({
    type: z.literal('RASTERIZED'),
    requestId: z.number(),
    width: z.number().int(),
    height: z.number().int(),
    pixels: z.instanceof(Uint8Array),
    renderMs: z.number(),
  }),
  z.object({ type: z.literal('TEXT_OPS'), requestId: z.number(), ops: z.array(textOpSchema) }),
  z.object({ type: z.literal('CLOSED'), requestId: z.number() }),
  z.object({
    type: z.literal('ERROR'),
    requestId: z.number(),
    code: errorCodeSchema,
    pageIndex: z.number().optional(),
    message: z.string(),
  }),
]);

export type WorkerResponse = z.infer<typeof workerResponseSchema>;

/** Just enough of a response to find the request it answers */
export const responseEnvelopeSchema = z.object({ requestId: z.number() });
