/**
 * Terminal capability negotiation.
 *
 * Run once at session start, after the alternate screen is entered and
 * before input handling begins: the probe reads the terminal's replies from
 * the same input stream the keymap layer will own afterwards.
 */

import { componentLogger } from '../../../logging/logger';
import { HalfBlockSink } from './halfblock-sink';
import { KittySink } from './kitty-sink';
import type { ActiveSink, OutputStream, SinkKind } from './protocol-sink';

export type TerminalEnv = Readonly<Record<string, string | undefined>>;

export interface InputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

export interface TerminalCapability {
  protocol: SinkKind;
  tmux: boolean;
  /** Whether the terminal was actually asked */
  queried: boolean;
}

const QUERY_IMAGE_ID = 31;
const GRAPHICS_QUERY = `\x1b_Gi=${QUERY_IMAGE_ID},s=1,v=1,a=q,t=d,f=24;AAAA\x1b\\`;
const DEVICE_ATTRIBUTES_QUERY = '\x1b[c';
const DEVICE_ATTRIBUTES_REPLY = /\x1b\[\?[\d;]*c/;
const GRAPHICS_OK_REPLY = new RegExp(`\\x1b_Gi=${QUERY_IMAGE_ID};OK\\x1b\\\\`);

export function inKittyEnv(env: TerminalEnv): boolean {
  return (env.KITTY_WINDOW_ID ?? '').trim().length > 0;
}

function termIsXtermKitty(env: TerminalEnv): boolean {
  return (env.TERM ?? '').trim().startsWith('xterm-kitty');
}

export function inTmux(env: TerminalEnv): boolean {
  return (env.TMUX ?? '').length > 0;
}

/**
 * Querying an unknown terminal can leave stray replies on the input, so only
 * ask when something hints at kitty or the session runs under tmux.
 */
export function shouldQueryTerminal(env: TerminalEnv): boolean {
  return inKittyEnv(env) || termIsXtermKitty(env) || inTmux(env);
}

export function queryTimeoutMs(env: TerminalEnv): number {
  if (inKittyEnv(env) || termIsXtermKitty(env)) return 1500;
  if (inTmux(env)) return 300;
  return 0;
}

function wrapForTmux(sequence: string, tmux: boolean): string {
  return tmux ? `\x1bPtmux;${sequence.replaceAll('\x1b', '\x1b\x1b')}\x1b\\` : sequence;
}

/**
 * Ask the terminal whether it speaks the kitty graphics protocol. Falls back
 * to half-blocks on timeout or any reply other than OK.
 */
export async function probeTerminal(
  input: InputStream,
  output: OutputStream,
  env: TerminalEnv = process.env
): Promise<TerminalCapability> {
  const log = componentLogger('TerminalProbe');
  const tmux = inTmux(env);
  const timeout = queryTimeoutMs(env);

  if (!shouldQueryTerminal(env) || timeout <= 0) {
    return { protocol: inKittyEnv(env) ? 'kitty' : 'halfblock', tmux, queried: false };
  }

  const reply = await new Promise<string>((resolve) => {
    let received = '';
    const finish = () => {
      clearTimeout(timer);
      input.off('data', onData);
      resolve(received);
    };
    const onData = (chunk: Buffer | string) => {
      received += typeof chunk === 'string' ? chunk : chunk.toString('latin1');
      if (DEVICE_ATTRIBUTES_REPLY.test(received)) finish();
    };
    const timer = setTimeout(finish, timeout);

    input.on('data', onData);
    output.write(wrapForTmux(GRAPHICS_QUERY, tmux) + DEVICE_ATTRIBUTES_QUERY);
  });

  const supported = GRAPHICS_OK_REPLY.test(reply) || inKittyEnv(env);
  log.info({ supported, tmux, replied: reply.length > 0 }, 'terminal probed');
  return { protocol: supported ? 'kitty' : 'halfblock', tmux, queried: true };
}

export interface CreateSinkOptions {
  imageId?: number;
}

export function createActiveSink(
  capability: TerminalCapability,
  output: OutputStream,
  options: CreateSinkOptions = {}
): ActiveSink {
  if (capability.protocol === 'kitty') {
    return new KittySink(output, { imageId: options.imageId, tmux: capability.tmux });
  }
  return new HalfBlockSink(output);
}
