import type { OutputStream } from '@/reader/renderer/sinks/protocol-sink';

export class CollectingOutput implements OutputStream {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  reset(): void {
    this.chunks.length = 0;
  }
}
