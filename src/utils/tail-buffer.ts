/**
 * Bounded capture of a child process stream.
 *
 * Retains the most recent `capacity` bytes and counts every byte written.
 */

import type { CapturedStream } from '../types/index.js';

export function truncationMarker(droppedBytes: number): string {
  return `[... ${droppedBytes} earlier bytes discarded ...]`;
}

const MARKER_LINE = /^\[\.\.\. \d+ earlier bytes discarded \.\.\.\]\n/;

/**
 * Captured text with a leading truncation marker line removed.
 */
export function stripTruncationMarker(text: string): string {
  return text.replace(MARKER_LINE, '');
}

export class TailBuffer {
  private readonly chunks: Buffer[] = [];
  private retained = 0;
  private total = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid tail capacity: ${capacity}`);
    }
  }

  push(chunk: Buffer | string): void {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk;
    this.total += buf.length;

    if (this.capacity === 0) {
      return;
    }

    if (buf.length >= this.capacity) {
      this.chunks.length = 0;
      this.chunks.push(Buffer.from(buf.subarray(buf.length - this.capacity)));
      this.retained = this.capacity;
      return;
    }

    this.chunks.push(buf);
    this.retained += buf.length;

    while (this.retained > this.capacity) {
      const head = this.chunks[0];
      if (!head) break;
      const excess = this.retained - this.capacity;
      if (head.length <= excess) {
        this.chunks.shift();
        this.retained -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.retained -= excess;
      }
    }
  }

  get totalBytes(): number {
    return this.total;
  }

  get truncated(): boolean {
    return this.total > this.retained;
  }

  snapshot(): CapturedStream {
    const tail = Buffer.concat(this.chunks).toString('utf-8');
    const truncated = this.truncated;
    return {
      text: truncated ? `${truncationMarker(this.total - this.retained)}\n${tail}` : tail,
      truncated,
      totalBytes: this.total,
    };
  }
}
