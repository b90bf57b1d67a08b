import { describe, it, expect } from 'vitest';
import { TailBuffer, truncationMarker } from '../src/utils/tail-buffer.js';

describe('TailBuffer', () => {
  it('keeps everything below capacity', () => {
    const buffer = new TailBuffer(16);
    buffer.push('hello ');
    buffer.push(Buffer.from('world'));

    expect(buffer.snapshot()).toEqual({ text: 'hello world', truncated: false, totalBytes: 11 });
  });

  it('keeps the most recent bytes and marks the drop', () => {
    const buffer = new TailBuffer(4);
    buffer.push('abc');
    buffer.push('def');

    const snapshot = buffer.snapshot();
    expect(snapshot.text).toBe('[... 2 earlier bytes discarded ...]\ncdef');
    expect(snapshot.truncated).toBe(true);
    expect(snapshot.totalBytes).toBe(6);
  });

  it('keeps only the tail of a single oversized chunk', () => {
    const buffer = new TailBuffer(3);
    buffer.push('0123456789');

    expect(buffer.snapshot().text).toBe(`${truncationMarker(7)}\n789`);
  });

  it('counts bytes with zero capacity but retains none', () => {
    const buffer = new TailBuffer(0);
    buffer.push('abc');

    expect(buffer.totalBytes).toBe(3);
    expect(buffer.snapshot().text).toBe(`${truncationMarker(3)}\n`);
  });

  it('rejects a negative capacity', () => {
    expect(() => new TailBuffer(-1)).toThrow(RangeError);
  });
});
