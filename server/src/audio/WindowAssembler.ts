/**
 * Window Assembler
 * Concatenates variable-length chunks and cuts fixed-length analysis windows
 * off the front (FIFO). Trailing samples shorter than a window stay buffered.
 */

export class WindowAssembler {
  private buffer: Float32Array;
  private length = 0;
  private emitted = 0;

  constructor(
    readonly windowSamples: number,
    readonly hopSamples: number = windowSamples
  ) {
    if (!Number.isInteger(windowSamples) || windowSamples <= 0) {
      throw new RangeError(`windowSamples must be a positive integer (got ${windowSamples})`);
    }
    if (!Number.isInteger(hopSamples) || hopSamples <= 0 || hopSamples > windowSamples) {
      throw new RangeError(`hopSamples must be an integer within 1..${windowSamples} (got ${hopSamples})`);
    }
    this.buffer = new Float32Array(windowSamples * 2);
  }

  /**
   * Append a chunk and return every window it completes, oldest first
   */
  push(chunk: Float32Array): Float32Array[] {
    this.ensureCapacity(this.length + chunk.length);
    this.buffer.set(chunk, this.length);
    this.length += chunk.length;

    const windows: Float32Array[] = [];
    while (this.length >= this.windowSamples) {
      windows.push(this.buffer.slice(0, this.windowSamples));
      this.buffer.copyWithin(0, this.hopSamples, this.length);
      this.length -= this.hopSamples;
      this.emitted++;
    }
    return windows;
  }

  /** Samples waiting for the next window */
  buffered(): number {
    return this.length;
  }

  windowsEmitted(): number {
    return this.emitted;
  }

  clear(): void {
    this.length = 0;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;
    const next = new Float32Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }
}
