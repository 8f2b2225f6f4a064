/**
 * Growable byte buffer for the serializer. Capacity doubles on demand;
 * `bytes()` returns a right-sized copy the caller owns.
 */
export class ByteWriter {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 4096) {
    this.buf = new Uint8Array(Math.max(16, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  private ensureCapacity(required: number): void {
    if (required <= this.buf.byteLength) return;
    let nextCap = this.buf.byteLength;
    while (nextCap < required) nextCap *= 2;
    const next = new Uint8Array(nextCap);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }

  push(byte: number): void {
    this.ensureCapacity(this.len + 1);
    this.buf[this.len++] = byte & 0xff;
  }

  pushAll(bytes: readonly number[]): void {
    this.ensureCapacity(this.len + bytes.length);
    for (const b of bytes) {
      this.buf[this.len++] = b & 0xff;
    }
  }

  bytes(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}
