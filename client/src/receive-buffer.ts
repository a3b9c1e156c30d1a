/**
 * Accumulates socket chunks until the peer closes the connection.
 */
export class ReceiveBuffer {
  private readonly chunks: Buffer[] = [];
  private totalBytes = 0;

  constructor(private readonly maxBytes: number | null = null) {}

  get length() {
    return this.totalBytes;
  }

  /**
   * Returns false (and keeps nothing) when the chunk would push the total past
   * the configured limit
   */
  append(chunk: Buffer): boolean {
    if (chunk.length === 0) return true;
    if (this.maxBytes !== null && this.totalBytes + chunk.length > this.maxBytes) {
      return false;
    }
    this.chunks.push(chunk);
    this.totalBytes += chunk.length;
    return true;
  }

  toBuffer(): Buffer {
    if (this.chunks.length === 0) return Buffer.alloc(0);
    if (this.chunks.length === 1) return this.chunks[0]!;
    return Buffer.concat(this.chunks, this.totalBytes);
  }

  /**
   * Decode as strict UTF-8 (a leading BOM is kept); throws TypeError on
   * malformed input
   */
  toText(): string {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(this.toBuffer());
  }
}
