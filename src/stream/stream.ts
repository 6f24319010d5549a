import { TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { utf8Bytes } from "../encoding/utf8.ts";

/**
 * A byte source that may support rewinding to a marked position.
 * Streams without `mark`/`reset` cannot be probed.
 */
export interface MarkableStream {
  /** Read up to `byteCount` bytes; fewer are returned at end of input. */
  read(byteCount: number): Uint8Array;
  mark?(): void;
  reset?(): void;
}

/**
 * Destination for streamed text output.
 */
export interface TextSink {
  write(chunk: string): void;
}

/**
 * In-memory markable byte stream over bytes or the UTF-8 encoding of a text.
 * Units: bytes (UTF-8).
 */
export class ByteStream implements MarkableStream {
  private readonly bytes: Uint8Array;
  private offset = 0;
  private marked: number | undefined;

  constructor(input: Uint8Array | Text) {
    this.bytes = input instanceof Uint8Array ? input : utf8Bytes(input);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  get eof(): boolean {
    return this.offset >= this.bytes.length;
  }

  read(byteCount: number): Uint8Array {
    const end = Math.min(this.bytes.length, this.offset + Math.max(0, byteCount));
    const chunk = this.bytes.slice(this.offset, end);
    this.offset = end;
    return chunk;
  }

  mark(): void {
    this.marked = this.offset;
  }

  reset(): void {
    if (this.marked === undefined) {
      throw new TextsliceError("STREAM_NOT_MARKED", "reset called without a mark", {
        position: this.offset,
      });
    }
    this.offset = this.marked;
    this.marked = undefined;
  }
}

/**
 * Sink collecting chunks and joining them once on demand.
 */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    if (chunk.length > 0) this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}
