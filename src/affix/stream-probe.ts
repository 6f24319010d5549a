import { TextsliceError } from "../core/error.ts";
import type { Text } from "../core/text.ts";
import { TextView } from "../core/text.ts";
import { utf8Bytes, utf8Decode, utf8SequenceLength } from "../encoding/utf8.ts";
import type { CharMatcherInput } from "../pattern/pattern.ts";
import { matchesChar, toCharMatcher } from "../pattern/pattern.ts";
import type { MarkableStream } from "../stream/stream.ts";

function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left.length !== right.length) return false;
  for (let index = 0; index < left.length; index += 1) {
    if (left[index] !== right[index]) return false;
  }
  return true;
}

function readChar(stream: MarkableStream): string | undefined {
  const lead = stream.read(1);
  const leadByte = lead[0];
  if (leadByte === undefined) return undefined;
  const length = utf8SequenceLength(leadByte);
  if (length === 1) return utf8Decode(lead);
  const tail = stream.read(length - 1);
  const sequence = new Uint8Array(1 + tail.length);
  sequence[0] = leadByte;
  sequence.set(tail, 1);
  const decoded = utf8Decode(sequence);
  return String.fromCodePoint(decoded.codePointAt(0) ?? 0xfffd);
}

function probe(stream: MarkableStream, check: () => boolean): boolean {
  if (stream.mark === undefined || stream.reset === undefined) {
    throw new TextsliceError("STREAM_NOT_MARKABLE", "Stream does not support mark/reset");
  }
  stream.mark();
  try {
    return check();
  } finally {
    stream.reset();
  }
}

/**
 * Whether the next bytes of `stream` start with `prefix`, without consuming them.
 *
 * A text prefix is compared as UTF-8 bytes; a matcher is tested against the next
 * character. The stream is reset to its mark whether or not reading succeeds. An
 * exhausted stream never matches a matcher.
 * Units: bytes (UTF-8).
 */
export function startsWithStream(
  stream: MarkableStream,
  prefix: Text | CharMatcherInput,
): boolean {
  if (typeof prefix === "string" || prefix instanceof TextView) {
    const expected = utf8Bytes(prefix);
    return probe(stream, () => bytesEqual(stream.read(expected.length), expected));
  }
  const matcher = toCharMatcher(prefix);
  return probe(stream, () => {
    const next = readChar(stream);
    return next !== undefined && matchesChar(matcher, next, 0);
  });
}
