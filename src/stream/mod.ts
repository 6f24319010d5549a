export type { MarkableStream, TextSink } from "./stream.ts";
export { ByteStream, StringSink } from "./stream.ts";
