/**
 * Canonical binary encoding of Messages, signable tuples and Frames.
 *
 * Layout (format version 1, big-endian integers):
 *
 *   header   : version u8, kind u8
 *   Message  : author (u8 len + bytes), sequence u64, previous [64],
 *              timestamp u64, content type (u8 len + UTF-8),
 *              content data (u32 len + bytes)
 *   Signable : id [64], message (u32 len + bytes)
 *   Frame    : id [64], message (u32 len + bytes), signature (u8 len + bytes)
 *
 * Every field has exactly one encoding, so for any accepted input
 * encode(decode(bytes)) reproduces `bytes`.
 */

import {
  DecodeError,
  InvalidEncodingError,
  MalformedMessageError,
  TruncatedInputError,
  UnsupportedVersionError,
} from "./errors.js";
import {
  DIGEST_LENGTH,
  EncodingKind,
  FORMAT_VERSION,
  MAX_CONTENT_SIZE,
  type Digest,
  type Frame,
  type Message,
} from "./types.js";

const MAX_U8 = 0xff;

// ignoreBOM keeps a leading U+FEFF in the decoded string so it re-encodes.
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();
const LONE_SURROGATE = /\p{Surrogate}/u;

/** Outcome of the non-throwing decoders. */
export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeError };

// ---------------------------------------------------------------------------
// Byte writer / reader
// ---------------------------------------------------------------------------

class ByteWriter {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  u8(value: number): this {
    return this.push(Uint8Array.of(value));
  }

  u32(value: number): this {
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setUint32(0, value, false);
    return this.push(buf);
  }

  u64(value: number): this {
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setBigUint64(0, BigInt(value), false);
    return this.push(buf);
  }

  fixed(data: Uint8Array): this {
    return this.push(data);
  }

  shortBytes(data: Uint8Array): this {
    return this.u8(data.length).push(data);
  }

  longBytes(data: Uint8Array): this {
    return this.u32(data.length).push(data);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  private push(data: Uint8Array): this {
    this.chunks.push(data);
    this.length += data.length;
    return this;
  }
}

class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  u8(field: string): number {
    this.need(1, field);
    return this.view.getUint8(this.offset++);
  }

  u32(field: string): number {
    this.need(4, field);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  u64(field: string): bigint {
    this.need(8, field);
    const value = this.view.getBigUint64(this.offset, false);
    this.offset += 8;
    return value;
  }

  take(length: number, field: string): Uint8Array {
    this.need(length, field);
    const out = this.bytes.slice(this.offset, this.offset + length);
    this.offset += length;
    return out;
  }

  header(kind: EncodingKind, what: string): void {
    const version = this.u8("version");
    if (version !== FORMAT_VERSION) {
      throw new UnsupportedVersionError(
        `Unsupported ${what} format version ${version}, expected ${FORMAT_VERSION}`
      );
    }
    const tag = this.u8("kind");
    if (tag !== kind) {
      throw new InvalidEncodingError(
        `Expected ${what} kind tag 0x${kind.toString(16)}, got 0x${tag.toString(16)}`
      );
    }
  }

  end(what: string): void {
    const rest = this.bytes.length - this.offset;
    if (rest !== 0) {
      throw new InvalidEncodingError(`${rest} trailing bytes after ${what}`);
    }
  }

  private need(length: number, field: string): void {
    const available = this.bytes.length - this.offset;
    if (available < length) {
      throw new TruncatedInputError(
        `Input ends while reading ${field}: need ${length} bytes, have ${available}`
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Field constraints
// ---------------------------------------------------------------------------

/**
 * Check every field constraint of a Message.
 *
 * @throws {MalformedMessageError} On the first violated constraint.
 */
export function assertValidMessage(message: Message): void {
  const { author, sequence, previous, timestamp, content } = message;
  if (author.length === 0 || author.length > MAX_U8) {
    throw new MalformedMessageError(
      `author must be 1-${MAX_U8} bytes, got ${author.length}`
    );
  }
  if (!Number.isSafeInteger(sequence) || sequence < 1) {
    throw new MalformedMessageError(`sequence must be an integer >= 1, got ${sequence}`);
  }
  if (previous.length !== DIGEST_LENGTH) {
    throw new MalformedMessageError(
      `previous must be ${DIGEST_LENGTH} bytes, got ${previous.length}`
    );
  }
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new MalformedMessageError(`timestamp must be an integer >= 0, got ${timestamp}`);
  }
  if (LONE_SURROGATE.test(content.type)) {
    throw new MalformedMessageError("content type is not well-formed UTF-16");
  }
  const typeLength = utf8Encoder.encode(content.type).length;
  if (typeLength === 0 || typeLength > MAX_U8) {
    throw new MalformedMessageError(
      `content type must be 1-${MAX_U8} UTF-8 bytes, got ${typeLength}`
    );
  }
  if (content.data.length > MAX_CONTENT_SIZE) {
    throw new MalformedMessageError(
      `content size ${content.data.length} bytes exceeds maximum ${MAX_CONTENT_SIZE} bytes`
    );
  }
}

function toSafeInteger(value: bigint, field: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new MalformedMessageError(`${field} ${value} exceeds the safe integer range`);
  }
  return Number(value);
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/**
 * Encode a Message canonically.
 *
 * @throws {MalformedMessageError} If the Message violates a field constraint.
 */
export function encodeMessage(message: Message): Uint8Array {
  assertValidMessage(message);
  return new ByteWriter()
    .u8(FORMAT_VERSION)
    .u8(EncodingKind.MESSAGE)
    .shortBytes(message.author)
    .u64(message.sequence)
    .fixed(message.previous)
    .u64(message.timestamp)
    .shortBytes(utf8Encoder.encode(message.content.type))
    .longBytes(message.content.data)
    .finish();
}

/**
 * Decode a canonical Message encoding.
 *
 * @throws {TruncatedInputError} If the input ends early.
 * @throws {InvalidEncodingError} If the bytes are structurally invalid.
 * @throws {MalformedMessageError} If a decoded field violates its constraint.
 */
export function decodeMessage(bytes: Uint8Array): Message {
  const reader = new ByteReader(bytes);
  reader.header(EncodingKind.MESSAGE, "message");

  const authorLength = reader.u8("author length");
  if (authorLength === 0) {
    throw new MalformedMessageError("author must not be empty");
  }
  const author = reader.take(authorLength, "author");

  const sequence = toSafeInteger(reader.u64("sequence"), "sequence");
  if (sequence < 1) {
    throw new MalformedMessageError(`sequence must be >= 1, got ${sequence}`);
  }
  const previous = reader.take(DIGEST_LENGTH, "previous");
  const timestamp = toSafeInteger(reader.u64("timestamp"), "timestamp");

  const typeLength = reader.u8("content type length");
  if (typeLength === 0) {
    throw new MalformedMessageError("content type must not be empty");
  }
  let type: string;
  try {
    type = utf8Decoder.decode(reader.take(typeLength, "content type"));
  } catch (err) {
    if (err instanceof DecodeError) throw err;
    throw new InvalidEncodingError("content type is not valid UTF-8");
  }

  const dataLength = reader.u32("content length");
  if (dataLength > MAX_CONTENT_SIZE) {
    throw new MalformedMessageError(
      `content size ${dataLength} bytes exceeds maximum ${MAX_CONTENT_SIZE} bytes`
    );
  }
  const data = reader.take(dataLength, "content");
  reader.end("message");

  return Object.freeze({
    author,
    sequence,
    previous,
    timestamp,
    content: Object.freeze({ type, data }),
  });
}

// ---------------------------------------------------------------------------
// Signable tuple and Frame
// ---------------------------------------------------------------------------

/**
 * Signable bytes from an id and an already-encoded Message.
 */
export function encodeSignableBytes(id: Digest, messageBytes: Uint8Array): Uint8Array {
  if (id.length !== DIGEST_LENGTH) {
    throw new MalformedMessageError(`id must be ${DIGEST_LENGTH} bytes, got ${id.length}`);
  }
  return new ByteWriter()
    .u8(FORMAT_VERSION)
    .u8(EncodingKind.SIGNABLE)
    .fixed(id)
    .longBytes(messageBytes)
    .finish();
}

/**
 * Encode the `(id, message)` tuple a Frame's signature covers.
 */
export function encodeSignable(id: Digest, message: Message): Uint8Array {
  return encodeSignableBytes(id, encodeMessage(message));
}

/**
 * Encode a full Frame, signature included.
 *
 * @throws {MalformedMessageError} If the Frame or its Message is malformed.
 */
export function encodeFrame(frame: Frame): Uint8Array {
  if (frame.id.length !== DIGEST_LENGTH) {
    throw new MalformedMessageError(`id must be ${DIGEST_LENGTH} bytes, got ${frame.id.length}`);
  }
  if (frame.signature.length === 0 || frame.signature.length > MAX_U8) {
    throw new MalformedMessageError(
      `signature must be 1-${MAX_U8} bytes, got ${frame.signature.length}`
    );
  }
  return new ByteWriter()
    .u8(FORMAT_VERSION)
    .u8(EncodingKind.FRAME)
    .fixed(frame.id)
    .longBytes(encodeMessage(frame.message))
    .shortBytes(frame.signature)
    .finish();
}

/**
 * Decode a Frame encoding.
 *
 * The embedded message is length-delimited, so a short embedded message
 * inside a complete frame is an InvalidEncodingError, not truncation.
 */
export function decodeFrame(bytes: Uint8Array): Frame {
  const reader = new ByteReader(bytes);
  reader.header(EncodingKind.FRAME, "frame");

  const id = reader.take(DIGEST_LENGTH, "id");
  const messageBytes = reader.take(reader.u32("message length"), "message");
  const signatureLength = reader.u8("signature length");
  if (signatureLength === 0) {
    throw new MalformedMessageError("signature must not be empty");
  }
  const signature = reader.take(signatureLength, "signature");
  reader.end("frame");

  let message: Message;
  try {
    message = decodeMessage(messageBytes);
  } catch (err) {
    if (err instanceof TruncatedInputError) {
      throw new InvalidEncodingError(`embedded message: ${err.message}`);
    }
    throw err;
  }

  return Object.freeze({ id, message, signature });
}

// ---------------------------------------------------------------------------
// Non-throwing variants
// ---------------------------------------------------------------------------

function attempt<T>(decode: (bytes: Uint8Array) => T, bytes: Uint8Array): DecodeResult<T> {
  try {
    return { ok: true, value: decode(bytes) };
  } catch (err) {
    if (err instanceof DecodeError) return { ok: false, error: err };
    throw err;
  }
}

export function tryDecodeMessage(bytes: Uint8Array): DecodeResult<Message> {
  return attempt(decodeMessage, bytes);
}

export function tryDecodeFrame(bytes: Uint8Array): DecodeResult<Frame> {
  return attempt(decodeFrame, bytes);
}
