/**
 * kutyus protocol -- encode, sign and validate signed append-only feeds.
 *
 * Public API re-exports for the protocol layer.
 */

// Types
export {
  FORMAT_VERSION,
  DIGEST_LENGTH,
  MAX_CONTENT_SIZE,
  DEFAULT_CONTENT_TYPE,
  EncodingKind,
  GENESIS_PREVIOUS,
  type Digest,
  type Content,
  type Message,
  type Frame,
  content,
  bytesEqual,
  b64Encode,
  b64Decode,
  toHex,
  fromHex,
} from "./types.js";

// Errors
export {
  KutyusError,
  DecodeError,
  TruncatedInputError,
  InvalidEncodingError,
  UnsupportedVersionError,
  MalformedMessageError,
  InvalidSequenceError,
  SigningError,
  StoreError,
  StoreConflictError,
  StoreClosedError,
  FrameRejectedError,
} from "./errors.js";

// Codec
export {
  type DecodeResult,
  assertValidMessage,
  encodeMessage,
  decodeMessage,
  encodeSignable,
  encodeSignableBytes,
  encodeFrame,
  decodeFrame,
  tryDecodeMessage,
  tryDecodeFrame,
} from "./codec.js";

// Hash
export {
  digest,
  messageId,
  frameDigest,
  digestEquals,
  isGenesisPrevious,
  digestHex,
} from "./hash.js";

// Crypto
export {
  sodiumReady,
  ED25519,
  type SigningKey,
  type VerifyKey,
  type Seed,
  type Keypair,
  type Signer,
  type Verifier,
  generateKeypair,
  keypairFromSeed,
  serializeSigningKey,
  deserializeSigningKey,
  serializeVerifyKey,
  deserializeVerifyKey,
  publicKeyFingerprint,
  signBytes,
  verifyBytes,
  Ed25519Signer,
  ed25519Verifier,
} from "./crypto.js";

// Frame
export { buildFrame, buildGenesisFrame, buildNextFrame } from "./frame.js";

// Chain
export {
  RejectReason,
  type EmptyFeed,
  type LinkedFeed,
  type FeedState,
  type ValidationOutcome,
  type FeedValidation,
  EMPTY_FEED,
  linkedTo,
  feedStateOf,
  validateFrame,
  validateFeed,
} from "./chain.js";
