/**
 * Block hashing and the proof-of-work admission rule.
 *
 * Capabilities:
 * - HashingService — content digest, hex decoding, difficulty predicate
 *
 * @module Hash
 * @since 0.1.0
 */

import { Context, Layer } from "effect";
import * as Either from "effect/Either";
import * as Crypto from "crypto";
import { getBytes, hexlify, isHexString } from "ethers";
import type * as Block from "../entities/block";
import { InvalidEncoding } from "../entities/errors";

/** Leading zero bits a block digest must carry */
export const DIFFICULTY_BITS = 16;

export const DIFFICULTY_PREFIX = "0".repeat(DIFFICULTY_BITS);

// ============================================================================
// PURE HELPERS
// ============================================================================

// Keys in sorted order; every peer must serialize identically
const canonicalContent = (content: Block.BlockContent): string =>
  JSON.stringify({
    data: content.data,
    id: content.id,
    nonce: content.nonce,
    previous_hash: content.previousHash,
    timestamp: content.timestamp,
  });

export const computeDigest = (content: Block.BlockContent): Uint8Array =>
  Crypto.createHash("sha256").update(canonicalContent(content)).digest();

export const computeHash = (content: Block.BlockContent): string =>
  // Remove '0x' prefix from ethers output
  hexlify(computeDigest(content)).slice(2);

export const decodeHex = (
  text: string
): Either.Either<Uint8Array, InvalidEncoding> => {
  if (text.length === 0)
    return Either.left(new InvalidEncoding({ value: text, reason: "empty" }));

  if (!isHexString(`0x${text}`))
    return Either.left(
      new InvalidEncoding({ value: text, reason: "non-hex character" })
    );

  if (text.length % 2 !== 0)
    return Either.left(
      new InvalidEncoding({ value: text, reason: "odd number of digits" })
    );

  return Either.right(getBytes(`0x${text}`));
};

/** Each byte as 8 binary digits, most significant first */
export const toBinary = (bytes: Uint8Array): string =>
  Array.from(bytes, (byte) => byte.toString(2).padStart(8, "0")).join("");

export const satisfiesDifficulty = (digest: Uint8Array): boolean =>
  // only the bytes that can hold the prefix need rendering
  toBinary(digest.subarray(0, Math.ceil(DIFFICULTY_BITS / 8))).startsWith(
    DIFFICULTY_PREFIX
  );

// ============================================================================
// CAPABILITY: HASHING SERVICE
// ============================================================================

/**
 * HashingService capability — block digests and the difficulty predicate
 *
 * All operations are deterministic and side-effect free.
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class HashingService extends Context.Tag("@ledger/HashingService")<
  HashingService,
  {
    readonly computeDigest: (content: Block.BlockContent) => Uint8Array;
    readonly computeHash: (content: Block.BlockContent) => string;
    readonly decodeHex: (
      text: string
    ) => Either.Either<Uint8Array, InvalidEncoding>;
    readonly satisfiesDifficulty: (digest: Uint8Array) => boolean;
  }
>() {}

/**
 * Live implementation of HashingService (SHA-256)
 *
 * @category Services
 * @since 0.1.0
 */
export const HashingServiceLive = Layer.succeed(
  HashingService,
  HashingService.of({
    computeDigest,
    computeHash,
    decodeHex,
    satisfiesDifficulty,
  })
);
