/**
 * Wire Codec — JSON payloads with the field sets every peer shares.
 *
 * The three payload kinds carry no discriminant, so inbound bytes are
 * tried against each shape in turn and the first that parses wins.
 *
 * @module WireCodec
 * @since 0.1.0
 */

import { Schema } from "effect";
import * as Either from "effect/Either";
import * as Block from "../entities/block";
import {
  ChainRequestSchema,
  ChainResponseSchema,
  GossipMessage,
  type ChainRequest,
  type ChainResponse,
} from "../entities/message";

const ChainResponseJson = Schema.parseJson(ChainResponseSchema);
const ChainRequestJson = Schema.parseJson(ChainRequestSchema);
const BlockJson = Schema.parseJson(Block.BlockSchema);

const encoder = new TextEncoder();

const toBytes = (text: string): Uint8Array => encoder.encode(text);

const toText = (payload: Uint8Array): Either.Either<string, string> =>
  Either.try({
    try: () => new TextDecoder("utf-8", { fatal: true }).decode(payload),
    catch: () => "payload is not valid UTF-8",
  });

// ============================================================================
// ENCODING
// ============================================================================

export const encodeChainResponse = (response: ChainResponse): Uint8Array =>
  toBytes(Schema.encodeSync(ChainResponseJson)(response));

export const encodeChainRequest = (request: ChainRequest): Uint8Array =>
  toBytes(Schema.encodeSync(ChainRequestJson)(request));

export const encodeBlock = (block: Block.Block): Uint8Array =>
  toBytes(Schema.encodeSync(BlockJson)(block));

// ============================================================================
// DECODING
// ============================================================================

const decodeChainResponse = Schema.decodeUnknownEither(ChainResponseJson);
const decodeChainRequest = Schema.decodeUnknownEither(ChainRequestJson);
const decodeBlock = Schema.decodeUnknownEither(BlockJson);

/**
 * Interpret an inbound payload. Never fails: anything that matches none of
 * the shapes is `Unrecognized`.
 *
 * @category Decoding
 * @since 0.1.0
 */
export const decode = (payload: Uint8Array): GossipMessage =>
  Either.match(toText(payload), {
    onLeft: (reason) => GossipMessage.Unrecognized({ reason }),
    onRight: (text) =>
      Either.match(decodeChainResponse(text), {
        onRight: (response) => GossipMessage.ChainResponse({ response }),
        onLeft: () =>
          Either.match(decodeChainRequest(text), {
            onRight: (request) => GossipMessage.ChainRequest({ request }),
            onLeft: () =>
              Either.match(decodeBlock(text), {
                onRight: (block) => GossipMessage.BlockAnnouncement({ block }),
                onLeft: () =>
                  GossipMessage.Unrecognized({
                    reason: "payload matches no known message shape",
                  }),
              }),
          }),
      }),
  });
