export { BlockValidator, BlockValidatorLive } from "./block";
export { ChainValidator, ChainValidatorLive } from "./chain";
export { ForkChoice, ForkSelector, ForkSelectorLive } from "./fork";

/**
 * Validation Service — Effect-Based Capabilities
 *
 * Capabilities:
 * - BlockValidator — one candidate against its predecessor
 * - ChainValidator — every adjacent pair of a sequence
 * - ForkSelector — longest valid chain between local and remote
 *
 * Dependencies:
 * - BlockValidator requires HashingService
 *
 * @module ValidationService
 * @since 0.1.0
 */

import { Layer } from "effect";
import { BlockValidatorLive } from "./block";
import { ChainValidatorLive } from "./chain";
import { ForkSelectorLive } from "./fork";

/**
 * All validation layers combined
 *
 * Requires: HashingService
 *
 * @category Services
 * @since 0.1.0
 */
export const ValidationLive = ForkSelectorLive.pipe(
  Layer.provideMerge(ChainValidatorLive),
  Layer.provideMerge(BlockValidatorLive)
);
