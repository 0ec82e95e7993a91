/**
 * Runtime configuration, read from the environment.
 *
 * Difficulty and topic names are protocol constants and deliberately not
 * part of this module.
 *
 * @module Config
 * @since 0.1.0
 */

import { Config, Effect, Layer, Logger, LogLevel } from "effect";

const positive = {
  message: "must be a positive integer",
  validation: (n: number) => n > 0,
};

/**
 * @category Config
 * @since 0.1.0
 */
export const MinerConfig = Config.all({
  yieldEvery: Config.integer("LEDGER_MINER_YIELD_EVERY").pipe(
    Config.withDefault(4096),
    Config.validate(positive)
  ),
});

/**
 * @category Config
 * @since 0.1.0
 */
export const NetworkConfig = Config.all({
  nodeCount: Config.integer("LEDGER_NODE_COUNT").pipe(
    Config.withDefault(3),
    Config.validate(positive)
  ),
});

/**
 * @category Config
 * @since 0.1.0
 */
export const LogConfig = Config.all({
  level: Config.logLevel("LEDGER_LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info)
  ),
  format: Config.literal("structured", "pretty")("LEDGER_LOG_FORMAT").pipe(
    Config.withDefault("pretty" as const)
  ),
});

/**
 * Logger selected by `LogConfig`
 *
 * @category Layers
 * @since 0.1.0
 */
export const LoggerLive = Layer.unwrapEffect(
  Effect.map(LogConfig, ({ level, format }) =>
    Layer.merge(
      format === "structured" ? Logger.structured : Logger.pretty,
      Logger.minimumLogLevel(level)
    )
  )
);
