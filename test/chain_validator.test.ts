import { assert, beforeAll, describe, it } from "@effect/vitest";
import { Effect, Layer } from "effect";
import * as Chunk from "effect/Chunk";
import * as Block from "../src/entities/block";
import * as Chain from "../src/entities/chain";
import { HashingServiceLive } from "../src/services/hash";
import { ChainValidator, ValidationLive } from "../src/services/validation";
import { runMineChain, tamper } from "./utils/fixtures";
import { assertLeft, assertRight } from "./utils/helpers";

const TestLayer = ValidationLive.pipe(Layer.provideMerge(HashingServiceLive));

let chain: Chain.Chain;

beforeAll(async () => {
  chain = await runMineChain(3, "chain");
});

describe("ChainValidator.validateChain", () => {
  it.effect("treats empty and single-block sequences as valid", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;

      assert.isTrue(validator.isChainValid(Chunk.empty()));
      assert.isTrue(validator.isChainValid(Chain.genesisOnly()));
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("returns a valid chain unchanged", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;

      assert.strictEqual(assertRight(validator.validateChain(chain)), chain);
      assert.strictEqual(Chunk.size(chain), 4);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("reports edited data at the index of the edited block", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;
      const error = assertLeft(
        validator.validateChain(tamper(chain, 2, { data: "forged" }))
      );

      assert.strictEqual(error.index, 2);
      assert.strictEqual(error.rejection._tag, "HashMismatch");
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("reports an edited nonce", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;
      const nonce = Chunk.unsafeGet(chain, 3).nonce + 1;
      const error = assertLeft(
        validator.validateChain(tamper(chain, 3, { nonce }))
      );

      assert.strictEqual(error.index, 3);
      assert.strictEqual(error.rejection._tag, "HashMismatch");
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("reports a broken link", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;
      const error = assertLeft(
        validator.validateChain(tamper(chain, 1, { previousHash: "0000" }))
      );

      assert.strictEqual(error.index, 1);
      assert.strictEqual(error.rejection._tag, "BrokenLink");
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("stops at the first failing pair", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;
      const forged = tamper(tamper(chain, 1, { data: "a" }), 3, { data: "b" });
      const error = assertLeft(validator.validateChain(forged));

      assert.strictEqual(error.index, 1);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("never checks the genesis block itself", () =>
    Effect.gen(function* () {
      const validator = yield* ChainValidator;
      const rewritten = tamper(chain, 0, { data: "rewritten", nonce: 1 });

      assert.isTrue(validator.isChainValid(rewritten));
      assert.strictEqual(
        Chunk.unsafeGet(rewritten, 0).hash,
        Block.GENESIS.hash
      );
    }).pipe(Effect.provide(TestLayer))
  );
});
