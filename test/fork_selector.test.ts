import { assert, beforeAll, describe, it } from "@effect/vitest";
import { Effect, Layer } from "effect";
import * as Chunk from "effect/Chunk";
import type * as Chain from "../src/entities/chain";
import { HashingServiceLive } from "../src/services/hash";
import { ForkSelector, ValidationLive } from "../src/services/validation";
import { runMineChain, tamper } from "./utils/fixtures";
import { assertLeft, assertRight } from "./utils/helpers";

const TestLayer = ValidationLive.pipe(Layer.provideMerge(HashingServiceLive));

let left: Chain.Chain;
let alternative: Chain.Chain;
let right: Chain.Chain;

beforeAll(async () => {
  left = await runMineChain(2, "left");
  alternative = await runMineChain(2, "alternative");
  right = await runMineChain(3, "right");
});

const broken = (chain: Chain.Chain) => tamper(chain, 1, { data: "forged" });

describe("ForkSelector.selectChain", () => {
  it.effect("adopts a longer valid remote chain", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      const choice = assertRight(selector.selectChain(left, right));

      assert.strictEqual(choice._tag, "AdoptRemote");
      assert.strictEqual(choice.chain, right);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("keeps a longer valid local chain", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      const choice = assertRight(selector.selectChain(right, left));

      assert.strictEqual(choice._tag, "KeepLocal");
      assert.strictEqual(choice.chain, right);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("keeps the local chain on equal length in either order", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      assert.strictEqual(Chunk.size(left), Chunk.size(alternative));

      const first = assertRight(selector.selectChain(left, alternative));
      const second = assertRight(selector.selectChain(alternative, left));

      assert.strictEqual(first._tag, "KeepLocal");
      assert.strictEqual(first.chain, left);
      assert.strictEqual(second._tag, "KeepLocal");
      assert.strictEqual(second.chain, alternative);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("ignores length when the remote chain is invalid", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      const choice = assertRight(selector.selectChain(left, broken(right)));

      assert.strictEqual(choice._tag, "KeepLocal");
      assert.strictEqual(choice.chain, left);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("adopts a shorter valid remote chain over an invalid local one", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      const choice = assertRight(selector.selectChain(broken(right), left));

      assert.strictEqual(choice._tag, "AdoptRemote");
      assert.strictEqual(choice.chain, left);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("fails with both validation errors when neither chain is valid", () =>
    Effect.gen(function* () {
      const selector = yield* ForkSelector;
      const nonce = Chunk.unsafeGet(right, 3).nonce + 1;
      const error = assertLeft(
        selector.selectChain(broken(left), tamper(right, 3, { nonce }))
      );

      assert.strictEqual(error._tag, "NoValidChain");
      assert.strictEqual(error.local.index, 1);
      assert.strictEqual(error.remote.index, 3);
    }).pipe(Effect.provide(TestLayer))
  );
});
