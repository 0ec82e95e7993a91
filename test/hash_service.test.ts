import { assert, describe, it } from "@effect/vitest";
import { Effect } from "effect";
import * as Crypto from "crypto";
import * as Block from "../src/entities/block";
import { InvalidEncoding } from "../src/entities/errors";
import {
  DIFFICULTY_BITS,
  HashingService,
  HashingServiceLive,
  toBinary,
} from "../src/services/hash";
import { assertLeft, assertRight } from "./utils/helpers";

const content: Block.BlockContent = {
  id: 1,
  timestamp: 100,
  previousHash: "abc",
  data: "hello",
  nonce: 7,
};

describe("HashingService.computeHash", () => {
  it.effect("hashes the canonical sorted-key JSON with SHA-256", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;
      const expected = Crypto.createHash("sha256")
        .update(
          '{"data":"hello","id":1,"nonce":7,"previous_hash":"abc","timestamp":100}'
        )
        .digest("hex");

      assert.strictEqual(hashing.computeHash(content), expected);
    }).pipe(Effect.provide(HashingServiceLive))
  );

  it.effect("is deterministic", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;
      const first = hashing.computeHash(content);
      const second = hashing.computeHash({ ...content });

      assert.strictEqual(first, second);
      assert.match(first, /^[0-9a-f]{64}$/);
    }).pipe(Effect.provide(HashingServiceLive))
  );

  it.effect("changes when any single field changes", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;
      const base = hashing.computeHash(content);
      const variants: ReadonlyArray<Block.BlockContent> = [
        { ...content, id: 2 },
        { ...content, timestamp: 101 },
        { ...content, previousHash: "abd" },
        { ...content, data: "hellp" },
        { ...content, nonce: 8 },
      ];

      const digests = variants.map(hashing.computeHash);
      for (const digest of digests) assert.notStrictEqual(digest, base);
      assert.strictEqual(new Set([base, ...digests]).size, 6);
    }).pipe(Effect.provide(HashingServiceLive))
  );
});

describe("HashingService.decodeHex", () => {
  it.effect("decodes lowercase and uppercase hex", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;

      assert.deepStrictEqual(
        Array.from(assertRight(hashing.decodeHex("00ff"))),
        [0, 255]
      );
      assert.deepStrictEqual(
        Array.from(assertRight(hashing.decodeHex("0A"))),
        [10]
      );
    }).pipe(Effect.provide(HashingServiceLive))
  );

  it.effect("reports malformed hex as InvalidEncoding", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;

      const nonHex = assertLeft(hashing.decodeHex("zz"));
      assert.instanceOf(nonHex, InvalidEncoding);
      assert.strictEqual(nonHex.reason, "non-hex character");

      const odd = assertLeft(hashing.decodeHex("abc"));
      assert.strictEqual(odd.reason, "odd number of digits");

      const empty = assertLeft(hashing.decodeHex(""));
      assert.strictEqual(empty.reason, "empty");
    }).pipe(Effect.provide(HashingServiceLive))
  );
});

describe("HashingService.satisfiesDifficulty", () => {
  it("renders every byte as eight binary digits", () => {
    assert.strictEqual(
      toBinary(Uint8Array.of(0x00, 0x0f, 0x80)),
      "000000000000111110000000"
    );
  });

  it.effect("accepts digests starting with the required zero bits", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;

      assert.strictEqual(DIFFICULTY_BITS, 16);
      assert.isTrue(hashing.satisfiesDifficulty(Uint8Array.of(0, 0)));
      assert.isTrue(hashing.satisfiesDifficulty(Uint8Array.of(0, 0, 0xff)));
    }).pipe(Effect.provide(HashingServiceLive))
  );

  it.effect("rejects a digest one zero bit short of the target", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;

      // 15 leading zero bits
      assert.isFalse(hashing.satisfiesDifficulty(Uint8Array.of(0x00, 0x01)));
      assert.isFalse(hashing.satisfiesDifficulty(Uint8Array.of(0x00, 0x80)));
      assert.isFalse(hashing.satisfiesDifficulty(Uint8Array.of(0xff, 0x00)));
      assert.isFalse(hashing.satisfiesDifficulty(Uint8Array.of(0x00)));
    }).pipe(Effect.provide(HashingServiceLive))
  );

  it.effect("accepts the genesis hash", () =>
    Effect.gen(function* () {
      const hashing = yield* HashingService;
      const digest = assertRight(hashing.decodeHex(Block.GENESIS.hash));

      assert.isTrue(hashing.satisfiesDifficulty(digest));
    }).pipe(Effect.provide(HashingServiceLive))
  );
});
