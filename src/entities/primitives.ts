import { Schema } from "effect";

export const IntSchema = Schema.Number.pipe(Schema.int());
export type Int = typeof IntSchema.Type;

export const NonNegativeIntSchema = IntSchema.pipe(Schema.nonNegative());
export type NonNegativeInt = typeof NonNegativeIntSchema.Type;
