import { Schema } from "effect";

export const ZaptecTokenResponseSchema = Schema.Struct({
  access_token: Schema.String,
  token_type: Schema.optional(Schema.String),
  expires_in: Schema.optional(Schema.Number),
});

export const ZaptecChargerSchema = Schema.Struct({
  Id: Schema.String,
  Name: Schema.optional(Schema.String),
});

export const ZaptecChargerListSchema = Schema.Struct({
  Data: Schema.Array(ZaptecChargerSchema),
});

export type ZaptecCharger = typeof ZaptecChargerSchema.Type
