import { Data } from "effect";

export class InvalidConfigError extends Data.TaggedError("InvalidConfig")<{
  readonly message: string;
}> {}
