import { Data } from "effect";

export class HouseholdFileNotReadableError extends Data.TaggedError("HouseholdFileNotReadable")<{
  readonly path: string;
  readonly cause?: unknown;
}> {
  public override readonly message = `Could not read household file at ${this.path}`;
}
