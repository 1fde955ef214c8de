import { Data } from "effect";

export class InsufficientDataError extends Data.TaggedError("InsufficientData")<{
  readonly required: number;
  readonly received: number;
}> {
  public override readonly message = `Day-ahead matching needs ${this.required} step records, received ${this.received}`;
}
