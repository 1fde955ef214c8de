import { FileSystem } from "@effect/platform";
import { Effect, ParseResult, Schema } from "effect";
import { HouseholdFileNotReadableError } from "../errors/household-file-not-readable.error.js";
import { InvalidConfigError } from "../errors/invalid-config.error.js";
import { HouseholdFileSchema, type Household } from "../schema.js";

/** Reads `{ system, appliances }` from a JSON file and validates both parts. */
export const loadHouseholdFile = (
  path: string,
): Effect.Effect<Household, HouseholdFileNotReadableError | InvalidConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;

    const content = yield* fileSystem.readFileString(path).pipe(
      Effect.mapError((cause) => new HouseholdFileNotReadableError({ path, cause })),
    );
    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(content),
      catch: (cause) => new HouseholdFileNotReadableError({ path, cause }),
    });

    yield* Effect.logDebug(`Loaded household file ${path}`);

    return yield* Schema.decodeUnknown(HouseholdFileSchema)(json).pipe(
      Effect.mapError((error) =>
        new InvalidConfigError({
          message: `Invalid household file ${path}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
        })
      ),
    );
  });
