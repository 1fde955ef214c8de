import { Effect, ParseResult, Schema } from "effect";
import { InvalidConfigError } from "./errors/invalid-config.error.js";
import {
  ApplianceCatalogSchema,
  SystemConfigSchema,
  type Appliance,
  type ApplianceInput,
  type SystemConfig,
  type SystemConfigInput,
} from "./schema.js";

const toInvalidConfig = (subject: string) => (error: ParseResult.ParseError) =>
  new InvalidConfigError({
    message: `Invalid ${subject}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
  });

export const decodeSystemConfig = (
  input: SystemConfigInput,
): Effect.Effect<SystemConfig, InvalidConfigError> =>
  Schema.decodeUnknown(SystemConfigSchema)(input).pipe(
    Effect.mapError(toInvalidConfig("system config")),
  );

export const decodeApplianceCatalog = (
  input: readonly ApplianceInput[],
): Effect.Effect<readonly Appliance[], InvalidConfigError> =>
  Schema.decodeUnknown(ApplianceCatalogSchema)(input).pipe(
    Effect.mapError(toInvalidConfig("appliance catalog")),
  );

export const stepsPerDayFor = (timestepMinutes: number): number => 1440 / timestepMinutes;
