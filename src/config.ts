import {
  getDotPath,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  type BaseIssue,
  type GenericSchema,
  type InferOutput,
} from "valibot";
import type { GasSchedule } from "./core/gas";
import type { LogLevel } from "./logging";

export class ConfigError extends Error {
  readonly issues: readonly BaseIssue<unknown>[];

  constructor(what: string, issues: readonly BaseIssue<unknown>[]) {
    super(
      `Invalid ${what}: ${issues
        .map((i) => `${getDotPath(i) ?? "<root>"}: ${i.message}`)
        .join("; ")}`,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Parses `input` or throws a ConfigError listing every issue. */
export const parseOrThrow = <S extends GenericSchema>(
  what: string,
  schema: S,
  input: unknown,
): InferOutput<S> => {
  const result = safeParse(schema, input);
  if (!result.success) throw new ConfigError(what, result.issues);
  return result.output;
};

const gasUnits = (fallback: string) =>
  pipe(
    optional(pipe(string(), regex(/^\d+$/, "Expected a non-negative integer.")), fallback),
    transform((v) => BigInt(v)),
  );

const envSchema = object({
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: pipe(
    optional(picklist(["true", "false", "1", "0"]), "false"),
    transform((v) => v === "true" || v === "1"),
  ),
  GAS_BASE: gasUnits("21000"),
  GAS_STORAGE_WRITE: gasUnits("20000"),
  GAS_CALLDATA_BYTE: gasUnits("16"),
  MAX_STATE_ROOTS: pipe(
    optional(pipe(string(), regex(/^[1-9]\d*$/, "Expected a positive integer.")), "100"),
    transform((v) => Number(v)),
  ),
});

export interface Config {
  logLevel: LogLevel;
  logPretty: boolean;
  gas: GasSchedule;
  maxStateRoots: number;
}

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const e = parseOrThrow("environment", envSchema, env);
  return {
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    gas: {
      base: e.GAS_BASE,
      storageWrite: e.GAS_STORAGE_WRITE,
      calldataByte: e.GAS_CALLDATA_BYTE,
    },
    maxStateRoots: e.MAX_STATE_ROOTS,
  };
};
