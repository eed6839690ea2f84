import pino from "pino";

export interface ILogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  child(bindings: Record<string, unknown>): ILogger;
}

export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  /** route output through pino-pretty */
  pretty?: boolean;
}

// amounts, nonces and heights are bigints
const plain = (v: unknown): unknown => {
  if (typeof v === "bigint") return v.toString();
  if (Array.isArray(v)) return v.map(plain);
  if (v instanceof Uint8Array) return v;
  if (v !== null && typeof v === "object") {
    return Object.fromEntries(Object.entries(v).map(([k, x]) => [k, plain(x)]));
  }
  return v;
};

export const makeLogger = ({ level = "info", pretty = false }: LoggerOptions = {}): ILogger =>
  pino({
    level,
    formatters: {
      log: (obj) => Object.fromEntries(Object.entries(obj).map(([k, v]) => [k, plain(v)])),
    },
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
