import { z } from "zod";
import { ConfigurationError } from "./errors/errors.js";

export const MODULE_FORMATS = ["commonjs", "module"] as const;
export type ModuleFormat = (typeof MODULE_FORMATS)[number];

export const DEFAULT_TIMEOUT_SECONDS = 20;

export interface HarnessConfig {
  readonly timeoutMs: number;
  /** Run the default server-side target under Deno instead of Node.js. */
  readonly useDeno: boolean;
  readonly moduleFormat: ModuleFormat;
  readonly nocapture: boolean;
  /** Headless browser driver command line, when browser targets are available. */
  readonly browserDriver: readonly string[] | undefined;
  readonly nodeArgs: readonly string[];
}

export type Environment = Readonly<Record<string, string | undefined>>;

const BOOLEAN_TEXT = ["", "0", "1", "true", "false", "yes", "no", "on", "off"] as const;

const flag = z.string().trim().toLowerCase().pipe(z.enum(BOOLEAN_TEXT)).optional();

const environmentSchema = z.object({
  WASMTEST_TIMEOUT: z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, "expected a number of seconds")
    .transform(Number)
    .refine((seconds) => seconds > 0, "must be greater than zero")
    .optional(),
  WASMTEST_USE_DENO: flag,
  WASMTEST_MODULE_FORMAT: z.enum(MODULE_FORMATS).optional(),
  WASMTEST_NOCAPTURE: flag,
  WASMTEST_BROWSER_DRIVER: z.string().optional(),
  NODE_ARGS: z.string().optional(),
});

export function coerceBoolean(value: unknown, fallback = false): boolean {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") {
      return true;
    }
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off" || normalized === "") {
      return false;
    }
  }

  if (typeof value === "number") {
    return value !== 0;
  }

  return fallback;
}

function readEnvironmentValue(env: Environment, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

/** Splits `NODE_ARGS`-style lists: comma separated, blanks dropped. */
export function splitList(value: string | undefined, separator: string | RegExp = ","): string[] {
  if (value === undefined) return [];
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function loadConfig(env: Environment = process.env): HarnessConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(environmentSchema.shape)) {
    raw[key] = readEnvironmentValue(env, key);
  }

  const parsed = environmentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`invalid environment: ${issues}`);
  }

  const values = parsed.data;
  const driver = splitList(values.WASMTEST_BROWSER_DRIVER, /\s+/);
  return {
    timeoutMs: Math.round((values.WASMTEST_TIMEOUT ?? DEFAULT_TIMEOUT_SECONDS) * 1000),
    useDeno: coerceBoolean(values.WASMTEST_USE_DENO),
    moduleFormat: values.WASMTEST_MODULE_FORMAT ?? "commonjs",
    nocapture: coerceBoolean(values.WASMTEST_NOCAPTURE),
    browserDriver: driver.length > 0 ? driver : undefined,
    nodeArgs: splitList(values.NODE_ARGS),
  };
}

/** Parses a timeout given in seconds on the command line. */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`invalid timeout '${value}': expected a positive number of seconds`);
  }
  return Math.round(seconds * 1000);
}
