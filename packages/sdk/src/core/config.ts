import { readFileSync } from "node:fs";
import { hostname as osHostname } from "node:os";
import { dirname, join } from "node:path";
import { ErrorCode, type ErrorCodeValue, TeleflushError } from "@teleflush/shared/errors";
import {
  ApiKey,
  EnvBoolean,
  EnvName,
  ServiceName,
  Site,
  VersionString,
} from "@teleflush/shared/validation";
import { z } from "zod";
import { gitShortRevision } from "./git.js";
import { KNOWN_INTEGRATIONS, assertKnownIntegrations } from "./integrations.js";
import type { TelemetryConfig, TelemetryOptions } from "./types.js";

const DEFAULT_SITE = "datadoghq.com";
const DEFAULT_LOGS_FLUSH_INTERVAL_MS = 500;
const DEFAULT_REQUEST_TIMEOUT_MS = 2_000;
const DEFAULT_MAX_BUFFER_SIZE = 10_000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

const CONFIG_FILENAME = ".teleflushrc.json";

const ConfigFile = z.object({
  apiKey: z.string().optional(),
  site: z.string().optional(),
  hostname: z.string().optional(),
  service: z.string().optional(),
  env: z.string().optional(),
  version: z.string().optional(),
  versionUseGit: z.boolean().optional(),
  tracePatch: z.boolean().optional(),
  traceModules: z.array(z.string()).optional(),
});
type ConfigFile = z.infer<typeof ConfigFile>;

const PositiveInt = z.number().int().positive();

/**
 * Walk up directories from `startDir` looking for `.teleflushrc.json`.
 * Returns the parsed config or null.
 */
function findConfigFile(startDir: string): ConfigFile | null {
  let dir = startDir;
  for (;;) {
    try {
      const content = readFileSync(join(dir, CONFIG_FILENAME), "utf-8");
      const parsed = ConfigFile.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
    } catch {
      // Missing or malformed: keep walking up
    }
    const parent = dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }
  return null;
}

/** Read an environment variable, treating an empty value as unset. */
function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

function readEnvBoolean(name: string): boolean | undefined {
  const value = readEnv(name);
  return value === undefined ? undefined : EnvBoolean.parse(value);
}

function readEnvList(name: string): string[] | undefined {
  const value = readEnv(name);
  if (value === undefined) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function required(
  schema: z.ZodType<string>,
  value: string | undefined,
  code: ErrorCodeValue,
  message: string,
  variable: string,
): string {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new TeleflushError(code, message, 400, { variable });
  }
  return parsed.data;
}

function checked<T>(schema: z.ZodType<T>, value: unknown, option: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new TeleflushError(
      ErrorCode.CONFIG.INVALID_OPTION,
      `Invalid value for ${option}: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      400,
      { option },
    );
  }
  return parsed.data;
}

function resolveVersion(options: TelemetryOptions, file: ConfigFile | null): string {
  const explicit = options.version ?? readEnv("DD_VERSION") ?? file?.version;
  const useGit =
    options.versionUseGit ?? readEnvBoolean("DD_VERSION_USE_GIT") ?? file?.versionUseGit ?? false;

  if (useGit && explicit !== undefined) {
    throw new TeleflushError(
      ErrorCode.CONFIG.AMBIGUOUS_VERSION,
      `Ambiguous version: cannot use both custom version "${explicit}" and git version`,
      400,
    );
  }

  return required(
    VersionString,
    useGit ? gitShortRevision() : explicit,
    ErrorCode.CONFIG.NO_VERSION,
    "A version must be set (unified service tagging)",
    "DD_VERSION",
  );
}

/**
 * Resolve client configuration, once, with priority:
 * 1. Options passed in code
 * 2. Environment variables (`DD_API_KEY`, `DD_SITE`, `DD_SERVICE`, ...)
 * 3. `.teleflushrc.json` config file (walked up from cwd)
 * 4. Defaults
 *
 * Throws a configuration error when the API key or any unified service tag
 * (service, env, version) is missing: unattributable telemetry is never sent.
 */
export function resolveConfig(options: TelemetryOptions = {}): TelemetryConfig {
  const file = findConfigFile(process.cwd());

  const apiKey = required(
    ApiKey,
    options.apiKey ?? readEnv("DD_API_KEY") ?? file?.apiKey,
    ErrorCode.CONFIG.NO_API_KEY,
    "An API key must be set",
    "DD_API_KEY",
  );

  const site = checked(
    Site,
    options.site ?? readEnv("DD_SITE") ?? file?.site ?? DEFAULT_SITE,
    "site",
  );

  const hostname = options.hostname ?? readEnv("DD_HOSTNAME") ?? file?.hostname ?? osHostname();

  const service = required(
    ServiceName,
    options.service ?? readEnv("DD_SERVICE") ?? file?.service,
    ErrorCode.CONFIG.NO_SERVICE,
    "A service name must be set (unified service tagging)",
    "DD_SERVICE",
  );

  const env = required(
    EnvName,
    options.env ?? readEnv("DD_ENV") ?? file?.env,
    ErrorCode.CONFIG.NO_ENV,
    "An env must be set (unified service tagging)",
    "DD_ENV",
  );

  const version = resolveVersion(options, file);

  const tracePatch =
    options.tracePatch ?? readEnvBoolean("DD_TRACE_PATCH") ?? file?.tracePatch ?? false;
  const traceModules = assertKnownIntegrations(
    options.traceModules ?? readEnvList("DD_TRACE_MODULES") ?? file?.traceModules ?? [
      ...KNOWN_INTEGRATIONS,
    ],
  );

  return {
    apiKey,
    site,
    hostname,
    service,
    env,
    version,
    tracePatch,
    traceModules,
    logsFlushIntervalMs: checked(
      PositiveInt,
      options.logsFlushIntervalMs ?? DEFAULT_LOGS_FLUSH_INTERVAL_MS,
      "logsFlushIntervalMs",
    ),
    metricsFlushIntervalMs:
      options.metricsFlushIntervalMs === undefined
        ? null
        : checked(PositiveInt, options.metricsFlushIntervalMs, "metricsFlushIntervalMs"),
    requestTimeoutMs: checked(
      PositiveInt,
      options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      "requestTimeoutMs",
    ),
    maxBufferSize: checked(
      PositiveInt,
      options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE,
      "maxBufferSize",
    ),
    shutdownTimeoutMs: checked(
      PositiveInt,
      options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
      "shutdownTimeoutMs",
    ),
  };
}
