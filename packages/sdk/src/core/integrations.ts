import { ErrorCode, TeleflushError } from "@teleflush/shared/errors";

/** Integrations the tracer knows how to instrument. */
export const KNOWN_INTEGRATIONS = [
  "amqplib",
  "aws-sdk",
  "dns",
  "elasticsearch",
  "express",
  "fastify",
  "fetch",
  "graphql",
  "grpc",
  "hapi",
  "http",
  "ioredis",
  "kafkajs",
  "koa",
  "mongodb",
  "mongoose",
  "mysql",
  "mysql2",
  "net",
  "pg",
  "redis",
] as const;

export type IntegrationName = (typeof KNOWN_INTEGRATIONS)[number];

const known = new Set<string>(KNOWN_INTEGRATIONS);

export function isKnownIntegration(name: string): name is IntegrationName {
  return known.has(name);
}

/** Throw a configuration error naming every unrecognised integration. */
export function assertKnownIntegrations(names: readonly string[]): IntegrationName[] {
  const unknown = names.filter((name) => !isKnownIntegration(name));
  if (unknown.length > 0) {
    throw new TeleflushError(
      ErrorCode.CONFIG.UNKNOWN_INTEGRATION,
      `Unknown integration(s): ${unknown.join(", ")}`,
      400,
      { names: unknown },
    );
  }
  return names.filter(isKnownIntegration);
}
