import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { ConfigurationError, describeError } from "@wattkeeper/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import type { ConfigDocument } from "./config/schemas";
import { ControlLoopService } from "./control/control-loop.service";
import { PriceSyncService } from "./pricing/price-sync.service";
import type { AppRouter } from "./trpc/trpc.router";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  validateConfigDocument(initialConfig);
  const adapter = new FastifyAdapter({logger: false, maxParamLength: 4096});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule.forRoot(initialConfig), adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify: FastifyInstance = app.getHttpAdapter().getInstance();
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({}),
      onError: ({path, error}) => {
        if (error.code === "INTERNAL_SERVER_ERROR") {
          new Logger("trpc").error(`${path ?? "<unknown>"} failed: ${describeError(error.cause ?? error)}`);
        }
      },
    },
  } satisfies FastifyTRPCPluginOptions<AppRouter>);

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    app.get(ControlLoopService).start();
    app.get(PriceSyncService).start();

    const logger = new Logger("wattkeeper");
    const address = fastify.server.address();
    const baseUrl = isAddressInfo(address)
      ? `http://${address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address}:${address.port}`
      : address ?? `http://localhost:${port}`;
    logger.log(`API ready at ${baseUrl}`);
    if (initialConfig.dry_run) {
      logger.warn("dry_run enabled: automation commands are logged, not sent to devices");
    }

    const routesTree = fastify.printRoutes({includeHooks: false, includeMeta: false, commonPrefix: false});
    if (routesTree.trim().length > 0) {
      logger.log(`Routes:\n${routesTree}`);
    }
  }

  return app;
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[] = ["fatal", "error", "warn", "log"];
  let normalizedLevel = "info";
  let document: ConfigDocument;

  try {
    const configPath = configFileService.resolvePath();
    document = await configFileService.loadDocument(configPath);

    const rawLevel = document.logging.level;
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

function validateConfigDocument(document: ConfigDocument): void {
  const bootstrapLogger = new Logger("bootstrap");
  const pricing = document.pricing;

  if (!pricing.regions.includes(pricing.region)) {
    throw new ConfigurationError(
      `pricing.region '${pricing.region}' must be one of ${pricing.regions.join(", ")}`,
      "pricing.region",
    );
  }

  const enabledFeeds = pricing.feeds.filter((feed) => feed.enabled);
  if (pricing.mode === "market" && enabledFeeds.length === 0) {
    bootstrapLogger.warn("pricing.mode is market but no feed is enabled; every bucket will use the flat tariff");
  }

  const tiers = new Map<string, number>();
  for (const feed of enabledFeeds) {
    tiers.set(feed.tier, (tiers.get(feed.tier) ?? 0) + 1);
  }
  for (const [tier, count] of tiers.entries()) {
    if (count > 1) {
      throw new ConfigurationError(`Duplicate enabled price feeds for tier ${tier}`, "pricing.feeds");
    }
  }

  if (!document.devices.length) {
    bootstrapLogger.warn("No devices configured; the control loop will idle.");
  }

  bootstrapLogger.verbose("Configuration validation successful.");
}

const LEVEL_ORDER: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];
const LEVEL_NAMES: Readonly<Partial<Record<string, LogLevel>>> = {
  fatal: "fatal",
  error: "error",
  warn: "warn",
  warning: "warn",
  info: "log",
  log: "log",
  debug: "debug",
  verbose: "verbose",
};

/** Maps `logging.level` to the Nest levels at or above it; unknown names fall back to info. */
function resolveLogLevels(level: unknown): { levels: LogLevel[]; normalized: string; fallbackUsed: boolean } {
  const key = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const minimum = LEVEL_NAMES[key];
  const cutoff = LEVEL_ORDER.indexOf(minimum ?? "log");
  return {
    levels: LEVEL_ORDER.slice(0, cutoff + 1),
    normalized: minimum === "log" || minimum === undefined ? "info" : minimum,
    fallbackUsed: minimum === undefined,
  };
}

if (process.env.NODE_ENV !== "test") {
  void bootstrap();
}

export { bootstrap, resolveLogLevels, validateConfigDocument };
