import "reflect-metadata";
import cors from "@fastify/cors";
import type { FastifyCorsOptions } from "@fastify/cors";
import { createTRPCClient, httpBatchLink, TRPCClientError } from "@trpc/client";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Test } from "@nestjs/testing";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { AppModule } from "../../src/app.module";
import type { AppRouter } from "../../src/trpc/trpc.router";
import { TrpcRouter } from "../../src/trpc/trpc.router";
import { buildConfig } from "../support/config";

describe("dashboard tRPC", () => {
  let app: NestFastifyApplication;
  let client: ReturnType<typeof createTRPCClient<AppRouter>>;

  beforeAll(async () => {
    const config = buildConfig({
      dry_run: true,
      devices: [{kind: "simulated", id: "kettle", name: "Kettle", initial_state: "on", power_w: 1800}],
    });

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule.forRoot(config)],
    })
      .compile();

    const adapter = new FastifyAdapter({logger: false, maxParamLength: 4096});
    app = moduleRef.createNestApplication<NestFastifyApplication>(adapter);
    const fastify: FastifyInstance = app.getHttpAdapter().getInstance();
    await fastify.register(cors, {origin: true} satisfies FastifyCorsOptions);
    const trpcRouter = app.get(TrpcRouter);
    await fastify.register(fastifyTRPCPlugin, {
      prefix: "/trpc",
      trpcOptions: {
        router: trpcRouter.router,
        createContext: () => ({}),
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>);
    await app.init();

    client = createTRPCClient<AppRouter>({
      links: [
        httpBatchLink({
          url: "/trpc",
          fetch: async (input, init) => {
            let requestUrl: string;
            if (typeof input === "string") {
              requestUrl = input;
            } else if (input instanceof URL) {
              requestUrl = input.toString();
            } else {
              requestUrl = input.url;
            }

            const headers: Record<string, string> = {};
            new Headers(init?.headers).forEach((value, key) => {
              headers[key] = value;
            });

            const response = await fastify.inject({
              method: init?.method === "GET" ? "GET" : "POST",
              url: requestUrl,
              payload: typeof init?.body === "string" ? init.body : undefined,
              headers,
            });

            const responseHeaders = new Headers();
            for (const [key, rawValue] of Object.entries(response.headers)) {
              if (rawValue === undefined) {
                continue;
              }
              responseHeaders.set(key, Array.isArray(rawValue) ? rawValue.join(",") : String(rawValue));
            }

            return new Response(response.payload, {
              status: response.statusCode,
              headers: responseHeaders,
            });
          },
        }),
      ],
    });
  });

  afterAll(async () => {
    await app.close();
  });

  test("lists configured devices before the first poll", async () => {
    const devices = await client.dashboard.devices.query();
    expect(devices.map((device) => [device.device_id, device.state])).toEqual([["kettle", "unknown"]]);
  });

  test("a manual tick records a sample and a projection", async () => {
    const report = await client.devices.tick.mutate();
    expect(report?.readings[0]).toMatchObject({device_id: "kettle", state: "on", power_w: 1800, online: true});

    const series = await client.dashboard.series.query({deviceId: "kettle"});
    expect(series.samples).toHaveLength(1);
    expect(series.samples[0]?.power_w).toBe(1800);

    const [forecast] = await client.dashboard.forecast.query({deviceId: "kettle"});
    expect(forecast?.forecast_w).toBe(1800);
    expect(forecast?.points).toHaveLength(60);
  });

  test("manual control switches the simulated device", async () => {
    const reading = await client.devices.control.mutate({deviceId: "kettle", action: "off"});
    expect(reading).toMatchObject({state: "off", power_w: 0, pending: false});
  });

  test("automation can be enabled per device", async () => {
    const view = await client.automation.enable.mutate({deviceId: "kettle"});
    expect(view.enabled).toBe(true);
    expect(view.phase).toBe("monitoring");

    const views = await client.automation.list.query();
    expect(views.map((entry) => [entry.device_id, entry.enabled])).toEqual([["kettle", true]]);
  });

  test("unknown devices map to NOT_FOUND", async () => {
    const failure = await client.automation.get.query({deviceId: "fridge"}).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(TRPCClientError);
    expect(failure).toMatchObject({data: {code: "NOT_FOUND"}});
  });

  test("invalid settings are rejected as BAD_REQUEST", async () => {
    const failure = await client.settings.update.mutate({region: "XX9"}).catch((error: unknown) => error);
    expect(failure).toMatchObject({data: {code: "BAD_REQUEST"}});

    const settings = await client.settings.get.query();
    expect(settings.region).toBe("VIC1");
  });

  test("effective price is empty without market data", async () => {
    const price = await client.prices.effective.query({timestamp: "2025-05-05T10:02:00Z"});
    expect(price).toEqual({region: "VIC1", timestamp: null, price: null, forecast_price: null});
  });
});
