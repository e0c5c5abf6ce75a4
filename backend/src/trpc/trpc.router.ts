import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import {
  CapabilityFailureError,
  ConfigurationError,
  describeError,
  MalformedFeedError,
  TransientIoError,
  UnknownDeviceError,
} from "@wattkeeper/domain";
import { AutomationController } from "../automation/automation.controller";
import { CLOCK } from "../clock/clock";
import type { Clock } from "../clock/clock";
import { SettingsService } from "../config/settings.service";
import { ControlLoopService } from "../control/control-loop.service";
import { CostService } from "../cost/cost.service";
import { DeviceRegistryService } from "../devices/device-registry.service";
import { ForecastEngine } from "../forecast/forecast.engine";
import { PriceMergeStore } from "../pricing/price-merge.store";
import { PriceSyncService } from "../pricing/price-sync.service";
import { StorageService } from "../storage/storage.service";
import { TimeseriesStore } from "../telemetry/timeseries.store";

export type TrpcContext = Record<string, never>;

export interface RouterDependencies {
  devices: DeviceRegistryService;
  timeseries: TimeseriesStore;
  forecastEngine: ForecastEngine;
  controlLoop: ControlLoopService;
  cost: CostService;
  automation: AutomationController;
  prices: PriceMergeStore;
  priceSync: PriceSyncService;
  settings: SettingsService;
  storage: StorageService;
  clock: Clock;
}

const HOUR_MS = 3_600_000;

const deviceInput = z.object({deviceId: z.string().trim().min(1)});
const timestampInput = z.union([z.string().datetime({offset: true}), z.number().finite()]);

function toTrpcError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  const message = describeError(error);
  if (error instanceof UnknownDeviceError) {
    return new TRPCError({code: "NOT_FOUND", message, cause: error});
  }
  if (error instanceof ConfigurationError || error instanceof MalformedFeedError) {
    return new TRPCError({code: "BAD_REQUEST", message, cause: error});
  }
  if (error instanceof CapabilityFailureError || error instanceof TransientIoError) {
    return new TRPCError({code: "SERVICE_UNAVAILABLE", message, cause: error});
  }
  return new TRPCError({code: "INTERNAL_SERVER_ERROR", message, cause: error});
}

async function guard<T>(work: () => T | Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    throw toTrpcError(error);
  }
}

function toInstant(value: string | number): Date {
  return new Date(value);
}

export function createAppRouter(deps: RouterDependencies) {
  const t = initTRPC.context<TrpcContext>().create();

  const projectionFor = (deviceId: string) => {
    deps.devices.get(deviceId);
    return deps.controlLoop.getForecast(deviceId)
      ?? deps.forecastEngine.project(deviceId, deps.timeseries.query(deviceId), deps.clock.now());
  };

  const dashboardRouter = t.router({
    devices: t.procedure.query(() => deps.devices.list()),
    series: t.procedure
      .input(deviceInput.extend({since: timestampInput.optional()}))
      .query(({input}) => guard(() => {
        const reading = deps.devices.get(input.deviceId);
        const since = input.since === undefined ? undefined : toInstant(input.since);
        return deps.timeseries.getSeries(input.deviceId, since)
          ?? {device_id: input.deviceId, name: reading.name, samples: []};
      })),
    forecast: t.procedure
      .input(z.object({deviceId: z.string().trim().min(1).optional()}).optional())
      .query(({input}) => guard(() => {
        const deviceIds = input?.deviceId ? [input.deviceId] : deps.devices.ids();
        return deviceIds.map(projectionFor);
      })),
    cost: t.procedure
      .input(z.object({deviceIds: z.array(z.string().trim().min(1)).optional()}).optional())
      .query(({input}) => guard(() => {
        const deviceIds = input?.deviceIds;
        deviceIds?.forEach((deviceId) => deps.devices.get(deviceId));
        return deps.cost.summarize({deviceIds});
      })),
    usage: t.procedure
      .input(deviceInput.extend({limit: z.number().int().positive().max(2880).optional()}))
      .query(({input}) => guard(() => {
        deps.devices.get(input.deviceId);
        return deps.storage.listUsageRecords(input.deviceId, input.limit);
      })),
  });

  const devicesRouter = t.router({
    control: t.procedure
      .input(deviceInput.extend({action: z.enum(["on", "off", "toggle"])}))
      .mutation(({input}) => guard(() => deps.devices.control(input.deviceId, input.action))),
    tick: t.procedure.mutation(() => guard(() => deps.controlLoop.tick())),
  });

  const automationRouter = t.router({
    list: t.procedure.query(() => deps.automation.list()),
    get: t.procedure.input(deviceInput).query(({input}) => guard(() => deps.automation.view(input.deviceId))),
    enable: t.procedure.input(deviceInput).mutation(({input}) => guard(() => deps.automation.enable(input.deviceId))),
    disable: t.procedure.input(deviceInput).mutation(({input}) => guard(() => deps.automation.disable(input.deviceId))),
    setRestartTime: t.procedure
      .input(deviceInput.extend({restartTime: z.string()}))
      .mutation(({input}) => guard(() => deps.automation.setRestartTime(input.deviceId, input.restartTime))),
    reset: t.procedure.input(deviceInput).mutation(({input}) => guard(() => deps.automation.reset(input.deviceId))),
  });

  const pricesRouter = t.router({
    effective: t.procedure
      .input(z.object({region: z.string().trim().min(1).optional(), timestamp: timestampInput.optional()}).optional())
      .query(({input}) => guard(() => {
        const region = input?.region ?? deps.settings.get().region;
        const at = input?.timestamp === undefined ? deps.clock.now() : toInstant(input.timestamp);
        const record = deps.prices.getRecord(region, at);
        return {
          region,
          timestamp: record?.timestamp ?? null,
          price: record?.effective_price ?? null,
          forecast_price: record?.forecast_price ?? null,
        };
      })),
    list: t.procedure
      .input(z.object({
        region: z.string().trim().min(1).optional(),
        from: timestampInput.optional(),
        to: timestampInput.optional(),
      }).optional())
      .query(({input}) => guard(() => {
        const now = deps.clock.now().getTime();
        const region = input?.region ?? deps.settings.get().region;
        const from = input?.from === undefined ? now - 2 * HOUR_MS : toInstant(input.from).getTime();
        const to = input?.to === undefined ? now + 24 * HOUR_MS : toInstant(input.to).getTime();
        return deps.prices.list(region, from, to);
      })),
    sync: t.procedure
      .input(z.object({force: z.boolean().optional(), regions: z.array(z.string().trim().min(1)).optional()}).optional())
      .mutation(({input}) => guard(async () => {
        const result = await deps.priceSync.sync({force: input?.force, regions: input?.regions});
        if (!result) {
          throw new TRPCError({code: "CONFLICT", message: "Price sync already running"});
        }
        return result;
      })),
    sweep: t.procedure.mutation(() => guard(() => deps.prices.retentionSweep(deps.clock.now()))),
    status: t.procedure.query(() => deps.priceSync.getLastResult()),
  });

  const settingsRouter = t.router({
    get: t.procedure.query(() => deps.settings.get()),
    update: t.procedure
      .input(z.record(z.unknown()))
      .mutation(({input}) => guard(() => deps.settings.update(input))),
    reset: t.procedure.mutation(() => deps.settings.reset()),
  });

  return t.router({
    dashboard: dashboardRouter,
    devices: devicesRouter,
    automation: automationRouter,
    prices: pricesRouter,
    settings: settingsRouter,
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter;

  constructor(
    @Inject(DeviceRegistryService) devices: DeviceRegistryService,
    @Inject(TimeseriesStore) timeseries: TimeseriesStore,
    @Inject(ForecastEngine) forecastEngine: ForecastEngine,
    @Inject(ControlLoopService) controlLoop: ControlLoopService,
    @Inject(CostService) cost: CostService,
    @Inject(AutomationController) automation: AutomationController,
    @Inject(PriceMergeStore) prices: PriceMergeStore,
    @Inject(PriceSyncService) priceSync: PriceSyncService,
    @Inject(SettingsService) settings: SettingsService,
    @Inject(StorageService) storage: StorageService,
    @Inject(CLOCK) clock: Clock,
  ) {
    this.router = createAppRouter({
      devices,
      timeseries,
      forecastEngine,
      controlLoop,
      cost,
      automation,
      prices,
      priceSync,
      settings,
      storage,
      clock,
    });
  }
}
