import { Module } from "@nestjs/common";

import { AutomationController } from "./automation/automation.controller";
import { CLOCK, SystemClock } from "./clock/clock";
import { ConfigFileService } from "./config/config-file.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { SettingsService } from "./config/settings.service";
import { ControlLoopService } from "./control/control-loop.service";
import { CostProjector } from "./cost/cost.projector";
import { CostService } from "./cost/cost.service";
import { createDeviceAdapters } from "./devices/adapters";
import { DEVICE_CAPABILITIES } from "./devices/device-capability";
import { DeviceRegistryService } from "./devices/device-registry.service";
import { ForecastEngine } from "./forecast/forecast.engine";
import { createPriceFeedProviders } from "./pricing/feeds";
import { PRICE_FEED_PROVIDERS } from "./pricing/feeds/feed.types";
import { PriceMergeStore } from "./pricing/price-merge.store";
import { PriceSyncService } from "./pricing/price-sync.service";
import { StorageModule } from "./storage/storage.module";
import { TimeseriesStore } from "./telemetry/timeseries.store";

/** Expects a global `RuntimeConfigModule` in the importing application. */
@Module({
  imports: [StorageModule],
  providers: [
    {provide: CLOCK, useClass: SystemClock},
    {
      provide: DEVICE_CAPABILITIES,
      useFactory: (configState: RuntimeConfigService) => createDeviceAdapters(configState.getDocumentRef()),
      inject: [RuntimeConfigService],
    },
    {
      provide: PRICE_FEED_PROVIDERS,
      useFactory: (configState: RuntimeConfigService) => createPriceFeedProviders(configState.getDocumentRef()),
      inject: [RuntimeConfigService],
    },
    {
      provide: TimeseriesStore,
      useFactory: (configState: RuntimeConfigService) =>
        new TimeseriesStore(configState.getDocumentRef().telemetry.max_points),
      inject: [RuntimeConfigService],
    },
    ConfigFileService,
    SettingsService,
    DeviceRegistryService,
    ForecastEngine,
    CostProjector,
    CostService,
    PriceMergeStore,
    PriceSyncService,
    AutomationController,
    ControlLoopService,
  ],
  exports: [
    CLOCK,
    TimeseriesStore,
    ConfigFileService,
    SettingsService,
    DeviceRegistryService,
    ForecastEngine,
    CostProjector,
    CostService,
    PriceMergeStore,
    PriceSyncService,
    AutomationController,
    ControlLoopService,
  ],
})
export class WattkeeperServicesModule {}
