import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { StorageModule } from "../storage/storage.module";
import { WattkeeperServicesModule } from "../wattkeeper-services.module";

@Module({
  imports: [StorageModule, WattkeeperServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
