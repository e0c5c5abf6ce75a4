import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { RuntimeConfigModule } from "./config/runtime-config.module";
import type { ConfigDocument } from "./config/schemas";
import { WattkeeperServicesModule } from "./wattkeeper-services.module";
import { StorageModule } from "./storage/storage.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({})
export class AppModule {
  static forRoot(document: ConfigDocument): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: [".env", "../.env", "../../.env"],
          cache: true,
        }),
        RuntimeConfigModule.forRoot(document),
        StorageModule,
        WattkeeperServicesModule,
        TrpcModule,
      ],
    };
  }
}
