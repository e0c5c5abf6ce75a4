import { DynamicModule, Global, Module } from "@nestjs/common";

import { RUNTIME_CONFIG, RuntimeConfigService } from "./runtime-config.service";
import type { ConfigDocument } from "./schemas";

@Global()
@Module({})
export class RuntimeConfigModule {
  static forRoot(document: ConfigDocument): DynamicModule {
    return {
      module: RuntimeConfigModule,
      providers: [{provide: RUNTIME_CONFIG, useValue: document}, RuntimeConfigService],
      exports: [RuntimeConfigService],
    };
  }
}
