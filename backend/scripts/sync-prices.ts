import "reflect-metadata";

import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { describeError } from "@wattkeeper/domain";
import { ConfigFileService } from "../src/config/config-file.service";
import { RuntimeConfigModule } from "../src/config/runtime-config.module";
import { PriceSyncService } from "../src/pricing/price-sync.service";
import { WattkeeperServicesModule } from "../src/wattkeeper-services.module";

interface SyncArguments {
  force: boolean;
  regions: string[];
}

export function parseArguments(argv: readonly string[]): SyncArguments {
  const parsed: SyncArguments = {force: false, regions: []};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--force" || arg === "--refresh") {
      parsed.force = true;
    } else if (arg === "--region") {
      const value = argv[index + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--region needs a value");
      }
      parsed.regions.push(value.trim().toUpperCase());
      index += 1;
    } else {
      throw new Error(`Unknown argument '${arg}'. Usage: sync-prices [--force] [--region <code>]...`);
    }
  }
  return parsed;
}

async function main(): Promise<number> {
  const logger = new Logger("sync-prices");
  const args = parseArguments(process.argv.slice(2));

  const configFileService = new ConfigFileService();
  const document = await configFileService.loadDocument();

  const context = await NestFactory.createApplicationContext({
    module: WattkeeperServicesModule,
    imports: [RuntimeConfigModule.forRoot(document)],
  }, {
    logger: ["fatal", "error", "warn", "log"],
  });
  try {
    const result = await context.get(PriceSyncService).sync({
      force: args.force,
      regions: args.regions.length ? args.regions : undefined,
    });
    if (!result) {
      return 1;
    }
    for (const failure of result.errors) {
      logger.error(`${failure.region}/${failure.tier}: ${failure.message}`);
    }
    logger.log(
      `inserted=${result.inserted} updated=${result.updated} unchanged=${result.unchanged} ` +
      `skipped=${result.skipped} artifacts_skipped=${result.skipped_artifacts}`,
    );
    return result.success ? 0 : 1;
  } finally {
    await context.close();
  }
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      new Logger("sync-prices").error(describeError(error));
      process.exitCode = 2;
    });
}
