import { constants as fsConstants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import YAML from "yaml";

import { ConfigurationError, describeError } from "@wattkeeper/domain";
import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

const DEFAULT_CONFIG_FILE = "../config.local.yaml";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.WATTKEEPER_CONFIG;
    if (override && override.trim().length > 0) {
      return resolve(process.cwd(), override.trim());
    }
    return resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  }

  async loadDocument(path: string = this.resolvePath()): Promise<ConfigDocument> {
    try {
      await access(path, fsConstants.R_OK);
    } catch (error) {
      throw new ConfigurationError(`Config file not accessible at ${path}: ${describeError(error)}`);
    }

    const rawContent = await readFile(path, "utf-8");
    const document = this.parseContent(rawContent);
    this.logger.log(`Loaded configuration from ${path}`);
    return document;
  }

  parseContent(rawContent: string): ConfigDocument {
    let parsed: unknown;
    try {
      parsed = YAML.parse(rawContent);
    } catch (error) {
      throw new ConfigurationError(`Config file is not valid YAML: ${describeError(error)}`);
    }
    if (parsed !== null && parsed !== undefined && typeof parsed !== "object") {
      throw new ConfigurationError("Config file must contain a YAML mapping");
    }
    return parseConfigDocument(parsed);
  }
}
