import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";

import { ConfigurationError, describeError } from "@gridtwin/domain";
import type { ConfigDocument } from "./schemas";
import { parseConfigDocument } from "./schemas";

const DEFAULT_CONFIG_FILE = "config.json";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.GRIDTWIN_CONFIG_PATH?.trim();
    return override && override.length > 0
      ? resolve(process.cwd(), override)
      : resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  }

  async loadDocument(path: string = this.resolvePath()): Promise<ConfigDocument> {
    this.logger.verbose(`Reading configuration from ${path}`);
    let contents: string;
    try {
      contents = await readFile(path, "utf-8");
    } catch (error) {
      throw new ConfigurationError(`Cannot read configuration file ${path}: ${describeError(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      throw new ConfigurationError(`Configuration file ${path} is not valid JSON: ${describeError(error)}`);
    }
    return parseConfigDocument(raw);
  }
}
