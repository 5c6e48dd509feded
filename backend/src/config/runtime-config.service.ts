import { Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";
import { configDocumentSchema } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised");
    }
    this.document = config;
  }

  /** Copy of the active document; callers may mutate it freely. */
  getDocument(): ConfigDocument {
    return configDocumentSchema.parse(JSON.parse(JSON.stringify(this.document)));
  }

  getDocumentRef(): ConfigDocument {
    return this.document;
  }
}
