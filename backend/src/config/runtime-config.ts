import type { ConfigDocument } from "./schemas";

let runtimeConfig: ConfigDocument | null = null;

export function setRuntimeConfig(document: ConfigDocument | null): void {
  runtimeConfig = document;
}

export function getRuntimeConfig(): ConfigDocument | null {
  return runtimeConfig;
}
