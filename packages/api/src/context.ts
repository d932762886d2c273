import { type ExtractorRegistry, OfficeConverter, createDefaultRegistry } from "@slidetext/file-extract";
import type { AppConfig } from "./config.js";

export interface ApiContext {
  registry: ExtractorRegistry;
  maxUploadBytes: number;
}

export function createContext(config: AppConfig): ApiContext {
  const converter = config.converter.enabled
    ? new OfficeConverter({
        binary: config.converter.binary,
        timeoutMs: config.converter.timeoutMs,
        tmpDir: config.tmpDir,
      })
    : undefined;

  return {
    registry: createDefaultRegistry({ converter }),
    maxUploadBytes: config.maxUploadBytes,
  };
}
