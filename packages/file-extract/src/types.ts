import type { ExtractMetadata, ExtractSection, OutputFormat } from "@slidetext/utils";

export interface ExtractResult {
  text: string;
  sections: ExtractSection[];
  metadata: ExtractMetadata;
}

export interface ExtractOptions {
  mime: string;
  /** Lower-cased filename extension, without the dot. */
  ext: string;
  format: OutputFormat;
}

export interface Extractor {
  /** Extensions this extractor accepts, used to describe supported types. */
  readonly extensions: readonly string[];
  canHandle(mime: string, ext: string): boolean;
  extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractResult>;
}
