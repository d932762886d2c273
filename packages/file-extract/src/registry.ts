import type { OutputFormat } from "@slidetext/utils";
import type { OfficeConverter } from "./converter.js";
import { ConvertedExtractor, LEGACY_PRESENTATION_EXTS, LEGACY_TEXT_EXTS } from "./extractors/converted.js";
import { DocxExtractor } from "./extractors/docx.js";
import { PptxExtractor } from "./extractors/pptx.js";
import type { ExtractResult, Extractor } from "./types.js";

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf(".");
  if (dot < 0 || dot === filename.length - 1) return "";
  return filename.slice(dot + 1).toLowerCase();
}

export class ExtractorRegistry {
  private extractors: Extractor[] = [];

  register(extractor: Extractor): void {
    this.extractors.push(extractor);
  }

  async extract(
    buffer: Buffer,
    mime: string,
    filename: string,
    format: OutputFormat = "text",
  ): Promise<ExtractResult> {
    const ext = fileExtension(filename);
    const extractor = this.extractors.find((e) => e.canHandle(mime, ext));
    if (!extractor) {
      throw new Error(`No extractor found for mime="${mime}" ext="${ext}"`);
    }
    return extractor.extract(buffer, { mime, ext, format });
  }

  canExtract(mime: string, filename: string): boolean {
    const ext = fileExtension(filename);
    return this.extractors.some((e) => e.canHandle(mime, ext));
  }

  supportedExtensions(): string[] {
    return [...new Set(this.extractors.flatMap((e) => e.extensions))];
  }
}

export interface DefaultRegistryOptions {
  /** Enables legacy formats (ppt, odp, doc, ...) through LibreOffice. */
  converter?: OfficeConverter;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  const pptx = new PptxExtractor();
  const docx = new DocxExtractor();
  registry.register(pptx);
  registry.register(docx);
  if (options.converter) {
    registry.register(new ConvertedExtractor(options.converter, LEGACY_PRESENTATION_EXTS, "pptx", pptx));
    registry.register(new ConvertedExtractor(options.converter, LEGACY_TEXT_EXTS, "docx", docx));
  }
  return registry;
}
