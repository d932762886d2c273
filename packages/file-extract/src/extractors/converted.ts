import { MIME_TYPES } from "@slidetext/utils";
import type { OfficeConverter } from "../converter.js";
import type { ExtractOptions, ExtractResult, Extractor } from "../types.js";

export const LEGACY_PRESENTATION_EXTS = ["ppt", "pps", "pot", "odp"] as const;
export const LEGACY_TEXT_EXTS = ["doc", "odt", "rtf"] as const;

const LEGACY_MIMES: Record<string, string> = {
  [MIME_TYPES.ppt]: "ppt",
  [MIME_TYPES.odp]: "odp",
  [MIME_TYPES.doc]: "doc",
  [MIME_TYPES.odt]: "odt",
  [MIME_TYPES.rtf]: "rtf",
  "text/rtf": "rtf",
};

/**
 * Handles formats the native extractors cannot read by first converting
 * them with LibreOffice into a format `target` can.
 */
export class ConvertedExtractor implements Extractor {
  constructor(
    private readonly converter: OfficeConverter,
    readonly extensions: readonly string[],
    private readonly targetExt: string,
    private readonly target: Extractor,
  ) {}

  private sourceExt(mime: string, ext: string): string | null {
    if (this.extensions.includes(ext)) return ext;
    const fromMime = LEGACY_MIMES[mime];
    return fromMime && this.extensions.includes(fromMime) ? fromMime : null;
  }

  canHandle(mime: string, ext: string): boolean {
    return this.sourceExt(mime, ext) !== null;
  }

  async extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractResult> {
    const source = this.sourceExt(options.mime, options.ext) ?? options.ext;
    const converted = await this.converter.convert(buffer, source, this.targetExt);
    const result = await this.target.extract(converted, { ...options, ext: this.targetExt });
    return {
      ...result,
      metadata: { ...result.metadata, convertedFrom: source },
    };
  }
}
