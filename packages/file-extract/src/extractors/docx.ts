import mammoth from "mammoth";
import { MIME_TYPES, UnprocessableDocumentError } from "@slidetext/utils";
import type { ExtractOptions, ExtractResult, Extractor } from "../types.js";

export class DocxExtractor implements Extractor {
  readonly extensions = ["docx"] as const;

  canHandle(mime: string, ext: string): boolean {
    return mime === MIME_TYPES.docx || ext === "docx";
  }

  // Word documents have no slide structure, so both formats yield the raw text.
  async extract(buffer: Buffer, _options: ExtractOptions): Promise<ExtractResult> {
    let result: Awaited<ReturnType<typeof mammoth.extractRawText>>;
    try {
      result = await mammoth.extractRawText({ buffer });
    } catch (err) {
      throw new UnprocessableDocumentError(
        `Could not read document: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const text = result.value.normalize("NFC").trimEnd();
    const warnings = result.messages.filter((m) => m.type === "warning").map((m) => m.message);

    return {
      text,
      sections: [{ index: 1, text }],
      metadata: {
        format: "docx",
        sectionCount: 1,
        ...(warnings.length > 0 ? { warnings } : {}),
      },
    };
  }
}
