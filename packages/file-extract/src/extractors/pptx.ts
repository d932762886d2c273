import path from "node:path";
import AdmZip from "adm-zip";
import { AppError, MIME_TYPES, type OutputFormat, UnprocessableDocumentError } from "@slidetext/utils";
import {
  elementName,
  findElements,
  innerText,
  paragraphs,
  readAttributes,
  removeElements,
} from "../ooxml.js";
import type { ExtractOptions, ExtractResult, Extractor } from "../types.js";

const PRESENTATION_PART = "ppt/presentation.xml";
const PRESENTATION_RELS_PART = "ppt/_rels/presentation.xml.rels";
const CORE_PROPERTIES_PART = "docProps/core.xml";

type SlideBlock = { kind: "text"; paragraphs: string[] } | { kind: "table"; rows: string[][] };

interface Slide {
  index: number;
  blocks: SlideBlock[];
}

function readPart(zip: AdmZip, name: string): string | null {
  const entry = zip.getEntry(name);
  return entry ? entry.getData().toString("utf-8") : null;
}

function requirePart(zip: AdmZip, name: string): string {
  const xml = readPart(zip, name);
  if (xml === null) {
    throw new UnprocessableDocumentError(`Could not read presentation: missing part ${name}`);
  }
  return xml;
}

/** Resolves slide part names in presentation order (`p:sldIdLst`). */
function slidePartNames(zip: AdmZip): string[] {
  const presentation = requirePart(zip, PRESENTATION_PART);
  const rels = requirePart(zip, PRESENTATION_RELS_PART);

  const targets = new Map<string, string>();
  for (const rel of findElements(rels, "Relationship")) {
    const { Id, Target, TargetMode } = readAttributes(rel);
    if (!Id || !Target || TargetMode === "External") continue;
    const resolved = Target.startsWith("/")
      ? Target.slice(1)
      : path.posix.normalize(path.posix.join(path.posix.dirname(PRESENTATION_PART), Target));
    targets.set(Id, resolved);
  }

  return findElements(presentation, "p:sldId").map((sldId) => {
    const relId = readAttributes(sldId)["r:id"] ?? "";
    const target = targets.get(relId);
    if (!target) {
      throw new UnprocessableDocumentError(
        `Could not read presentation: slide relationship "${relId}" not found`,
      );
    }
    return target;
  });
}

function readSlide(xml: string, index: number): Slide {
  const blocks: SlideBlock[] = [];
  // mc:AlternateContent repeats its shapes in mc:Fallback for older readers; read mc:Choice only.
  const shapes = findElements(removeElements(xml, "mc:Fallback"), ["p:sp", "p:graphicFrame"]);
  for (const shape of shapes) {
    if (elementName(shape) === "p:sp") {
      const [body] = findElements(shape, "p:txBody");
      if (body) blocks.push({ kind: "text", paragraphs: paragraphs(body) });
      continue;
    }
    for (const table of findElements(shape, "a:tbl")) {
      const rows = findElements(table, "a:tr").map((row) =>
        findElements(row, "a:tc").map((cell) => paragraphs(cell).join("\n").trim()),
      );
      blocks.push({ kind: "table", rows });
    }
  }
  return { index, blocks };
}

function tableLines(rows: string[][]): string[] {
  return rows.map((cells) => cells.filter((cell) => cell.length > 0).join(" | ")).filter(Boolean);
}

function slideText(slide: Slide): string {
  return slide.blocks
    .map((block) =>
      block.kind === "text" ? block.paragraphs.join("\n") : tableLines(block.rows).join("\n"),
    )
    .filter((text) => text.trim().length > 0)
    .join("\n");
}

function slideMarkdownLines(slide: Slide): string[] {
  return slide.blocks.flatMap((block) =>
    block.kind === "text"
      ? block.paragraphs.map((p) => p.trim()).filter(Boolean)
      : tableLines(block.rows),
  );
}

function render(slides: Slide[], format: OutputFormat): Pick<ExtractResult, "text" | "sections"> {
  if (format === "text") {
    const sections = slides.map((slide) => ({ index: slide.index, text: slideText(slide) }));
    const text = sections
      .map((s) => s.text)
      .filter((t) => t.length > 0)
      .join("\n");
    return { text, sections };
  }

  const sections = slides.map((slide) => ({
    index: slide.index,
    text: slideMarkdownLines(slide).join("\n"),
  }));
  // Headings number only the slides that carry text.
  const text = sections
    .filter((s) => s.text.length > 0)
    .map((s, i) => `## Slide ${i + 1}\n\n${s.text}`)
    .join("\n\n");
  return { text, sections };
}

export class PptxExtractor implements Extractor {
  readonly extensions = ["pptx", "ppsx"] as const;

  canHandle(mime: string, ext: string): boolean {
    return mime === MIME_TYPES.pptx || mime === MIME_TYPES.ppsx || this.extensions.some((e) => e === ext);
  }

  async extract(buffer: Buffer, options: ExtractOptions): Promise<ExtractResult> {
    try {
      const zip = new AdmZip(buffer);
      const slides = slidePartNames(zip).map((part, i) => readSlide(requirePart(zip, part), i + 1));

      const core = readPart(zip, CORE_PROPERTIES_PART);
      const [titleElement] = core ? findElements(core, "dc:title") : [];
      const title = titleElement ? innerText(titleElement).trim() : "";

      return {
        ...render(slides, options.format),
        metadata: {
          format: "pptx",
          sectionCount: slides.length,
          ...(title ? { title } : {}),
        },
      };
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new UnprocessableDocumentError(
        `Could not read presentation: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
