import AdmZip from "adm-zip";

/**
 * In-memory OOXML packages for tests. Only the parts the extractors read
 * are written, plus content types so the files open in an office suite.
 */

const NS_A = "http://schemas.openxmlformats.org/drawingml/2006/main";
const NS_P = "http://schemas.openxmlformats.org/presentationml/2006/main";
const NS_R = "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
const NS_MC = "http://schemas.openxmlformats.org/markup-compatibility/2006";
const NS_A14 = "http://schemas.microsoft.com/office/drawing/2010/main";
const NS_RELS = "http://schemas.openxmlformats.org/package/2006/relationships";
const REL_SLIDE = `${NS_R}/slide`;

/**
 * A text box (one string per paragraph; `\n` becomes a line break), a table,
 * a picture, or a text box wrapped in `mc:AlternateContent` with the same
 * shape repeated in its fallback.
 */
export type FixtureShape = string[] | { table: string[][] } | { alternate: string[] } | "picture";

export interface FixtureSlide {
  shapes: FixtureShape[];
}

export interface PptxFixtureOptions {
  title?: string;
  /** Store slide N as the (count - N + 1)th slide part, so part names disagree with deck order. */
  reversedParts?: boolean;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function drawingParagraph(text: string): string {
  if (text === "") return "<a:p/>";
  const runs = text
    .split("\n")
    .map((line) => `<a:r><a:rPr lang="en-US" dirty="0"/><a:t>${escapeXml(line)}</a:t></a:r>`)
    .join("<a:br/>");
  return `<a:p>${runs}</a:p>`;
}

function textBody(paragraphs: string[]): string {
  return `<p:txBody><a:bodyPr/><a:lstStyle/>${paragraphs.map(drawingParagraph).join("")}</p:txBody>`;
}

function textBoxXml(paragraphs: string[], id: number): string {
  return `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="TextBox ${id}"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr><p:spPr/>${textBody(paragraphs)}</p:sp>`;
}

function shapeXml(shape: FixtureShape, id: number): string {
  if (shape === "picture") {
    return `<p:pic><p:nvPicPr><p:cNvPr id="${id}" name="Picture ${id}"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr><p:blipFill/><p:spPr/></p:pic>`;
  }
  if (Array.isArray(shape)) {
    return textBoxXml(shape, id);
  }
  if ("alternate" in shape) {
    const box = textBoxXml(shape.alternate, id);
    return `<mc:AlternateContent xmlns:mc="${NS_MC}"><mc:Choice xmlns:a14="${NS_A14}" Requires="a14">${box}</mc:Choice><mc:Fallback>${box}</mc:Fallback></mc:AlternateContent>`;
  }
  const cols = shape.table[0]?.length ?? 0;
  const grid = Array.from({ length: cols }, () => '<a:gridCol w="914400"/>').join("");
  const rows = shape.table
    .map(
      (row) =>
        `<a:tr h="370840">${row
          .map((cell) => `<a:tc><a:txBody><a:bodyPr/><a:lstStyle/>${drawingParagraph(cell)}</a:txBody><a:tcPr/></a:tc>`)
          .join("")}</a:tr>`,
    )
    .join("");
  return `<p:graphicFrame><p:nvGraphicFramePr><p:cNvPr id="${id}" name="Table ${id}"/><p:cNvGraphicFramePr/><p:nvPr/></p:nvGraphicFramePr><p:xfrm/><a:graphic><a:graphicData uri="http://schemas.openxmlformats.org/drawingml/2006/table"><a:tbl><a:tblPr firstRow="1"/><a:tblGrid>${grid}</a:tblGrid>${rows}</a:tbl></a:graphicData></a:graphic></p:graphicFrame>`;
}

function slideXml(slide: FixtureSlide): string {
  const shapes = slide.shapes.map((shape, i) => shapeXml(shape, i + 2)).join("");
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<p:sld xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}"><p:cSld><p:spTree><p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>${shapes}</p:spTree></p:cSld></p:sld>`;
}

export function buildPptx(slides: FixtureSlide[], options: PptxFixtureOptions = {}): Buffer {
  const zip = new AdmZip();
  const partNumber = (i: number) => (options.reversedParts ? slides.length - i : i + 1);

  const overrides = slides
    .map(
      (_, i) =>
        `<Override PartName="/ppt/slides/slide${partNumber(i)}.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slide+xml"/>`,
    )
    .join("");
  zip.addFile(
    "[Content_Types].xml",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/>${overrides}</Types>`,
      "utf-8",
    ),
  );

  const sldIds = slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 10}"/>`).join("");
  zip.addFile(
    "ppt/presentation.xml",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<p:presentation xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}"><p:sldIdLst>${sldIds}</p:sldIdLst><p:sldSz cx="12192000" cy="6858000"/></p:presentation>`,
      "utf-8",
    ),
  );

  const rels = slides
    .map(
      (_, i) =>
        `<Relationship Id="rId${i + 10}" Type="${REL_SLIDE}" Target="slides/slide${partNumber(i)}.xml"/>`,
    )
    .join("");
  zip.addFile(
    "ppt/_rels/presentation.xml.rels",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="${NS_RELS}">${rels}</Relationships>`,
      "utf-8",
    ),
  );

  slides.forEach((slide, i) => {
    zip.addFile(`ppt/slides/slide${partNumber(i)}.xml`, Buffer.from(slideXml(slide), "utf-8"));
  });

  if (options.title !== undefined) {
    zip.addFile(
      "docProps/core.xml",
      Buffer.from(
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<cp:coreProperties xmlns:cp="http://schemas.openxmlformats.org/package/2006/metadata/core-properties" xmlns:dc="http://purl.org/dc/elements/1.1/"><dc:title>${escapeXml(options.title)}</dc:title></cp:coreProperties>`,
        "utf-8",
      ),
    );
  }

  return zip.toBuffer();
}

export interface DocxFixtureOptions {
  /** Raw `<w:p>` elements appended after the plain paragraphs. */
  rawParagraphs?: string[];
}

export function buildDocx(paragraphs: string[], options: DocxFixtureOptions = {}): Buffer {
  const zip = new AdmZip();
  zip.addFile(
    "[Content_Types].xml",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"><Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/><Default Extension="xml" ContentType="application/xml"/><Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/></Types>`,
      "utf-8",
    ),
  );
  zip.addFile(
    "_rels/.rels",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="${NS_RELS}"><Relationship Id="rId1" Type="${NS_R}/officeDocument" Target="word/document.xml"/></Relationships>`,
      "utf-8",
    ),
  );
  const body = paragraphs
    .map((p) => `<w:p><w:r><w:t xml:space="preserve">${escapeXml(p)}</w:t></w:r></w:p>`)
    .concat(options.rawParagraphs ?? [])
    .join("");
  zip.addFile(
    "word/document.xml",
    Buffer.from(
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>${body}</w:body></w:document>`,
      "utf-8",
    ),
  );
  return zip.toBuffer();
}
