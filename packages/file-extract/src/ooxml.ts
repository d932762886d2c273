/**
 * Minimal helpers for reading the XML parts of an Office Open XML package.
 *
 * The elements these helpers look for (shapes, paragraphs, tables, rows,
 * cells) never nest inside an element of the same name, so a lazy match up
 * to the first closing tag is enough to isolate each one.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const code = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function elementPattern(tags: string | string[]): RegExp {
  const names = (Array.isArray(tags) ? tags : [tags]).map(escapeRegExp).join("|");
  return new RegExp(`<(${names})(?:\\s[^>]*?)?(?:/>|>[\\s\\S]*?</\\1>)`, "g");
}

/** Returns every `<tag>…</tag>` or `<tag/>` element, in document order. */
export function findElements(xml: string, tags: string | string[]): string[] {
  return xml.match(elementPattern(tags)) ?? [];
}

export function removeElements(xml: string, tags: string | string[]): string {
  return xml.replace(elementPattern(tags), "");
}

export function elementName(element: string): string {
  return /^<([^\s/>]+)/.exec(element)?.[1] ?? "";
}

export function readAttributes(element: string): Record<string, string> {
  const openTag = /^<[^>]*>/.exec(element)?.[0] ?? "";
  const attrs: Record<string, string> = {};
  for (const m of openTag.matchAll(/([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
    const [, name, doubleQuoted, singleQuoted] = m;
    if (name) attrs[name] = decodeXmlEntities(doubleQuoted ?? singleQuoted ?? "");
  }
  return attrs;
}

/** Text content of a leaf element such as `<dc:title>`. */
export function innerText(element: string): string {
  return decodeXmlEntities(element.replace(/^<[^>]*>/, "").replace(/<\/[^>]*>$/, ""));
}

/**
 * Text of a DrawingML paragraph (`<a:p>`): its `<a:t>` runs concatenated,
 * with `<a:br/>` line breaks kept as newlines.
 */
export function paragraphText(paragraph: string): string {
  let text = "";
  for (const m of paragraph.matchAll(/<a:t(?:\s[^>/]*)?>([\s\S]*?)<\/a:t>|<a:br(?:\s[^>]*)?\/?>/g)) {
    const run = m[1];
    text += run === undefined ? "\n" : decodeXmlEntities(run);
  }
  return text;
}

export function paragraphs(xml: string): string[] {
  return findElements(xml, "a:p").map(paragraphText);
}
