/**
 * Minimal regex-based XML reading, enough for nuspec manifests and OData Atom
 * feeds. Elements of the same name must not nest.
 */

export interface XmlElement {
  attributes: Record<string, string>;
  /** Raw inner markup; empty for self-closing elements. */
  inner: string;
}

const ENTITY: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'"
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|\w+);/g, (match, entity: string) => {
    if (entity.startsWith('#x')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return ENTITY[entity] ?? match;
  });
}

export function parseAttributes(attrString: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  const attrRegex = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

  for (const match of attrString.matchAll(attrRegex)) {
    const key = match[1];
    const value = match[2] ?? match[3];
    if (key && value !== undefined) {
      attrs[key] = decodeEntities(value);
    }
  }

  return attrs;
}

function escapeTag(tagName: string): string {
  return tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function findElements(xml: string, tagName: string): XmlElement[] {
  const tag = escapeTag(tagName);
  const elementRegex = new RegExp(`<${tag}(\\s[^>]*?)?(?:/>|>([\\s\\S]*?)</${tag}\\s*>)`, 'g');
  const elements: XmlElement[] = [];

  for (const match of xml.matchAll(elementRegex)) {
    elements.push({
      attributes: parseAttributes(match[1] ?? ''),
      inner: match[2] ?? ''
    });
  }

  return elements;
}

export function findElement(xml: string, tagName: string): XmlElement | undefined {
  return findElements(xml, tagName)[0];
}

/** Decoded, trimmed text of the first matching element. */
export function elementText(xml: string, tagName: string): string | undefined {
  const element = findElement(xml, tagName);
  if (!element) {
    return undefined;
  }
  const cdata = /^\s*<!\[CDATA\[([\s\S]*?)\]\]>\s*$/.exec(element.inner);
  return cdata ? (cdata[1] ?? '').trim() : decodeEntities(element.inner).trim();
}
