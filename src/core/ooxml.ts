import JSZip from "jszip";

export type XmlElement = {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
};

export type XmlNode = XmlElement | string;

// One token per match: comment, declaration, cdata, doctype, tag, or text run.
const TOKEN_PATTERN =
  /<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!\[CDATA\[([\s\S]*?)\]\]>|<!DOCTYPE[^>]*>|<(\/?)([A-Za-z_][\w:.-]*)((?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/?)>|([^<]+)/y;
const ATTRIBUTE_PATTERN = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

export async function openPackage(data: Uint8Array): Promise<JSZip> {
  return JSZip.loadAsync(data);
}

export async function readPackagePart(zip: JSZip, partPath: string): Promise<XmlElement> {
  const entry = zip.file(partPath);
  if (!entry) {
    throw new Error(`missing package part ${partPath}`);
  }
  return parseXml(await entry.async("string"));
}

export function parseXml(source: string): XmlElement {
  const root: XmlElement = { name: "#document", attributes: {}, children: [] };
  const stack: XmlElement[] = [root];
  const pattern = new RegExp(TOKEN_PATTERN.source, "y");

  while (pattern.lastIndex < source.length) {
    const offset = pattern.lastIndex;
    const match = pattern.exec(source);
    if (!match) {
      throw new Error(`malformed xml near offset ${offset}`);
    }

    const current = stack[stack.length - 1] ?? root;
    const [, cdata, closing, tagName, rawAttributes, selfClosing, text] = match;

    if (cdata !== undefined) {
      current.children.push(cdata);
      continue;
    }

    if (text !== undefined) {
      current.children.push(decodeXmlEntities(text));
      continue;
    }

    if (!tagName) {
      continue;
    }

    if (closing) {
      if (stack.length <= 1 || current.name !== tagName) {
        throw new Error(`malformed xml: unexpected </${tagName}>`);
      }
      stack.pop();
      continue;
    }

    const element: XmlElement = {
      name: tagName,
      attributes: parseAttributes(rawAttributes ?? ""),
      children: [],
    };
    current.children.push(element);
    if (!selfClosing) {
      stack.push(element);
    }
  }

  if (stack.length > 1) {
    throw new Error(`malformed xml: unclosed <${stack[stack.length - 1]?.name ?? "?"}>`);
  }

  const documentElement = childElements(root)[0];
  if (!documentElement) {
    throw new Error("malformed xml: no root element");
  }
  return documentElement;
}

export function childElements(element: XmlElement, name?: string): XmlElement[] {
  const rows: XmlElement[] = [];
  for (const child of element.children) {
    if (typeof child === "string") {
      continue;
    }
    if (name === undefined || child.name === name) {
      rows.push(child);
    }
  }
  return rows;
}

export function findChild(element: XmlElement, name: string): XmlElement | undefined {
  return childElements(element, name)[0];
}

export function findPath(element: XmlElement, names: string[]): XmlElement | undefined {
  let current: XmlElement | undefined = element;
  for (const name of names) {
    if (!current) {
      return undefined;
    }
    current = findChild(current, name);
  }
  return current;
}

export function textContent(element: XmlElement): string {
  return element.children
    .map((child) => (typeof child === "string" ? child : textContent(child)))
    .join("");
}

export function decodeXmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z]+);/g, (whole, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return fromCodePoint(Number.parseInt(body.slice(2), 16), whole);
    }
    if (body.startsWith("#")) {
      return fromCodePoint(Number.parseInt(body.slice(1), 10), whole);
    }
    return NAMED_ENTITIES[body] ?? whole;
  });
}

function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of raw.matchAll(ATTRIBUTE_PATTERN)) {
    const key = match[1];
    if (!key) {
      continue;
    }
    attributes[key] = decodeXmlEntities(match[2] ?? match[3] ?? "");
  }
  return attributes;
}

function fromCodePoint(codePoint: number, fallback: string): string {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return fallback;
  }
  return String.fromCodePoint(codePoint);
}
