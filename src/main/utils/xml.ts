import { DOMParser } from '@xmldom/xmldom';
import { DescriptorParseError } from '../errors';

const ELEMENT_NODE = 1;

/** Parse XML string to Document */
export function parseXml(xmlString: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: string) => {
        problems.push(String(msg));
      },
      fatalError: (msg: string) => {
        problems.push(String(msg));
      },
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xmlString, 'text/xml');
  } catch (e) {
    throw new DescriptorParseError(e instanceof Error ? e.message : String(e));
  }

  if (problems.length > 0) {
    throw new DescriptorParseError(problems[0].trim());
  }
  if (!doc || !doc.documentElement) {
    throw new DescriptorParseError('document has no root element');
  }
  return doc;
}

export function isElement(node: Node | null | undefined): node is Element {
  return !!node && node.nodeType === ELEMENT_NODE;
}

/** Direct element children, in document order */
export function childElements(parent: Element): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (isElement(node)) out.push(node);
  }
  return out;
}

export function childrenByTag(parent: Element, tag: string): Element[] {
  return childElements(parent).filter((el) => el.tagName === tag);
}

export function firstChildByTag(parent: Element, tag: string): Element | undefined {
  return childElements(parent).find((el) => el.tagName === tag);
}

/** Attribute value, or undefined when the attribute is absent */
export function attr(el: Element, name: string): string | undefined {
  return el.hasAttribute(name) ? el.getAttribute(name) ?? undefined : undefined;
}

/** Ancestors of `el`, nearest first, up to and including the root element */
export function ancestors(el: Element): Element[] {
  const out: Element[] = [];
  let current: Node | null = el.parentNode;
  while (isElement(current)) {
    out.push(current);
    current = current.parentNode;
  }
  return out;
}
