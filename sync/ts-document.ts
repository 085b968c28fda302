/**
 * Qt Linguist translation documents (`.ts`):
 *
 *   <TS language="de">
 *     <context>
 *       <name>...</name>
 *       <message numerus="yes">
 *         <location filename="..." line="..."/>
 *         <source>...</source>
 *         <translation type="unfinished">
 *           <numerusform>...</numerusform>
 *         </translation>
 *       </message>
 *     </context>
 *   </TS>
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>\n';

// Control characters the XML parser rejects; tab is dropped as well
const INVALID_CHARACTERS = /[\u0000-\u0009\u000b\u000c\u000e-\u001f]/g;

export function removeInvalidCharacters(s: string): string {
  return s.replace(INVALID_CHARACTERS, "");
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function childElements(parent: Element, tagName: string): Element[] {
  const out: Element[] = [];
  const nodes = parent.childNodes;
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i);
    if (isElement(node) && node.tagName === tagName) out.push(node);
  }
  return out;
}

export function firstChildElement(
  parent: Element,
  tagName: string,
): Element | null {
  return childElements(parent, tagName)[0] ?? null;
}

/** Text of a leaf element; null when it is empty. */
export function elementText(el: Element | null): string | null {
  const text = el?.textContent;
  return text ? text : null;
}

/** Detaches `el` together with the whitespace that indented it. */
export function removeElement(el: Element) {
  const parent = el.parentNode;
  if (!parent) return;
  const prev = el.previousSibling;
  if (
    prev &&
    prev.nodeType === TEXT_NODE &&
    /^\s*$/.test(prev.nodeValue ?? "")
  ) {
    parent.removeChild(prev);
  }
  parent.removeChild(el);
}

/** Empties a <translation> and marks it unfinished so it is not shipped. */
export function clearTranslation(translation: Element) {
  while (translation.firstChild) {
    translation.removeChild(translation.firstChild);
  }
  for (let attr = translation.attributes.item(0); attr; ) {
    translation.removeAttribute(attr.name);
    attr = translation.attributes.item(0);
  }
  translation.setAttribute("type", "unfinished");
}

export function isUnfinished(translation: Element | null) {
  return translation?.getAttribute("type") === "unfinished";
}

export function countMessages(root: Element): number {
  return childElements(root, "context").reduce(
    (sum, context) => sum + childElements(context, "message").length,
    0,
  );
}

/** The document is not well-formed XML, or not a translation document. */
export class XmlDocumentError extends Error {
  constructor(
    readonly filename: string,
    detail: string,
  ) {
    super(`Invalid XML in ${filename}: ${detail}`);
    this.name = "XmlDocumentError";
  }
}

export function parseTranslationDocument(xml: string, filename: string) {
  // xmldom reports what a handler throws through `error` once more
  let failure: XmlDocumentError | undefined;
  const fail = (msg: unknown) => {
    failure ??= new XmlDocumentError(filename, String(msg));
    throw failure;
  };
  // mismatched end tags only come through as warnings
  const parser = new DOMParser({
    errorHandler: { warning: fail, error: fail, fatalError: fail },
  });
  const doc = parser.parseFromString(xml, "text/xml");
  if (!doc.documentElement || doc.documentElement.tagName !== "TS") {
    throw new Error(`${filename} is not a translation document (no <TS> root)`);
  }
  return doc;
}

export function serializeTranslationDocument(doc: Document): string {
  const xml = new XMLSerializer().serializeToString(doc);
  const out = xml.startsWith("<?xml") ? xml : XML_DECLARATION + xml;
  return out.endsWith("\n") ? out : `${out}\n`;
}
