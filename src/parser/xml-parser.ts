import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import type { LengthUsageType } from "../document/common";
import { convertBoolean, convertLength, LengthUsage, ns } from "../document/common";
import { XmlParseError } from "../common/errors";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

export function parseXmlString(xmlString: string, trimXmlDeclaration = false): Document {
  if (trimXmlDeclaration) xmlString = xmlString.replace(/<[?].*[?]>/, "");

  xmlString = removeUTF8BOM(xmlString);

  const errors: string[] = [];
  const report = (msg: string) => {
    errors.push(msg);
  };
  const result = new DOMParser({
    errorHandler: { error: report, fatalError: report },
  }).parseFromString(xmlString, "application/xml");

  if (errors.length > 0 || result?.documentElement == null) {
    throw new XmlParseError(errors[0] ?? "XML document has no root element", { errors });
  }

  return result;
}

export function serializeXmlString(node: Node): string {
  return new XMLSerializer().serializeToString(node);
}

export function serializePartXml(doc: Document): string {
  const text = serializeXmlString(doc);
  return text.startsWith("<?xml") ? text : XML_DECLARATION + text;
}

function removeUTF8BOM(data: string) {
  return data.charCodeAt(0) === 0xfeff ? data.substring(1) : data;
}

export class XmlParser {
  elements(elem: Nullable<Element>, localName: Nullable<string> = null): Element[] {
    const result: Element[] = [];

    if (elem == null) return result;

    for (let i = 0, l = elem.childNodes.length; i < l; i++) {
      const c = elem.childNodes.item(i);

      if (isElement(c) && (localName == null || c.localName == localName)) result.push(c);
    }

    return result;
  }

  element(elem: Nullable<Element>, localName: string): Nullable<Element> {
    return this.elements(elem, localName)[0] ?? null;
  }

  elementAttr(elem: Nullable<Element>, localName: string, attrLocalName: string): Nullable<string> {
    const el = this.element(elem, localName);
    return el ? this.attr(el, attrLocalName) : null;
  }

  attrs(elem: Element): Attr[] {
    const result: Attr[] = [];

    for (let i = 0, l = elem.attributes.length; i < l; i++) {
      const a = elem.attributes.item(i);
      if (a) result.push(a);
    }

    return result;
  }

  attr(elem: Element, localName: string): Nullable<string> {
    for (const a of this.attrs(elem)) {
      if (a.localName == localName) return a.value;
    }

    return null;
  }

  intAttr(node: Element, attrName: string): Nullable<number>;
  intAttr(node: Element, attrName: string, defaultValue: number): number;
  intAttr(node: Element, attrName: string, defaultValue: Nullable<number> = null): Nullable<number> {
    const val = this.attr(node, attrName);
    return val ? parseInt(val) : defaultValue;
  }

  boolAttr(node: Element, attrName: string, defaultValue = false): boolean {
    return convertBoolean(this.attr(node, attrName), defaultValue);
  }

  lengthAttr(node: Element, attrName: string, usage: LengthUsageType = LengthUsage.Dxa): Nullable<string> {
    return convertLength(this.attr(node, attrName), usage);
  }

  text(elem: Element): string {
    return elem.textContent ?? "";
  }

  /**
   * Prefix bound to `namespace` where `elem` sits: "" for the default
   * namespace, null when nothing in scope declares it.
   */
  prefixFor(elem: Element, namespace: string): Nullable<string> {
    for (let node: Nullable<Node> = elem; node != null; node = node.parentNode) {
      if (!isElement(node)) continue;

      if (node.namespaceURI == namespace && node.prefix) return node.prefix;

      for (const a of this.attrs(node)) {
        if (a.value != namespace) continue;
        if (a.prefix == "xmlns") return a.localName;
        if (a.name == "xmlns") return "";
      }
    }

    return null;
  }

  qualifiedName(elem: Element, localName: string, namespace: string = ns.wordml): string {
    const prefix = this.prefixFor(elem, namespace);
    return prefix ? `${prefix}:${localName}` : localName;
  }

  /** Appends a child in `namespace`, WordprocessingML unless told otherwise. */
  createElement(parent: Element, localName: string, namespace: string = ns.wordml): Element {
    const el = parent.ownerDocument.createElementNS(
      namespace,
      this.qualifiedName(parent, localName, namespace),
    );
    parent.appendChild(el);
    return el;
  }

  setAttr(elem: Element, localName: string, value: string, namespace: string = ns.wordml) {
    elem.setAttributeNS(namespace, this.qualifiedName(elem, localName, namespace), value);
  }

  removeElements(elem: Element, localName: string) {
    for (const el of this.elements(elem, localName)) elem.removeChild(el);
  }
}

export function isElement(node: Nullable<Node>): node is Element {
  return node != null && node.nodeType == 1;
}

export const globalXmlParser = new XmlParser();
