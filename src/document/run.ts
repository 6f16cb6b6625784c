import type { XmlParser } from "../parser";
import type { CommonProperties } from "./common";
import { ns, parseCommonProperty } from "./common";

export interface RunProperties extends CommonProperties {
  bold?: boolean;
  italic?: boolean;
  styleName?: Nullable<string>;
}

export function parseRunProperties(elem: Element, xml: XmlParser): RunProperties {
  const result: RunProperties = {};

  for (const el of xml.elements(elem)) {
    parseRunProperty(el, result, xml);
  }

  return result;
}

export function parseRunProperty(elem: Element, props: RunProperties, xml: XmlParser) {
  if (parseCommonProperty(elem, props, xml)) return true;

  if (elem.namespaceURI != ns.wordml) return false;

  switch (elem.localName) {
    case "b":
      props.bold = xml.boolAttr(elem, "val", true);
      break;

    case "i":
      props.italic = xml.boolAttr(elem, "val", true);
      break;

    case "rStyle":
      props.styleName = xml.attr(elem, "val");
      break;

    default:
      return false;
  }

  return true;
}
