import type { XmlParser } from "../parser";

export const ns = {
  wordml: "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
  relationships: "http://schemas.openxmlformats.org/officeDocument/2006/relationships",
  packageRelationships: "http://schemas.openxmlformats.org/package/2006/relationships",
  contentTypes: "http://schemas.openxmlformats.org/package/2006/content-types",
  coreProperties: "http://schemas.openxmlformats.org/package/2006/metadata/core-properties",
  dc: "http://purl.org/dc/elements/1.1/",
  dcterms: "http://purl.org/dc/terms/",
  xsi: "http://www.w3.org/2001/XMLSchema-instance",
};

type LengthType = "px" | "pt" | "%" | "";
export type Length = string;

export interface CommonProperties {
  fontSize?: Nullable<Length>;
  color?: Nullable<string>;
}

export type LengthUsageType = { mul: number; unit: LengthType };

export const LengthUsage = {
  Dxa: { mul: 0.05, unit: "pt" }, //twips
  FontSize: { mul: 0.5, unit: "pt" },
} satisfies Record<string, LengthUsageType>;

export function convertLength(
  val: Nullable<string>,
  usage: LengthUsageType = LengthUsage.Dxa,
): Nullable<string> {
  //"simplified" docx documents use pt's as units
  if (val == null || /.+(p[xt]|[%])$/.test(val)) {
    return val;
  }

  const num = parseInt(val) * usage.mul;

  return `${num.toFixed(2)}${usage.unit}`;
}

export function convertBoolean(val: Nullable<string>, defaultValue = false): boolean {
  switch (val) {
    case "1":
    case "on":
    case "true":
      return true;
    case "0":
    case "off":
    case "false":
      return false;
    default:
      return defaultValue;
  }
}

export function parseCommonProperty(
  elem: Element,
  props: CommonProperties,
  xml: XmlParser,
): boolean {
  if (elem.namespaceURI != ns.wordml) return false;

  switch (elem.localName) {
    case "color":
      props.color = xml.attr(elem, "val");
      break;

    case "sz":
      props.fontSize = xml.lengthAttr(elem, "val", LengthUsage.FontSize);
      break;

    default:
      return false;
  }

  return true;
}
