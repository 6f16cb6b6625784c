import type { OpenXmlElement } from "./dom";
import type { CommonProperties, Length } from "./common";
import { ns, parseCommonProperty } from "./common";
import type { XmlParser } from "../parser";
import type { RunProperties } from "./run";
import { parseRunProperties } from "./run";

export interface WmlParagraph extends OpenXmlElement {
  text: string;
  props: ParagraphProperties;
}

export interface ParagraphProperties extends CommonProperties {
  tabs?: ParagraphTab[];
  numbering?: ParagraphNumbering;

  textAlignment?: Nullable<"auto" | "baseline" | "bottom" | "center" | "top" | string>;
  keepLines?: boolean;
  keepNext?: boolean;
  pageBreakBefore?: boolean;
  outlineLevel?: Nullable<number>;
  styleName?: Nullable<string>;

  runProps?: RunProperties;
}

export interface ParagraphTab {
  style: Nullable<string>;
  leader: Nullable<string>;
  position: Nullable<Length>;
}

export interface ParagraphNumbering {
  id: Nullable<string>;
  level: Nullable<number>;
}

export function parseParagraphProperties(elem: Element, xml: XmlParser): ParagraphProperties {
  const result: ParagraphProperties = {};

  for (const el of xml.elements(elem)) {
    parseParagraphProperty(el, result, xml);
  }

  return result;
}

export function parseParagraphProperty(elem: Element, props: ParagraphProperties, xml: XmlParser) {
  if (elem.namespaceURI != ns.wordml) return false;

  if (parseCommonProperty(elem, props, xml)) return true;

  switch (elem.localName) {
    case "tabs":
      props.tabs = parseTabs(elem, xml);
      break;

    case "numPr":
      props.numbering = parseNumbering(elem, xml);
      break;

    case "textAlignment":
      props.textAlignment = xml.attr(elem, "val");
      break;

    case "keepLines":
      props.keepLines = xml.boolAttr(elem, "val", true);
      break;

    case "keepNext":
      props.keepNext = xml.boolAttr(elem, "val", true);
      break;

    case "pageBreakBefore":
      props.pageBreakBefore = xml.boolAttr(elem, "val", true);
      break;

    case "outlineLvl":
      props.outlineLevel = xml.intAttr(elem, "val");
      break;

    case "pStyle":
      props.styleName = xml.attr(elem, "val");
      break;

    case "rPr":
      props.runProps = parseRunProperties(elem, xml);
      break;

    default:
      return false;
  }

  return true;
}

export function parseTabs(elem: Element, xml: XmlParser): ParagraphTab[] {
  return xml.elements(elem, "tab").map((e) => ({
    position: xml.lengthAttr(e, "pos"),
    leader: xml.attr(e, "leader"),
    style: xml.attr(e, "val"),
  }));
}

export function parseNumbering(elem: Element, xml: XmlParser): ParagraphNumbering {
  const result: ParagraphNumbering = { id: null, level: null };

  for (const e of xml.elements(elem)) {
    switch (e.localName) {
      case "numId":
        result.id = xml.attr(e, "val");
        break;

      case "ilvl":
        result.level = xml.intAttr(e, "val");
        break;
    }
  }

  return result;
}

export function parseParagraph(elem: Element, xml: XmlParser): WmlParagraph {
  const pPr = xml.element(elem, "pPr");

  return {
    type: "paragraph",
    text: xml
      .elements(elem, "r")
      .flatMap((r) => xml.elements(r))
      .map((c) => (c.localName == "t" ? xml.text(c) : c.localName == "tab" ? "\t" : ""))
      .join(""),
    props: pPr ? parseParagraphProperties(pPr, xml) : {},
  };
}
