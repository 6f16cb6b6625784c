import type { XmlParser } from "../parser";

export interface NumberingPartProperties {
  numberings: Numbering[];
  abstractNumberings: AbstractNumbering[];
}

export interface Numbering {
  id: string;
  abstractId: Nullable<string>;
  overrides: NumberingLevelOverride[];
}

export interface NumberingLevelOverride {
  level: Nullable<number>;
  start: Nullable<number>;
}

export interface AbstractNumbering {
  id: string;
  name: Nullable<string>;
  multiLevelType: Nullable<"singleLevel" | "multiLevel" | "hybridMultilevel" | string>;
  levels: NumberingLevel[];
  numberingStyleLink: Nullable<string>;
  styleLink: Nullable<string>;
}

export interface NumberingLevel {
  level: Nullable<number>;
  start: Nullable<number>;
  format: Nullable<string>;
  text: Nullable<string>;
  paragraphStyle: Nullable<string>;
}

export function parseNumberingPart(elem: Element, xml: XmlParser): NumberingPartProperties {
  const result: NumberingPartProperties = {
    numberings: [],
    abstractNumberings: [],
  };

  for (const e of xml.elements(elem)) {
    switch (e.localName) {
      case "num":
        result.numberings.push(parseNumberingInstance(e, xml));
        break;
      case "abstractNum":
        result.abstractNumberings.push(parseAbstractNumbering(e, xml));
        break;
    }
  }

  return result;
}

export function parseNumberingInstance(elem: Element, xml: XmlParser): Numbering {
  return {
    id: xml.attr(elem, "numId") ?? "",
    abstractId: xml.elementAttr(elem, "abstractNumId", "val"),
    overrides: xml.elements(elem, "lvlOverride").map((e) => {
      const start = xml.elementAttr(e, "startOverride", "val");
      return { level: xml.intAttr(e, "ilvl"), start: start == null ? null : parseInt(start) };
    }),
  };
}

export function parseAbstractNumbering(elem: Element, xml: XmlParser): AbstractNumbering {
  return {
    id: xml.attr(elem, "abstractNumId") ?? "",
    name: xml.elementAttr(elem, "name", "val"),
    multiLevelType: xml.elementAttr(elem, "multiLevelType", "val"),
    numberingStyleLink: xml.elementAttr(elem, "numStyleLink", "val"),
    styleLink: xml.elementAttr(elem, "styleLink", "val"),
    levels: xml.elements(elem, "lvl").map((e) => parseNumberingLevel(e, xml)),
  };
}

export function parseNumberingLevel(elem: Element, xml: XmlParser): NumberingLevel {
  const start = xml.elementAttr(elem, "start", "val");

  return {
    level: xml.intAttr(elem, "ilvl"),
    start: start == null ? null : parseInt(start),
    format: xml.elementAttr(elem, "numFmt", "val"),
    text: xml.elementAttr(elem, "lvlText", "val"),
    paragraphStyle: xml.elementAttr(elem, "pStyle", "val"),
  };
}
