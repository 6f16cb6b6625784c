import { describe, expect, it } from "vitest";
import { XmlParseError } from "../common/errors";
import { ns } from "../document/common";
import { globalXmlParser, parseXmlString, serializePartXml } from "./xml-parser";

describe("parseXmlString", () => {
  it("throws for input without a root element", () => {
    expect(() => parseXmlString("")).toThrow(XmlParseError);
    expect(() => parseXmlString("not xml at all")).toThrow(XmlParseError);
  });

  it("ignores a leading byte order mark", () => {
    expect(parseXmlString("\uFEFF<root/>").documentElement.localName).toBe("root");
  });

  it("writes a single XML declaration", () => {
    const declaration = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

    expect(serializePartXml(parseXmlString("<root/>", true))).toBe(`${declaration}\n<root/>`);
  });
});

describe("XmlParser", () => {
  const xml = globalXmlParser;

  it("reads child elements and attributes by local name", () => {
    const root = parseXmlString(
      `<w:p xmlns:w="${ns.wordml}"><w:pPr><w:jc w:val="center"/></w:pPr><w:r/><w:r/></w:p>`,
    ).documentElement;

    expect(xml.elements(root, "r")).toHaveLength(2);
    expect(xml.elementAttr(xml.element(root, "pPr"), "jc", "val")).toBe("center");
    expect(xml.element(root, "tbl")).toBeNull();
  });

  it("finds the prefix bound to a namespace", () => {
    const root = parseXmlString(
      `<doc xmlns="${ns.contentTypes}" xmlns:x="${ns.wordml}"><inner/></doc>`,
    ).documentElement;
    const inner = xml.element(root, "inner");

    expect(inner && xml.prefixFor(inner, ns.wordml)).toBe("x");
    expect(inner && xml.prefixFor(inner, ns.contentTypes)).toBe("");
    expect(xml.prefixFor(root, ns.dc)).toBeNull();
  });

  it("creates elements and attributes under the bound prefix", () => {
    const root = parseXmlString(`<w:body xmlns:w="${ns.wordml}"/>`).documentElement;

    const p = xml.createElement(root, "p");
    xml.setAttr(p, "rsidR", "00AB12CD");

    expect(p.nodeName).toBe("w:p");
    expect(p.getAttribute("w:rsidR")).toBe("00AB12CD");
    expect(xml.attr(p, "rsidR")).toBe("00AB12CD");
  });

  it("reads integer, boolean and length attributes", () => {
    const el = parseXmlString(`<tab pos="1440" on="off" size="3"/>`).documentElement;

    expect(xml.intAttr(el, "size")).toBe(3);
    expect(xml.intAttr(el, "missing", 9)).toBe(9);
    expect(xml.boolAttr(el, "on", true)).toBe(false);
    expect(xml.lengthAttr(el, "pos")).toBe("72.00pt");
  });
});
