import type { XmlParser } from "../parser";
import { parseXmlString, serializePartXml } from "../parser";
import { ns } from "../document/common";

export const ContentType = {
  Document: "application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml",
  Styles: "application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml",
  Numbering: "application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml",
  Settings: "application/vnd.openxmlformats-officedocument.wordprocessingml.settings+xml",
  Header: "application/vnd.openxmlformats-officedocument.wordprocessingml.header+xml",
  Footer: "application/vnd.openxmlformats-officedocument.wordprocessingml.footer+xml",
  CoreProperties: "application/vnd.openxmlformats-package.core-properties+xml",
  Relationships: "application/vnd.openxmlformats-package.relationships+xml",
  Xml: "application/xml",
} as const;

export const CONTENT_TYPES_PATH = "[Content_Types].xml";

/** The package's `[Content_Types].xml`: defaults by extension, overrides by part name. */
export class ContentTypeMap {
  defaults: Record<string, string> = {
    rels: ContentType.Relationships,
    xml: ContentType.Xml,
  };
  overrides: Record<string, { partName: string; contentType: string }> = {};

  static parse(root: Element, xml: XmlParser): ContentTypeMap {
    const result = new ContentTypeMap();
    result.defaults = {};

    for (const el of xml.elements(root)) {
      const contentType = xml.attr(el, "ContentType");
      if (contentType == null) continue;

      switch (el.localName) {
        case "Default": {
          const ext = xml.attr(el, "Extension");
          if (ext) result.defaults[ext.toLowerCase()] = contentType;
          break;
        }

        case "Override": {
          const partName = xml.attr(el, "PartName");
          if (partName) result.overrides[partName.toLowerCase()] = { partName, contentType };
          break;
        }
      }
    }

    return result;
  }

  contentTypeOf(path: string): Nullable<string> {
    const partName = `/${path}`.toLowerCase();
    const override = this.overrides[partName];
    if (override) return override.contentType;

    const dot = partName.lastIndexOf(".");
    return dot < 0 ? null : (this.defaults[partName.substring(dot + 1)] ?? null);
  }

  addOverride(path: string, contentType: string) {
    const partName = `/${path}`;
    this.overrides[partName.toLowerCase()] = { partName, contentType };
  }

  toXml(): string {
    const doc = parseXmlString(`<Types xmlns="${ns.contentTypes}"/>`);
    const root = doc.documentElement;

    for (const [ext, contentType] of Object.entries(this.defaults)) {
      const el = doc.createElementNS(ns.contentTypes, "Default");
      el.setAttribute("Extension", ext);
      el.setAttribute("ContentType", contentType);
      root.appendChild(el);
    }

    for (const { partName, contentType } of Object.values(this.overrides)) {
      const el = doc.createElementNS(ns.contentTypes, "Override");
      el.setAttribute("PartName", partName);
      el.setAttribute("ContentType", contentType);
      root.appendChild(el);
    }

    return serializePartXml(doc);
  }
}
