import type { XmlParser } from "../parser";
import { parseXmlString, serializePartXml } from "../parser";
import { ns } from "../document/common";
import { relativePath, resolvePath } from "../utils";
import { InvariantViolation, RelationshipNotFoundError } from "./errors";
import type { Part } from "./part";

export const RelationshipTypes = {
  OfficeDocument:
    "http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument",
  FontTable: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/fontTable",
  Image: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/image",
  Numbering: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/numbering",
  Styles: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles",
  StylesWithEffects: "http://schemas.microsoft.com/office/2007/relationships/stylesWithEffects",
  Theme: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/theme",
  Settings: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/settings",
  WebSettings: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/webSettings",
  Hyperlink: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/hyperlink",
  Footnotes: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/footnotes",
  Endnotes: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/endnotes",
  Footer: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/footer",
  Header: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/header",
  ExtendedProperties:
    "http://schemas.openxmlformats.org/officeDocument/2006/relationships/extended-properties",
  CoreProperties:
    "http://schemas.openxmlformats.org/package/2006/relationships/metadata/core-properties",
  CustomProperties:
    "http://schemas.openxmlformats.org/officeDocument/2006/relationships/custom-properties",
  Comments: "http://schemas.openxmlformats.org/officeDocument/2006/relationships/comments",
} as const;

export type RelationshipType = (typeof RelationshipTypes)[keyof typeof RelationshipTypes];

export interface Relationship {
  id: string;
  type: RelationshipType | string;
  target: string;
  targetMode: "" | "External" | string;
  /** Set once the target is loaded or created as a part of this package. */
  targetPart?: Part;
}

export function parseRelationships(root: Element, xml: XmlParser): Relationship[] {
  return xml.elements(root, "Relationship").map((e) => ({
    id: xml.attr(e, "Id") ?? "",
    type: xml.attr(e, "Type") ?? "",
    target: xml.attr(e, "Target") ?? "",
    targetMode: xml.attr(e, "TargetMode") ?? "",
  }));
}

/**
 * Outbound relationships of one source, either a part or the package itself
 * (whose folder is the empty string).
 */
export class Relationships {
  private _items: Relationship[];

  constructor(
    public baseFolder: string,
    items: Relationship[] = [],
  ) {
    this._items = items;
  }

  get items(): readonly Relationship[] {
    return this._items;
  }

  get length(): number {
    return this._items.length;
  }

  get(id: string): Nullable<Relationship> {
    return this._items.find((r) => r.id == id) ?? null;
  }

  /** Package path of an internal relationship's target. */
  targetPath(rel: Relationship): string {
    return resolvePath(rel.target, this.baseFolder);
  }

  /** Target part of the single relationship of `type`, or null when there is none. */
  partByType(type: string): Nullable<Part> {
    const matching = this._items.filter((r) => r.type == type && r.targetMode != "External");

    if (matching.length > 1) {
      throw new InvariantViolation(`multiple relationships of type '${type}'`, {
        type,
        ids: matching.map((r) => r.id),
      });
    }

    return matching[0]?.targetPart ?? null;
  }

  partRelatedBy(type: string, source: string): Part {
    const part = this.partByType(type);

    if (part == null) throw new RelationshipNotFoundError(type, source);

    return part;
  }

  remove(id: string) {
    this._items = this._items.filter((r) => r.id != id);
  }

  add(type: string, part: Part): Relationship {
    const rel: Relationship = {
      id: this.nextRId(),
      type,
      target: relativePath(part.path, this.baseFolder),
      targetMode: "",
      targetPart: part,
    };

    this._items.push(rel);
    return rel;
  }

  getOrAdd(type: string, part: Part): Relationship {
    return this._items.find((r) => r.type == type && r.targetPart === part) ?? this.add(type, part);
  }

  addExternal(type: string, url: string): Relationship {
    const existing = this._items.find(
      (r) => r.type == type && r.targetMode == "External" && r.target == url,
    );
    if (existing) return existing;

    const rel: Relationship = { id: this.nextRId(), type, target: url, targetMode: "External" };
    this._items.push(rel);
    return rel;
  }

  /** First `rId<n>` not in use, filling gaps left by hand-edited packages. */
  nextRId(): string {
    const used = new Set(this._items.map((r) => r.id));

    for (let n = 1; ; n++) {
      const id = `rId${n}`;
      if (!used.has(id)) return id;
    }
  }

  toXml(): string {
    const doc = parseXmlString(`<Relationships xmlns="${ns.packageRelationships}"/>`);
    const root = doc.documentElement;

    for (const rel of this._items) {
      const el = doc.createElementNS(ns.packageRelationships, "Relationship");
      el.setAttribute("Id", rel.id);
      el.setAttribute("Type", rel.type);
      el.setAttribute("Target", rel.target);
      if (rel.targetMode) el.setAttribute("TargetMode", rel.targetMode);
      root.appendChild(el);
    }

    return serializePartXml(doc);
  }
}
