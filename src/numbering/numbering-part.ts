import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { Part } from "../common/part";
import { ns } from "../document/common";
import { parseXmlString } from "../parser";
import type { AbstractNumbering, Numbering, NumberingPartProperties } from "./numbering";
import { parseNumberingPart } from "./numbering";

export class NumberingPart extends Part implements NumberingPartProperties {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Numbering, xmlDocument, rels);
  }

  /** Empty numbering part, not yet attached to any package. */
  static new(): NumberingPart {
    const doc = parseXmlString(`<w:numbering xmlns:w="${ns.wordml}"/>`);
    return new NumberingPart(null, "word/numbering.xml", doc);
  }

  get numberings(): Numbering[] {
    return parseNumberingPart(this.element, this.xmlParser).numberings;
  }

  get abstractNumberings(): AbstractNumbering[] {
    return parseNumberingPart(this.element, this.xmlParser).abstractNumberings;
  }

  /** Adds a `w:num` pointing at `abstractNumId` and returns its numId. */
  addNumbering(abstractNumId: number): number {
    const xml = this.xmlParser;
    const numId = this.nextNumId();

    const num = xml.createElement(this.element, "num");
    xml.setAttr(num, "numId", String(numId));
    const abstractRef = xml.createElement(num, "abstractNumId");
    xml.setAttr(abstractRef, "val", String(abstractNumId));

    return numId;
  }

  /** Lowest positive numId not in use. */
  private nextNumId(): number {
    const used = new Set(
      this.numberings.filter((n) => /^\d+$/.test(n.id)).map((n) => parseInt(n.id)),
    );

    let numId = 1;
    while (used.has(numId)) numId++;

    return numId;
  }
}
