import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { RelationshipTypes } from "../common/relationship";
import { InvariantViolation } from "../common/errors";
import { FooterPart, HeaderPart } from "../header-footer/parts";
import { parseXmlString } from "../parser";
import { StoryPart } from "../story/story-part";
import { WmlDocument } from "./document-view";
import defaultDocumentXml from "./templates/default-document.xml?raw";

export class DocumentPart extends StoryPart {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Document, xmlDocument, rels);
  }

  static default(pkg: OpenXmlPackage): DocumentPart {
    const doc = parseXmlString(defaultDocumentXml, pkg.options.trimXmlDeclaration);
    return new DocumentPart(pkg, pkg.uniquePartName("word/document.xml"), doc);
  }

  get document(): WmlDocument {
    const body = this.xmlParser.element(this.element, "body");

    if (body == null) {
      throw new InvariantViolation(`'${this.path}' has no w:body element`);
    }

    return new WmlDocument(body, this);
  }

  get headerParts(): HeaderPart[] {
    return this.rels.items
      .filter((r) => r.type == RelationshipTypes.Header)
      .map((r) => r.targetPart)
      .filter((p): p is HeaderPart => p instanceof HeaderPart);
  }

  get footerParts(): FooterPart[] {
    return this.rels.items
      .filter((r) => r.type == RelationshipTypes.Footer)
      .map((r) => r.targetPart)
      .filter((p): p is FooterPart => p instanceof FooterPart);
  }

  /** Creates a blank header part related to this document; returns it with its rId. */
  addHeaderPart(): [HeaderPart, string] {
    const part = HeaderPart.new(this.package);
    return [part, this.relateTo(part, RelationshipTypes.Header)];
  }

  /** Creates a blank footer part related to this document; returns it with its rId. */
  addFooterPart(): [FooterPart, string] {
    const part = FooterPart.new(this.package);
    return [part, this.relateTo(part, RelationshipTypes.Footer)];
  }
}
