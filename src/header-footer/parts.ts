import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { parseXmlString } from "../parser";
import { StoryPart } from "../story/story-part";
import { WmlFooter, WmlHeader } from "./elements";
import defaultFooterXml from "./templates/default-footer.xml?raw";
import defaultHeaderXml from "./templates/default-header.xml?raw";

export abstract class BaseHeaderFooterPart<T extends WmlHeader | WmlFooter> extends StoryPart {
  /** View over the part's root element. */
  get rootElement(): T {
    return this.createRootElement();
  }

  protected abstract createRootElement(): T;
}

export class HeaderPart extends BaseHeaderFooterPart<WmlHeader> {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Header, xmlDocument, rels);
  }

  /** Blank header part under the next free `word/header<n>.xml` name. */
  static new(pkg: OpenXmlPackage): HeaderPart {
    const doc = parseXmlString(defaultHeaderXml, pkg.options.trimXmlDeclaration);
    return new HeaderPart(pkg, pkg.nextPartName("word/header%d.xml"), doc);
  }

  get header(): WmlHeader {
    return this.rootElement;
  }

  protected createRootElement(): WmlHeader {
    return new WmlHeader(this.element, this);
  }
}

/**
 * Footer of a WordprocessingML package. Content objects inside the footer
 * reach styles, numbering, settings and core properties through it.
 */
export class FooterPart extends BaseHeaderFooterPart<WmlFooter> {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Footer, xmlDocument, rels);
  }

  /** Blank footer part under the next free `word/footer<n>.xml` name. */
  static new(pkg: OpenXmlPackage): FooterPart {
    const doc = parseXmlString(defaultFooterXml, pkg.options.trimXmlDeclaration);
    return new FooterPart(pkg, pkg.nextPartName("word/footer%d.xml"), doc);
  }

  get footer(): WmlFooter {
    return this.rootElement;
  }

  protected createRootElement(): WmlFooter {
    return new WmlFooter(this.element, this);
  }
}
