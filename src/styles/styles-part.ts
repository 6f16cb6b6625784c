import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { Part } from "../common/part";
import { parseXmlString } from "../parser";
import { Styles } from "./styles";
import defaultStylesXml from "./templates/default-styles.xml?raw";

export class StylesPart extends Part {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Styles, xmlDocument, rels);
  }

  /** Styles part holding the built-in styles a blank document starts with. */
  static default(pkg: OpenXmlPackage): StylesPart {
    const doc = parseXmlString(defaultStylesXml, pkg.options.trimXmlDeclaration);
    return new StylesPart(pkg, pkg.uniquePartName("word/styles.xml"), doc);
  }

  get styles(): Styles {
    return new Styles(this.element, this.xmlParser, this._package?.options.debug);
  }
}
