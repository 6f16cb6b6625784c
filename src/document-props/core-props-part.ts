import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { Part } from "../common/part";
import { ns } from "../document/common";
import { parseXmlString } from "../parser";
import { CoreProperties } from "./core-props";

export class CorePropsPart extends Part {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.CoreProperties, xmlDocument, rels);
  }

  /** Core properties part for a package that has none, stamped as modified now. */
  static default(pkg: OpenXmlPackage): CorePropsPart {
    const doc = parseXmlString(
      `<cp:coreProperties xmlns:cp="${ns.coreProperties}" xmlns:dc="${ns.dc}" ` +
        `xmlns:dcterms="${ns.dcterms}" xmlns:xsi="${ns.xsi}"/>`,
    );
    const part = new CorePropsPart(pkg, pkg.uniquePartName("docProps/core.xml"), doc);

    const props = part.props;
    props.title = "Word Document";
    props.lastModifiedBy = "docx-parts";
    props.revision = 1;
    props.modified = new Date();

    return part;
  }

  get props(): CoreProperties {
    return new CoreProperties(this.element, this.xmlParser);
  }
}
