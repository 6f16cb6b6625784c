import type { OpenXmlPackage } from "../common/open-xml-package";
import { ContentType } from "../common/content-types";
import type { Relationship } from "../common/relationship";
import { Part } from "../common/part";
import { parseXmlString } from "../parser";
import { WmlSettings } from "./settings";
import defaultSettingsXml from "./templates/default-settings.xml?raw";

export class SettingsPart extends Part {
  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, ContentType.Settings, xmlDocument, rels);
  }

  /** Settings part with the values a new document is given by default. */
  static default(pkg: OpenXmlPackage): SettingsPart {
    const doc = parseXmlString(defaultSettingsXml, pkg.options.trimXmlDeclaration);
    return new SettingsPart(pkg, pkg.uniquePartName("word/settings.xml"), doc);
  }

  get settings(): WmlSettings {
    return new WmlSettings(this.element, this.xmlParser);
  }
}
