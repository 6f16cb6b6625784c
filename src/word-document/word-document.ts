import type { Writable } from "node:stream";
import type { OpenXmlPackageOptions } from "../common/open-xml-package";
import { OpenXmlPackage } from "../common/open-xml-package";
import type { Part } from "../common/part";
import type { Relationship, Relationships } from "../common/relationship";
import { RelationshipTypes } from "../common/relationship";
import { DocxError } from "../common/errors";
import type { CoreProperties } from "../document-props/core-props";
import { CorePropsPart } from "../document-props/core-props-part";
import { DocumentPart } from "../document/document-part";
import { FooterPart, HeaderPart } from "../header-footer/parts";
import { NumberingPart } from "../numbering/numbering-part";
import { SettingsPart } from "../settings/settings-part";
import { StylesPart } from "../styles/styles-part";

export type WordDocumentOptions = OpenXmlPackageOptions;

export class WordDocument {
  private constructor(
    private _package: OpenXmlPackage,
    public documentPart: DocumentPart,
  ) {}

  static async load(
    data: Buffer | ArrayBuffer | Uint8Array,
    options: WordDocumentOptions,
  ): Promise<WordDocument> {
    const pkg = await OpenXmlPackage.load(data, options);

    await loadRelatedParts(pkg, pkg.rels);

    const documentPart = pkg.rels.partByType(RelationshipTypes.OfficeDocument);

    if (!(documentPart instanceof DocumentPart)) {
      throw new DocxError("package has no main document part");
    }

    return new WordDocument(pkg, documentPart);
  }

  /** Blank document: a main document part with an empty body, plus core properties. */
  static create(options: WordDocumentOptions): WordDocument {
    const pkg = OpenXmlPackage.create(options);
    const documentPart = DocumentPart.default(pkg);

    pkg.relateTo(documentPart, RelationshipTypes.OfficeDocument);
    void pkg.corePropertiesPart;

    return new WordDocument(pkg, documentPart);
  }

  get package(): OpenXmlPackage {
    return this._package;
  }

  get parts(): Part[] {
    return this._package.parts;
  }

  get coreProperties(): CoreProperties {
    return this._package.coreProperties;
  }

  save(destination: string | Writable): Promise<void> {
    return this._package.save(destination);
  }

  generate(): Promise<Buffer> {
    return this._package.generate();
  }
}

async function loadRelatedParts(pkg: OpenXmlPackage, rels: Relationships): Promise<void> {
  for (const rel of [...rels.items]) {
    if (rel.targetMode == "External") continue;

    const path = rels.targetPath(rel);

    if (!pkg.get(path)) {
      if (pkg.options.debug) {
        // eslint-disable-next-line no-console
        console.warn(`DOCX: dropping relationship ${rel.id}, '${path}' is not in the package`);
      }
      rels.remove(rel.id);
      continue;
    }

    const part = await loadRelationshipPart(pkg, path, rel);
    if (part) rel.targetPart = part;
  }
}

type PartConstructor = new (
  pkg: Nullable<OpenXmlPackage>,
  path: string,
  xmlDocument: Document,
  rels?: Relationship[],
) => Part;

const partClasses: Record<string, PartConstructor> = {
  [RelationshipTypes.OfficeDocument]: DocumentPart,
  [RelationshipTypes.Styles]: StylesPart,
  [RelationshipTypes.Numbering]: NumberingPart,
  [RelationshipTypes.Settings]: SettingsPart,
  [RelationshipTypes.Header]: HeaderPart,
  [RelationshipTypes.Footer]: FooterPart,
  [RelationshipTypes.CoreProperties]: CorePropsPart,
};

async function loadRelationshipPart(
  pkg: OpenXmlPackage,
  path: string,
  rel: Relationship,
): Promise<Nullable<Part>> {
  const loaded = pkg.getPart(path);
  if (loaded) return loaded;

  const PartClass = partClasses[rel.type];

  if (PartClass == null) {
    if (pkg.options.debug) {
      // eslint-disable-next-line no-console
      console.warn(`DOCX: keeping '${path}' as is, unsupported relationship type ${rel.type}`);
    }
    return null;
  }

  const xmlText = await pkg.load(path);
  if (xmlText == null) return null;

  const part = new PartClass(
    pkg,
    path,
    pkg.parseXmlDocument(xmlText),
    (await pkg.loadRelationships(path)) ?? [],
  );

  part.contentType = pkg.contentTypes.contentTypeOf(path) ?? part.contentType;
  pkg.registerPart(part);

  await loadRelatedParts(pkg, part.rels);

  return part;
}
