import JSZip from "jszip";
import { ns } from "../document/common";
import { ContentType } from "../common/content-types";
import { RelationshipTypes } from "../common/relationship";
import type { FooterPart } from "../header-footer/parts";
import type { WordDocumentOptions } from "../word-document/word-document";
import { WordDocument } from "../word-document/word-document";

const W = `xmlns:w="${ns.wordml}"`;
const R = `xmlns:r="${ns.relationships}"`;
const WP = `xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing"`;
const PIC = `xmlns:pic="http://schemas.openxmlformats.org/drawingml/2006/picture"`;

export type PackageFiles = Record<string, string | Uint8Array>;

export function relsXml(...rels: [id: string, type: string, target: string][]): string {
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<Relationships xmlns="${ns.packageRelationships}">` +
    rels.map(([id, type, target]) => `<Relationship Id="${id}" Type="${type}" Target="${target}"/>`).join("") +
    `</Relationships>`
  );
}

export function contentTypesXml(overrides: Record<string, string>): string {
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<Types xmlns="${ns.contentTypes}">` +
    `<Default Extension="rels" ContentType="${ContentType.Relationships}"/>` +
    `<Default Extension="xml" ContentType="application/xml"/>` +
    `<Default Extension="png" ContentType="image/png"/>` +
    Object.entries(overrides)
      .map(([partName, type]) => `<Override PartName="${partName}" ContentType="${type}"/>`)
      .join("") +
    `</Types>`
  );
}

export function footerXml(content: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:ftr ${W} ${R} ${WP} ${PIC}>${content}</w:ftr>`;
}

export function stylesXml(content: string): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:styles ${W}>${content}</w:styles>`;
}

export const sampleStyles = stylesXml(
  `<w:style w:type="paragraph" w:default="1" w:styleId="Normal"><w:name w:val="Normal"/></w:style>` +
    `<w:style w:type="paragraph" w:styleId="Heading1"><w:name w:val="heading 1"/><w:basedOn w:val="Normal"/></w:style>` +
    `<w:style w:type="character" w:default="1" w:styleId="DefaultParagraphFont"><w:name w:val="Default Paragraph Font"/></w:style>`,
);

export const sampleFooter = footerXml(
  `<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t>Page footer</w:t></w:r></w:p>` +
    `<w:p><w:r><w:drawing><wp:inline><wp:docPr id="3" name="Picture 3"/></wp:inline></w:drawing></w:r></w:p>`,
);

/** Files of a small package: a document with one footer, styles, and an image. */
export function samplePackageFiles(): PackageFiles {
  return {
    "[Content_Types].xml": contentTypesXml({
      "/word/document.xml": ContentType.Document,
      "/word/styles.xml": ContentType.Styles,
      "/word/footer1.xml": ContentType.Footer,
    }),
    "_rels/.rels": relsXml(["rId1", RelationshipTypes.OfficeDocument, "word/document.xml"]),
    "word/document.xml":
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
      `<w:document ${W} ${R}><w:body><w:p><w:r><w:t>Body</w:t></w:r></w:p>` +
      `<w:sectPr><w:footerReference w:type="default" r:id="rId2"/></w:sectPr></w:body></w:document>`,
    "word/_rels/document.xml.rels": relsXml(
      ["rId1", RelationshipTypes.Styles, "styles.xml"],
      ["rId2", RelationshipTypes.Footer, "footer1.xml"],
      ["rId3", RelationshipTypes.Image, "media/image1.png"],
    ),
    "word/styles.xml": sampleStyles,
    "word/footer1.xml": sampleFooter,
    "word/media/image1.png": new Uint8Array([0x89, 0x50, 0x4e, 0x47]),
  };
}

export function zipFiles(files: PackageFiles): Promise<Buffer> {
  const zip = new JSZip();

  for (const [path, content] of Object.entries(files)) zip.file(path, content);

  return zip.generateAsync({ type: "nodebuffer" });
}

export async function unzipText(data: Buffer, path: string): Promise<Nullable<string>> {
  const zip = await JSZip.loadAsync(data);
  return (await zip.file(path)?.async("string")) ?? null;
}

export const testOptions: WordDocumentOptions = { trimXmlDeclaration: true, debug: false };

export async function openSample(
  files: PackageFiles = samplePackageFiles(),
  options: Partial<WordDocumentOptions> = {},
): Promise<WordDocument> {
  return WordDocument.load(await zipFiles(files), { ...testOptions, ...options });
}

export function firstFooter(doc: WordDocument): FooterPart {
  const [footer] = doc.documentPart.footerParts;
  if (footer == null) throw new Error("document has no footer part");
  return footer;
}
