import { Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { ContentType } from "../common/content-types";
import { InvariantViolation, StyleNotFoundError, WrongStyleTypeError } from "../common/errors";
import { RelationshipTypes } from "../common/relationship";
import { NumberingPart } from "../numbering/numbering-part";
import { SettingsPart } from "../settings/settings-part";
import type { PackageFiles } from "../testing/fixtures";
import {
  firstFooter,
  openSample,
  relsXml,
  samplePackageFiles,
  testOptions,
} from "../testing/fixtures";
import { WordDocument } from "../word-document/word-document";

function filesWithFooterStyles(): PackageFiles {
  return {
    ...samplePackageFiles(),
    "word/_rels/footer1.xml.rels": relsXml(["rId1", RelationshipTypes.Styles, "styles.xml"]),
  };
}

function newFooter() {
  const doc = WordDocument.create(testOptions);
  const [footer] = doc.documentPart.addFooterPart();
  return { doc, footer };
}

describe("StoryPart dependent parts", () => {
  it("creates the styles part once and relates it to the footer", () => {
    const { doc, footer } = newFooter();

    const stylesPart = footer.stylesPart;

    expect(footer.stylesPart).toBe(stylesPart);
    expect(stylesPart.path).toBe("word/styles.xml");
    expect(doc.package.getPart("word/styles.xml")).toBe(stylesPart);
    expect(doc.package.contentTypes.contentTypeOf("word/styles.xml")).toBe(ContentType.Styles);
    expect(footer.rels.items.filter((r) => r.type == RelationshipTypes.Styles)).toHaveLength(1);
    expect(footer.rels.items[0]?.target).toBe("styles.xml");
  });

  it("reuses the styles part the footer already relates to", async () => {
    const doc = await openSample(filesWithFooterStyles());
    const footer = firstFooter(doc);

    expect(footer.stylesPart).toBe(doc.package.getPart("word/styles.xml"));
    expect(footer.rels.length).toBe(1);
  });

  it("gives a created default a free name when the usual one is taken", async () => {
    const doc = await openSample();
    const footer = firstFooter(doc);

    expect(footer.stylesPart.path).toBe("word/styles2.xml");
    expect(footer.rels.get("rId1")?.target).toBe("styles2.xml");
  });

  it("adopts a new numbering part into the package", () => {
    const { doc, footer } = newFooter();

    const numberingPart = footer.numberingPart;

    expect(numberingPart).toBeInstanceOf(NumberingPart);
    expect(numberingPart.isAttached).toBe(true);
    expect(numberingPart.package).toBe(doc.package);
    expect(numberingPart.path).toBe("word/numbering.xml");
    expect(footer.numberingPart).toBe(numberingPart);
  });

  it("renames a second numbering part instead of overwriting the first", () => {
    const { doc, footer } = newFooter();
    const [second] = doc.documentPart.addFooterPart();

    expect(footer.numberingPart.path).toBe("word/numbering.xml");
    expect(second.path).toBe("word/footer2.xml");
    expect(second.numberingPart.path).toBe("word/numbering2.xml");
  });

  it("relates numbering and settings once on a loaded footer", async () => {
    const doc = await openSample();
    const footer = firstFooter(doc);

    const numberingPart = footer.numberingPart;
    const settingsPart = footer.settingsPart;

    expect(footer.numberingPart).toBe(numberingPart);
    expect(footer.settingsPart).toBe(settingsPart);
    expect(footer.rels.items.filter((r) => r.type == RelationshipTypes.Numbering)).toHaveLength(1);
    expect(footer.rels.items.filter((r) => r.type == RelationshipTypes.Settings)).toHaveLength(1);
    expect(doc.package.getPart("word/numbering.xml")).toBe(numberingPart);
    expect(doc.package.getPart("word/settings.xml")).toBe(settingsPart);
  });

  it("creates settings with the default tab stop", () => {
    const { footer } = newFooter();

    expect(footer.settingsPart).toBeInstanceOf(SettingsPart);
    expect(footer.settingsPart).toBe(footer.settingsPart);
    expect(footer.settings.defaultTabStop).toBe("36.00pt");
  });

  it("refuses a relationship whose target is the wrong kind of part", async () => {
    const files = samplePackageFiles();
    files["word/_rels/document.xml.rels"] = relsXml(
      ["rId4", RelationshipTypes.Settings, "settings.xml"],
      ["rId1", RelationshipTypes.Styles, "styles.xml"],
      ["rId2", RelationshipTypes.Footer, "footer1.xml"],
    );
    files["word/settings.xml"] =
      `<w:settings xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"/>`;
    files["word/_rels/footer1.xml.rels"] = relsXml([
      "rId1",
      RelationshipTypes.Styles,
      "settings.xml",
    ]);

    const footer = firstFooter(await openSample(files));

    expect(() => footer.stylesPart).toThrow(InvariantViolation);
    expect(footer.settingsPart.path).toBe("word/settings2.xml");
  });
});

describe("StoryPart styles", () => {
  it("falls back to the default style of the requested type", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(footer.getStyle(null, "paragraph")?.styleId).toBe("Normal");
    expect(footer.getStyle(undefined, "character")?.styleId).toBe("DefaultParagraphFont");
    expect(footer.getStyle("bogus-id", "paragraph")?.styleId).toBe("Normal");
    expect(footer.getStyle("DefaultParagraphFont", "paragraph")?.styleId).toBe("Normal");
    expect(footer.getStyle("Heading1", "paragraph")?.name).toBe("Heading 1");
  });

  it("returns null when the document has no default of that type", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(footer.getStyle(null, "table")).toBeNull();
  });

  it("maps a style or style name to its id", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(footer.getStyleId("Heading 1", "paragraph")).toBe("Heading1");
    expect(footer.getStyleId(footer.styles.get("Heading 1"), "paragraph")).toBe("Heading1");
  });

  it("returns null for no style and for the default style", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(footer.getStyleId(null, "paragraph")).toBeNull();
    expect(footer.getStyleId(undefined, "character")).toBeNull();
    expect(footer.getStyleId("Normal", "paragraph")).toBeNull();
    expect(footer.getStyleId("Default Paragraph Font", "character")).toBeNull();
  });

  it("rejects a style of another type", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(() => footer.getStyleId("Heading 1", "character")).toThrow(WrongStyleTypeError);
    expect(() => footer.getStyleId("Heading 1", "character")).toThrow(
      "style 'Heading1' is type paragraph, need type character",
    );
  });

  it("rejects a name the document does not define", async () => {
    const footer = firstFooter(await openSample(filesWithFooterStyles()));

    expect(() => footer.getStyleId("NoSuchStyle", "paragraph")).toThrow(StyleNotFoundError);
  });
});

describe("StoryPart ids, properties and saving", () => {
  it("returns the next free id of its own part", async () => {
    const doc = await openSample();
    const footer = firstFooter(doc);

    expect(footer.nextId).toBe(4);
    expect(doc.documentPart.nextId).toBe(1);
  });

  it("rescans after new ids are written", () => {
    const { doc, footer } = newFooter();
    const [header] = doc.documentPart.addHeaderPart();

    expect(footer.nextId).toBe(1);

    const marker = footer.xmlDocument.createElement("marker");
    marker.setAttribute("id", "4");
    footer.element.appendChild(marker);

    expect(footer.nextId).toBe(5);
    expect(header.nextId).toBe(1);
  });

  it("reads core properties of the package", () => {
    const { doc, footer } = newFooter();

    expect(footer.coreProperties.title).toBe("Word Document");

    footer.coreProperties.title = "Quarterly report";
    expect(doc.coreProperties.title).toBe("Quarterly report");
  });

  it("creates core properties for a package without them", async () => {
    const doc = await openSample();
    const footer = firstFooter(doc);

    expect(footer.coreProperties.revision).toBe(1);
    expect(doc.package.rels.items.map((r) => [r.type, r.target])).toEqual([
      [RelationshipTypes.OfficeDocument, "word/document.xml"],
      [RelationshipTypes.CoreProperties, "docProps/core.xml"],
    ]);
    expect(doc.package.corePropertiesPart).toBe(doc.package.corePropertiesPart);
  });

  it("saves the whole package through the footer", async () => {
    const { footer } = newFooter();
    footer.footer.addParagraph("Page footer");

    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    await footer.save(sink);

    const reloaded = await WordDocument.load(Buffer.concat(chunks), testOptions);
    const texts = firstFooter(reloaded).footer.paragraphs.map((p) => p.text);

    expect(texts).toEqual(["", "Page footer"]);
    expect(reloaded.coreProperties.title).toBe("Word Document");
  });
});
