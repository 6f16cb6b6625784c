import type { DomType, OpenXmlElement } from "../document/dom";
import type { WmlParagraph } from "../document/paragraph";
import { parseParagraph } from "../document/paragraph";
import type { WmlStyle } from "../styles/style";
import type { StoryPart } from "./story-part";

const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

/** Element holding paragraphs: a document body, a header or a footer. */
export abstract class BlockContainer implements OpenXmlElement {
  abstract type: DomType;

  constructor(
    readonly element: Element,
    protected _part: StoryPart,
  ) {}

  get part(): StoryPart {
    return this._part;
  }

  get paragraphs(): WmlParagraph[] {
    const xml = this._part.xmlParser;
    return xml.elements(this.element, "p").map((p) => parseParagraph(p, xml));
  }

  /**
   * Appends a paragraph. `style` is a style or style name; the document's
   * default paragraph style leaves the paragraph without a `w:pStyle`.
   */
  addParagraph(text = "", style: Nullable<WmlStyle | string> = null): WmlParagraph {
    const xml = this._part.xmlParser;
    const styleId = this._part.getStyleId(style, "paragraph");

    const p = xml.createElement(this.element, "p");
    const sectPr = xml.element(this.element, "sectPr");
    if (sectPr) this.element.insertBefore(p, sectPr);

    if (styleId != null) {
      const pStyle = xml.createElement(xml.createElement(p, "pPr"), "pStyle");
      xml.setAttr(pStyle, "val", styleId);
    }

    if (text) {
      const t = xml.createElement(xml.createElement(p, "r"), "t");
      t.textContent = text;
      if (/^\s|\s$/.test(text)) t.setAttributeNS(XML_NAMESPACE, "xml:space", "preserve");
    }

    return parseParagraph(p, xml);
  }

  /** Effective style of `paragraph`, falling back to the default paragraph style. */
  paragraphStyle(paragraph: WmlParagraph): Nullable<WmlStyle> {
    return this._part.getStyle(paragraph.props.styleName, "paragraph");
  }
}
