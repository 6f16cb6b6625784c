import type { XmlParser } from "../parser";
import type { ParagraphProperties } from "../document/paragraph";
import { parseParagraphProperties } from "../document/paragraph";
import type { RunProperties } from "../document/run";
import { parseRunProperties } from "../document/run";
import { internalStyleNameToUi } from "./style-names";

export type StyleType = "paragraph" | "character" | "table" | "numbering";

const styleTypes: readonly StyleType[] = ["paragraph", "character", "table", "numbering"];

export function isStyleType(value: unknown): value is StyleType {
  return styleTypes.some((t) => t === value);
}

/** View over one `w:style` element. */
export class WmlStyle {
  constructor(
    readonly element: Element,
    private _xml: XmlParser,
  ) {}

  get styleId(): Nullable<string> {
    return this._xml.attr(this.element, "styleId");
  }

  /** `w:type` defaults to paragraph when omitted. */
  get type(): StyleType {
    const type = this._xml.attr(this.element, "type");
    return isStyleType(type) ? type : "paragraph";
  }

  /** UI name, so built-in "heading 1" reads as "Heading 1". */
  get name(): Nullable<string> {
    const name = this._xml.elementAttr(this.element, "name", "val");
    return name == null ? null : internalStyleNameToUi(name);
  }

  get isDefault(): boolean {
    return this._xml.boolAttr(this.element, "default");
  }

  get isBuiltin(): boolean {
    return !this._xml.boolAttr(this.element, "customStyle");
  }

  get basedOnId(): Nullable<string> {
    return this._xml.elementAttr(this.element, "basedOn", "val");
  }

  get paragraphProps(): Nullable<ParagraphProperties> {
    const pPr = this._xml.element(this.element, "pPr");
    return pPr ? parseParagraphProperties(pPr, this._xml) : null;
  }

  get runProps(): Nullable<RunProperties> {
    const rPr = this._xml.element(this.element, "rPr");
    return rPr ? parseRunProperties(rPr, this._xml) : null;
  }

  equals(other: Nullable<WmlStyle>): boolean {
    return other != null && other.element === this.element;
  }
}
