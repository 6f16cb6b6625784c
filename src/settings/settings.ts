import type { XmlParser } from "../parser";
import type { Length } from "../document/common";

/** Live view over a `w:settings` element. */
export class WmlSettings {
  constructor(
    private _element: Element,
    private _xml: XmlParser,
  ) {}

  get defaultTabStop(): Nullable<Length> {
    const el = this._xml.element(this._element, "defaultTabStop");
    return el ? this._xml.lengthAttr(el, "val") : null;
  }

  /** Whether odd and even pages use different headers and footers. */
  get evenAndOddHeaders(): boolean {
    const el = this._xml.element(this._element, "evenAndOddHeaders");
    return el ? this._xml.boolAttr(el, "val", true) : false;
  }

  set evenAndOddHeaders(value: boolean) {
    this._xml.removeElements(this._element, "evenAndOddHeaders");

    if (!value) return;

    const el = this._element.ownerDocument.createElementNS(
      this._element.namespaceURI,
      this._element.prefix ? `${this._element.prefix}:evenAndOddHeaders` : "evenAndOddHeaders",
    );
    // w:evenAndOddHeaders sits right after w:defaultTabStop in schema order
    const anchor = this._xml.element(this._element, "defaultTabStop");
    this._element.insertBefore(el, anchor ? anchor.nextSibling : this._element.firstChild);
  }
}
