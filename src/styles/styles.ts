import type { XmlParser } from "../parser";
import { DocxError, StyleNotFoundError, WrongStyleTypeError } from "../common/errors";
import type { StyleType } from "./style";
import { WmlStyle } from "./style";
import { styleIdFromName, uiStyleNameToInternal } from "./style-names";

/** The `w:styles` element of a styles part. */
export class Styles implements Iterable<WmlStyle> {
  constructor(
    private _element: Element,
    private _xml: XmlParser,
    private _debug = false,
  ) {}

  [Symbol.iterator](): Iterator<WmlStyle> {
    return this.all()[Symbol.iterator]();
  }

  get length(): number {
    return this.styleElements().length;
  }

  all(): WmlStyle[] {
    return this.styleElements().map((e) => new WmlStyle(e, this._xml));
  }

  /** Whether a style with UI name `name` is defined. */
  contains(name: string): boolean {
    return this.findByName(uiStyleNameToInternal(name)) != null;
  }

  /**
   * Style with UI name `name`. Lookup by style id still works as a fallback,
   * but names are what the document shows, so ids are deprecated here.
   */
  get(name: string): WmlStyle {
    const byName = this.findByName(uiStyleNameToInternal(name));
    if (byName) return byName;

    const byId = this.findById(name);
    if (byId) {
      if (this._debug) {
        // eslint-disable-next-line no-console
        console.warn(`DOCX: style lookup by style id is deprecated, use the style name: ${name}`);
      }
      return byId;
    }

    throw new StyleNotFoundError(name);
  }

  /**
   * Style of `styleType` with `styleId`. Falls back to the default style of
   * `styleType` when `styleId` is absent or names no style of that type.
   */
  getById(styleId: Nullable<string> | undefined, styleType: StyleType): Nullable<WmlStyle> {
    if (styleId == null) return this.default(styleType);

    const style = this.findById(styleId);

    if (style == null || style.type != styleType) return this.default(styleType);

    return style;
  }

  /**
   * Style id of `styleOrName` for use in a `pStyle`, `rStyle` or `tblStyle`
   * element. Null means "use the default": returned for absent input and for
   * the default style of `styleType` itself.
   */
  getStyleId(
    styleOrName: Nullable<WmlStyle | string> | undefined,
    styleType: StyleType,
  ): Nullable<string> {
    if (styleOrName == null) return null;

    const style = typeof styleOrName === "string" ? this.get(styleOrName) : styleOrName;

    if (style.type != styleType) {
      throw new WrongStyleTypeError(style.styleId ?? "", style.type, styleType);
    }

    if (style.equals(this.default(styleType))) return null;

    return style.styleId;
  }

  /** Default style for `styleType`, or null when the document defines none. */
  default(styleType: StyleType): Nullable<WmlStyle> {
    const defaults = this.all().filter((s) => s.type == styleType && s.isDefault);

    // when more than one is flagged, the last one wins
    return defaults.at(-1) ?? null;
  }

  addStyle(name: string, styleType: StyleType, builtin = false): WmlStyle {
    const internalName = uiStyleNameToInternal(name);

    if (this.findByName(internalName) != null) {
      throw new DocxError(`document already contains style '${name}'`, { name });
    }

    const el = this._xml.createElement(this._element, "style");
    this._xml.setAttr(el, "type", styleType);
    if (!builtin) this._xml.setAttr(el, "customStyle", "1");
    this._xml.setAttr(el, "styleId", styleIdFromName(internalName));

    const nameEl = this._xml.createElement(el, "name");
    this._xml.setAttr(nameEl, "val", internalName);

    return new WmlStyle(el, this._xml);
  }

  private styleElements(): Element[] {
    return this._xml.elements(this._element, "style");
  }

  private findById(styleId: string): Nullable<WmlStyle> {
    const el = this.styleElements().find((e) => this._xml.attr(e, "styleId") == styleId);
    return el ? new WmlStyle(el, this._xml) : null;
  }

  private findByName(internalName: string): Nullable<WmlStyle> {
    const el = this.styleElements().find(
      (e) => this._xml.elementAttr(e, "name", "val") == internalName,
    );
    return el ? new WmlStyle(el, this._xml) : null;
  }
}
