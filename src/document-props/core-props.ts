import type { XmlParser } from "../parser";
import { ns } from "../document/common";
import { DocxError } from "../common/errors";

const XMLNS_NAMESPACE = "http://www.w3.org/2000/xmlns/";
const MAX_TEXT_LENGTH = 255;

const prefixes: Record<string, string> = {
  [ns.coreProperties]: "cp",
  [ns.dc]: "dc",
  [ns.dcterms]: "dcterms",
  [ns.xsi]: "xsi",
};

/** Read/write view over a `cp:coreProperties` element (docProps/core.xml). */
export class CoreProperties {
  constructor(
    private _element: Element,
    private _xml: XmlParser,
  ) {}

  get title() {
    return this.text(ns.dc, "title");
  }
  set title(value: string) {
    this.setText(ns.dc, "title", value);
  }

  get subject() {
    return this.text(ns.dc, "subject");
  }
  set subject(value: string) {
    this.setText(ns.dc, "subject", value);
  }

  /** `dc:creator`, shown as the author. */
  get creator() {
    return this.text(ns.dc, "creator");
  }
  set creator(value: string) {
    this.setText(ns.dc, "creator", value);
  }

  get description() {
    return this.text(ns.dc, "description");
  }
  set description(value: string) {
    this.setText(ns.dc, "description", value);
  }

  get identifier() {
    return this.text(ns.dc, "identifier");
  }
  set identifier(value: string) {
    this.setText(ns.dc, "identifier", value);
  }

  get language() {
    return this.text(ns.dc, "language");
  }
  set language(value: string) {
    this.setText(ns.dc, "language", value);
  }

  get keywords() {
    return this.text(ns.coreProperties, "keywords");
  }
  set keywords(value: string) {
    this.setText(ns.coreProperties, "keywords", value);
  }

  get category() {
    return this.text(ns.coreProperties, "category");
  }
  set category(value: string) {
    this.setText(ns.coreProperties, "category", value);
  }

  get contentStatus() {
    return this.text(ns.coreProperties, "contentStatus");
  }
  set contentStatus(value: string) {
    this.setText(ns.coreProperties, "contentStatus", value);
  }

  get lastModifiedBy() {
    return this.text(ns.coreProperties, "lastModifiedBy");
  }
  set lastModifiedBy(value: string) {
    this.setText(ns.coreProperties, "lastModifiedBy", value);
  }

  get version() {
    return this.text(ns.coreProperties, "version");
  }
  set version(value: string) {
    this.setText(ns.coreProperties, "version", value);
  }

  /** Revision number; missing, negative or non-numeric text reads as 0. */
  get revision(): number {
    const text = this.text(ns.coreProperties, "revision");
    return /^\d+$/.test(text) ? parseInt(text) : 0;
  }
  set revision(value: number) {
    if (!Number.isInteger(value) || value < 1) {
      throw new DocxError(`revision property requires positive int, got '${value}'`);
    }
    this.setText(ns.coreProperties, "revision", String(value));
  }

  get created(): Nullable<Date> {
    return this.date(ns.dcterms, "created");
  }
  set created(value: Nullable<Date>) {
    this.setDate(ns.dcterms, "created", value);
  }

  get modified(): Nullable<Date> {
    return this.date(ns.dcterms, "modified");
  }
  set modified(value: Nullable<Date>) {
    this.setDate(ns.dcterms, "modified", value);
  }

  get lastPrinted(): Nullable<Date> {
    return this.date(ns.coreProperties, "lastPrinted");
  }
  set lastPrinted(value: Nullable<Date>) {
    this.setDate(ns.coreProperties, "lastPrinted", value);
  }

  private child(namespace: string, localName: string): Nullable<Element> {
    return (
      this._xml
        .elements(this._element, localName)
        .find((e) => e.namespaceURI == namespace) ?? null
    );
  }

  private text(namespace: string, localName: string): string {
    const el = this.child(namespace, localName);
    return el ? this._xml.text(el) : "";
  }

  private setText(namespace: string, localName: string, value: string): Element {
    if (value.length > MAX_TEXT_LENGTH) {
      throw new DocxError(`exceeded ${MAX_TEXT_LENGTH} char limit for property ${localName}`, {
        length: value.length,
      });
    }

    const el = this.child(namespace, localName) ?? this.addChild(namespace, localName);
    el.textContent = value;
    return el;
  }

  private date(namespace: string, localName: string): Nullable<Date> {
    const text = this.text(namespace, localName).trim();
    if (!text) return null;

    const date = new Date(text);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  private setDate(namespace: string, localName: string, value: Nullable<Date>) {
    if (value == null) {
      const el = this.child(namespace, localName);
      if (el) this._element.removeChild(el);
      return;
    }

    const el = this.setText(namespace, localName, value.toISOString().replace(/\.\d{3}Z$/, "Z"));

    if (namespace == ns.dcterms) {
      el.setAttributeNS(ns.xsi, `${this.declarePrefix(ns.xsi)}:type`, "dcterms:W3CDTF");
    }
  }

  private addChild(namespace: string, localName: string): Element {
    const prefix = this.declarePrefix(namespace);
    const el = this._element.ownerDocument.createElementNS(namespace, `${prefix}:${localName}`);
    this._element.appendChild(el);
    return el;
  }

  private declarePrefix(namespace: string): string {
    const existing = this._xml.prefixFor(this._element, namespace);
    if (existing) return existing;

    const prefix = prefixes[namespace];
    this._element.setAttributeNS(XMLNS_NAMESPACE, `xmlns:${prefix}`, namespace);
    return prefix;
  }
}
