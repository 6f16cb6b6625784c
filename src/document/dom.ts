export type DomType = "document" | "paragraph" | "header" | "footer";

export interface OpenXmlElement {
  type: DomType;
}
