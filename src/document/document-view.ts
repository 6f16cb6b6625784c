import type { DomType } from "./dom";
import { BlockContainer } from "../story/block-container";

/** The document body (`w:body`). New paragraphs go before the final `w:sectPr`. */
export class WmlDocument extends BlockContainer {
  type: DomType = "document";
}
