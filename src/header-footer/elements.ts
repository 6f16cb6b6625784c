import type { DomType } from "../document/dom";
import { BlockContainer } from "../story/block-container";

export class WmlHeader extends BlockContainer {
  type: DomType = "header";
}

export class WmlFooter extends BlockContainer {
  type: DomType = "footer";
}
