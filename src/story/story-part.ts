import type { Writable } from "node:stream";
import type { OpenXmlPackage } from "../common/open-xml-package";
import type { Relationship } from "../common/relationship";
import { RelationshipTypes } from "../common/relationship";
import { Part } from "../common/part";
import type { CoreProperties } from "../document-props/core-props";
import type { NumberingPart } from "../numbering/numbering-part";
import type { SettingsPart } from "../settings/settings-part";
import type { WmlSettings } from "../settings/settings";
import type { StylesPart } from "../styles/styles-part";
import type { Styles } from "../styles/styles";
import type { StyleType, WmlStyle } from "../styles/style";
import { resolveDependentPart } from "./relationship-resolver";
import { nextId } from "./next-id";

/**
 * A part holding document content: the main document, a header or a footer.
 * Brokers access to the parts that content depends on, so that a paragraph
 * deep in the tree can reach styles or numbering through its part.
 */
export abstract class StoryPart extends Part {
  private _stylesPart: Nullable<StylesPart> = null;
  private _numberingPart: Nullable<NumberingPart> = null;
  private _settingsPart: Nullable<SettingsPart> = null;

  constructor(
    pkg: Nullable<OpenXmlPackage>,
    path: string,
    contentType: string,
    xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    super(pkg, path, contentType, xmlDocument, rels);
  }

  /** Core properties of the package this part belongs to. */
  get coreProperties(): CoreProperties {
    return this.package.coreProperties;
  }

  /**
   * Style of `styleType` with `styleId`, or the default style for
   * `styleType` when `styleId` is absent or matches no style of that type.
   */
  getStyle(styleId: Nullable<string> | undefined, styleType: StyleType): Nullable<WmlStyle> {
    return this.styles.getById(styleId, styleType);
  }

  /**
   * Style id for `styleOrName`, or null when it is absent or resolves to the
   * default style for `styleType`. Throws `WrongStyleTypeError` for a style
   * of another type and `StyleNotFoundError` for a name the document lacks.
   */
  getStyleId(
    styleOrName: Nullable<WmlStyle | string> | undefined,
    styleType: StyleType,
  ): Nullable<string> {
    return this.styles.getStyleId(styleOrName, styleType);
  }

  get styles(): Styles {
    return this.stylesPart.styles;
  }

  /** Styles part related to this one, created with the built-in styles if missing. */
  get stylesPart(): StylesPart {
    return (this._stylesPart ??= resolveDependentPart(this, RelationshipTypes.Styles, this.package));
  }

  /** Numbering definitions, created empty if missing. */
  get numberingPart(): NumberingPart {
    return (this._numberingPart ??= resolveDependentPart(this, RelationshipTypes.Numbering, this.package));
  }

  get settings(): WmlSettings {
    return this.settingsPart.settings;
  }

  get settingsPart(): SettingsPart {
    return (this._settingsPart ??= resolveDependentPart(this, RelationshipTypes.Settings, this.package));
  }

  /** Next unused `id` value in this part. Re-scanned on every read. */
  get nextId(): number {
    return nextId(this.element);
  }

  /** Saves the whole package to a file path or a writable stream. */
  save(destination: string | Writable): Promise<void> {
    return this.package.save(destination);
  }
}
