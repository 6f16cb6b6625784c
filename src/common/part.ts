import { globalXmlParser, serializePartXml } from "../parser";
import type { XmlParser } from "../parser";
import { splitPath } from "../utils";
import { InvariantViolation } from "./errors";
import type { OpenXmlPackage } from "./open-xml-package";
import type { Relationship } from "./relationship";
import { Relationships } from "./relationship";

export class Part {
  rels: Relationships;

  constructor(
    protected _package: Nullable<OpenXmlPackage>,
    public path: string,
    public contentType: string,
    protected _xmlDocument: Document,
    rels: Relationship[] = [],
  ) {
    this.rels = new Relationships(splitPath(path)[0], rels);
  }

  /** Owning package. Parts created without one are adopted when first related. */
  get package(): OpenXmlPackage {
    if (this._package == null) {
      throw new InvariantViolation(`part '${this.path}' is not attached to a package`);
    }
    return this._package;
  }

  get isAttached(): boolean {
    return this._package != null;
  }

  /** @internal */
  adopt(pkg: OpenXmlPackage) {
    if (this._package != null && this._package !== pkg) {
      throw new InvariantViolation(`part '${this.path}' belongs to another package`);
    }
    this._package = pkg;
  }

  get element(): Element {
    return this._xmlDocument.documentElement;
  }

  get xmlDocument(): Document {
    return this._xmlDocument;
  }

  get xmlParser(): XmlParser {
    return this._package?.xmlParser ?? globalXmlParser;
  }

  get relsPath(): string {
    const [folder, fileName] = splitPath(this.path);
    return `${folder}_rels/${fileName}.rels`;
  }

  /** Relates `part` to this one, registering it with the package, and returns the rId. */
  relateTo(part: Part, type: string): string {
    this.package.registerPart(part);
    return this.rels.getOrAdd(type, part).id;
  }

  partRelatedBy(type: string): Part {
    return this.rels.partRelatedBy(type, this.path);
  }

  blob(): string {
    return serializePartXml(this._xmlDocument);
  }

  /** Writes the part and its relationships into the package's zip. */
  persist() {
    this.package.update(this.path, this.blob());

    if (this.rels.length > 0) {
      this.package.update(this.relsPath, this.rels.toXml());
    } else {
      this.package.remove(this.relsPath);
    }
  }
}
