import { writeFile } from "node:fs/promises";
import type { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import JSZip from "jszip";
import { parseXmlString, XmlParser } from "../parser";
import { normalizePath, splitPath } from "../utils";
import type { CoreProperties, CorePropsPart } from "../document-props";
import { resolveCorePropsPart } from "../story/relationship-resolver";
import { ContentTypeMap, CONTENT_TYPES_PATH } from "./content-types";
import { DocxError, InvariantViolation } from "./errors";
import type { Part } from "./part";
import type { Relationship } from "./relationship";
import { parseRelationships, Relationships } from "./relationship";

export interface OpenXmlPackageOptions {
  trimXmlDeclaration: boolean;
  debug: boolean;
}

const PACKAGE_RELS_PATH = "_rels/.rels";

export class OpenXmlPackage {
  xmlParser: XmlParser = new XmlParser();

  private _partsMap: Record<string, Part> = {};
  private _corePropsPart: Nullable<CorePropsPart> = null;

  constructor(
    private _zip: JSZip,
    public options: OpenXmlPackageOptions,
    public rels: Relationships,
    public contentTypes: ContentTypeMap,
  ) {}

  static async load(
    input: Buffer | ArrayBuffer | Uint8Array,
    options: OpenXmlPackageOptions,
  ): Promise<OpenXmlPackage> {
    const zip = await JSZip.loadAsync(input);
    const pkg = new OpenXmlPackage(zip, options, new Relationships(""), new ContentTypeMap());

    const contentTypesXml = await pkg.load(CONTENT_TYPES_PATH);
    if (contentTypesXml == null) {
      throw new DocxError(`not an OPC package: ${CONTENT_TYPES_PATH} is missing`);
    }

    pkg.contentTypes = ContentTypeMap.parse(
      pkg.parseXmlDocument(contentTypesXml).documentElement,
      pkg.xmlParser,
    );
    pkg.rels = new Relationships("", (await pkg.loadRelationships()) ?? []);

    return pkg;
  }

  static create(options: OpenXmlPackageOptions): OpenXmlPackage {
    return new OpenXmlPackage(new JSZip(), options, new Relationships(""), new ContentTypeMap());
  }

  get(path: string): Nullable<JSZip.JSZipObject> {
    const p = normalizePath(path);
    return this._zip.files[p] ?? this._zip.files[p.replace(/\//g, "\\")] ?? null;
  }

  update(path: string, content: string | Uint8Array) {
    this._zip.file(normalizePath(path), content);
  }

  remove(path: string) {
    if (this.get(path)) this._zip.remove(normalizePath(path));
  }

  load(path: string): Promise<Nullable<string>> {
    return this.get(path)?.async("string") ?? Promise.resolve(null);
  }

  async loadRelationships(path: Nullable<string> = null): Promise<Nullable<Relationship[]>> {
    let relsPath = PACKAGE_RELS_PATH;

    if (path != null) {
      const [f, fn] = splitPath(path);
      relsPath = `${f}_rels/${fn}.rels`;
    }

    const txt = await this.load(relsPath);
    return txt
      ? parseRelationships(this.parseXmlDocument(txt).documentElement, this.xmlParser)
      : null;
  }

  /** @internal */
  parseXmlDocument(txt: string): Document {
    return parseXmlString(txt, this.options.trimXmlDeclaration);
  }

  get parts(): Part[] {
    return Object.values(this._partsMap);
  }

  getPart(path: string): Nullable<Part> {
    return this._partsMap[normalizePath(path)] ?? null;
  }

  /** Adds `part` to the package, recording its content type if the package lacks it. */
  registerPart(part: Part) {
    const existing = this._partsMap[part.path];

    if (existing === part) return;

    // default parts are named before they know their package
    if (!part.isAttached && this.isPartNameTaken(part.path)) part.path = this.uniquePartName(part.path);

    if (this._partsMap[part.path] != null) {
      throw new InvariantViolation(`part name '${part.path}' is already in use`, {
        path: part.path,
      });
    }

    part.adopt(this);
    this._partsMap[part.path] = part;

    if (this.contentTypes.contentTypeOf(part.path) !== part.contentType) {
      this.contentTypes.addOverride(part.path, part.contentType);
    }
  }

  isPartNameTaken(path: string): boolean {
    return this.getPart(path) != null || this.get(path) != null;
  }

  /** First free name from a template such as `word/footer%d.xml`, counting from 1. */
  nextPartName(template: string): string {
    for (let n = 1; ; n++) {
      const candidate = template.replace("%d", String(n));
      if (!this.isPartNameTaken(candidate)) return candidate;
    }
  }

  /** `path` itself when free, otherwise the first numbered variant from 2 up. */
  uniquePartName(path: string): string {
    if (!this.isPartNameTaken(path)) return path;

    const dot = path.lastIndexOf(".");
    const template = dot < 0 ? `${path}%d` : `${path.substring(0, dot)}%d${path.substring(dot)}`;

    for (let n = 2; ; n++) {
      const candidate = template.replace("%d", String(n));
      if (!this.isPartNameTaken(candidate)) return candidate;
    }
  }

  relateTo(part: Part, type: string): string {
    this.registerPart(part);
    return this.rels.getOrAdd(type, part).id;
  }

  partRelatedBy(type: string): Part {
    return this.rels.partRelatedBy(type, "/");
  }

  get corePropertiesPart(): CorePropsPart {
    return (this._corePropsPart ??= resolveCorePropsPart(this));
  }

  /** Core document properties, created with defaults when the package has none. */
  get coreProperties(): CoreProperties {
    return this.corePropertiesPart.props;
  }

  /** Writes every part, relationship file and the content types back into the zip. */
  flush() {
    for (const part of this.parts) part.persist();

    this.update(PACKAGE_RELS_PATH, this.rels.toXml());
    this.update(CONTENT_TYPES_PATH, this.contentTypes.toXml());
  }

  generate(): Promise<Buffer> {
    this.flush();
    return this._zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
  }

  /** Saves the package to a file path or a writable stream. */
  async save(destination: string | Writable): Promise<void> {
    if (typeof destination === "string") {
      await writeFile(destination, await this.generate());
      return;
    }

    this.flush();
    await pipeline(
      this._zip.generateNodeStream({ type: "nodebuffer", compression: "DEFLATE", streamFiles: true }),
      destination,
    );
  }
}
