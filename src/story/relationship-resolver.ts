import type { OpenXmlPackage } from "../common/open-xml-package";
import type { Part } from "../common/part";
import type { Relationships } from "../common/relationship";
import { RelationshipTypes } from "../common/relationship";
import { InvariantViolation } from "../common/errors";
import { CorePropsPart } from "../document-props/core-props-part";
import { NumberingPart } from "../numbering/numbering-part";
import { SettingsPart } from "../settings/settings-part";
import { StylesPart } from "../styles/styles-part";

/** Anything with outbound relationships: a part, or the package itself. */
export interface RelationshipSource {
  readonly rels: Relationships;
  relateTo(part: Part, type: string): string;
}

export interface PartKind<P extends Part> {
  partClass: new (...args: never[]) => P;
  createDefault(pkg: OpenXmlPackage): P;
}

/** Parts a story part depends on, keyed by the relationship type that reaches them. */
export interface DependentParts {
  [RelationshipTypes.Styles]: StylesPart;
  [RelationshipTypes.Numbering]: NumberingPart;
  [RelationshipTypes.Settings]: SettingsPart;
}

export type DependentRelationshipType = keyof DependentParts;

const dependentPartKinds: { [T in DependentRelationshipType]: PartKind<DependentParts[T]> } = {
  [RelationshipTypes.Styles]: {
    partClass: StylesPart,
    createDefault: (pkg) => StylesPart.default(pkg),
  },
  [RelationshipTypes.Numbering]: {
    partClass: NumberingPart,
    createDefault: () => NumberingPart.new(),
  },
  [RelationshipTypes.Settings]: {
    partClass: SettingsPart,
    createDefault: (pkg) => SettingsPart.default(pkg),
  },
};

const corePropsKind: PartKind<CorePropsPart> = {
  partClass: CorePropsPart,
  createDefault: (pkg) => CorePropsPart.default(pkg),
};

/**
 * Target of the `type` relationship from `source`. When there is none, a default
 * part of `kind` is created, registered with `pkg` and related to `source`.
 */
export function resolveRelatedPart<P extends Part>(
  source: RelationshipSource,
  type: string,
  kind: PartKind<P>,
  pkg: OpenXmlPackage,
): P {
  const existing = source.rels.partByType(type);

  if (existing == null) {
    const part = kind.createDefault(pkg);
    source.relateTo(part, type);
    return part;
  }

  if (existing instanceof kind.partClass) return existing;

  throw new InvariantViolation(`'${existing.path}' cannot be the target of a ${type} relationship`, {
    type,
    path: existing.path,
  });
}

export function resolveDependentPart<T extends DependentRelationshipType>(
  source: RelationshipSource,
  type: T,
  pkg: OpenXmlPackage,
): DependentParts[T] {
  return resolveRelatedPart(source, type, dependentPartKinds[type], pkg);
}

export function resolveCorePropsPart(pkg: OpenXmlPackage): CorePropsPart {
  return resolveRelatedPart(pkg, RelationshipTypes.CoreProperties, corePropsKind, pkg);
}
