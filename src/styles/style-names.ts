// Built-in styles whose UI name differs from the name stored in styles.xml.
const styleAliases: [ui: string, internal: string][] = [
  ["Caption", "caption"],
  ["Footer", "footer"],
  ["Header", "header"],
  ["Heading 1", "heading 1"],
  ["Heading 2", "heading 2"],
  ["Heading 3", "heading 3"],
  ["Heading 4", "heading 4"],
  ["Heading 5", "heading 5"],
  ["Heading 6", "heading 6"],
  ["Heading 7", "heading 7"],
  ["Heading 8", "heading 8"],
  ["Heading 9", "heading 9"],
];

const uiToInternal = new Map(styleAliases);
const internalToUi = new Map(styleAliases.map(([ui, internal]) => [internal, ui]));

export function uiStyleNameToInternal(name: string): string {
  return uiToInternal.get(name) ?? name;
}

export function internalStyleNameToUi(name: string): string {
  return internalToUi.get(name) ?? name;
}

/** Style id Word derives from a style name: "heading 1" becomes "Heading1". */
export function styleIdFromName(name: string): string {
  return internalStyleNameToUi(name).replace(/ /g, "");
}
