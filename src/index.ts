export * from "./api";
export * from "./common";
export * from "./document";
export * from "./document-props";
export * from "./header-footer";
export * from "./numbering";
export * from "./settings";
export * from "./story";
export * from "./styles";
export * from "./word-document";
