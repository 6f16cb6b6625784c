export * from "./numbering";
export * from "./numbering-part";
