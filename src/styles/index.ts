export * from "./style";
export * from "./styles";
export * from "./styles-part";
export * from "./style-names";
