export * from "./content-types";
export * from "./errors";
export * from "./open-xml-package";
export * from "./part";
export * from "./relationship";
