export * from "./common";
export * from "./dom";
export * from "./paragraph";
export * from "./run";
export * from "./document-part";
export * from "./document-view";
