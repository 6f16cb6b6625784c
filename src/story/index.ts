export * from "./block-container";
export * from "./next-id";
export * from "./relationship-resolver";
export * from "./story-part";
