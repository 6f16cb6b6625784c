export * from "./consts";
export * from "./create-document";
export * from "./open-async";
export * from "./types";
