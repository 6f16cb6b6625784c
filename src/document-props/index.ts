export * from "./core-props";
export * from "./core-props-part";
