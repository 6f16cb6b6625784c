export * from "./elements";
export * from "./parts";
