export * from "./xml-parser";
