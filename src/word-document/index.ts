export * from "./word-document";
