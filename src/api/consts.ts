import type { DefaultOptions } from "./types";

export const DEFAULT_OPTIONS: DefaultOptions = {
  trimXmlDeclaration: true,
  debug: false,
};
