import { WordDocument } from "../word-document/word-document";
import type { DefaultOptions } from "./types";
import { DEFAULT_OPTIONS } from "./consts";

export function createDocument(userOptions?: Partial<DefaultOptions>): WordDocument {
  return WordDocument.create({ ...DEFAULT_OPTIONS, ...userOptions });
}
