import { WordDocument } from "../word-document/word-document";
import type { DefaultOptions } from "./types";
import { DEFAULT_OPTIONS } from "./consts";

export function openAsync(
  data: Buffer | ArrayBuffer | Uint8Array,
  userOptions?: Partial<DefaultOptions>,
): Promise<WordDocument> {
  const ops = { ...DEFAULT_OPTIONS, ...userOptions };
  return WordDocument.load(data, ops);
}
