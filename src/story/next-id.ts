import { DocxError } from "../common/errors";

const ID_ATTRIBUTE = "id";
const ID_PATTERN = /^\d+$/;

/**
 * Next free value for an un-namespaced `id` attribute in the document holding
 * `root`: one more than the largest id present, whatever element carries it.
 * Gaps are not reused and values that are not plain digits are skipped.
 * Nothing is reserved, so the id counts only once an element bearing it is
 * written. Throws `DocxError` when the next id is not a safe integer.
 */
export function nextId(root: Element): number {
  let max = 0n;

  for (const el of selfAndDescendants(root)) {
    for (let i = 0, l = el.attributes.length; i < l; i++) {
      const attr = el.attributes.item(i);

      if (attr == null || attr.localName != ID_ATTRIBUTE || attr.namespaceURI) continue;
      if (!ID_PATTERN.test(attr.value)) continue;

      const id = BigInt(attr.value);
      if (id > max) max = id;
    }
  }

  // ids start at 1, and a lone "0" still leaves 1 free
  const next = max + 1n;

  if (next > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DocxError(`next id ${next} is past the largest safe integer`, { maxId: String(max) });
  }

  return Number(next);
}

function* selfAndDescendants(root: Element): Generator<Element> {
  yield root;

  const all = root.getElementsByTagName("*");
  for (let i = 0, l = all.length; i < l; i++) {
    const el = all.item(i);
    if (el) yield el;
  }
}
