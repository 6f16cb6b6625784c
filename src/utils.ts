export function splitPath(path: string): [string, string] {
  const si = path.lastIndexOf("/") + 1;
  const folder = si == 0 ? "" : path.substring(0, si);
  const fileName = si == 0 ? path : path.substring(si);

  return [folder, fileName];
}

export function resolvePath(path: string, base: string): string {
  try {
    const prefix = "http://docx/";
    const url = new URL(path, prefix + base).toString();
    return url.substring(prefix.length);
  } catch {
    return `${base}${path}`;
  }
}

/** Reference to `path` as written in a .rels file whose source lives in `baseFolder`. */
export function relativePath(path: string, baseFolder: string): string {
  const base = baseFolder.split("/").filter((x) => x.length > 0);
  const target = path.split("/").filter((x) => x.length > 0);

  let common = 0;
  while (common < base.length && common < target.length - 1 && base[common] == target[common]) {
    common++;
  }

  const up = base.slice(common).map(() => "..");
  return [...up, ...target.slice(common)].join("/");
}

export function normalizePath(path: string) {
  return path.startsWith("/") ? path.substring(1) : path;
}
