export interface DefaultOptions {
  /** Whether to strip the XML declaration before parsing part content */
  trimXmlDeclaration: boolean;
  /** Whether to log skipped parts and deprecated lookups with console.warn */
  debug: boolean;
}
