/**
 * comment.ts — Mapping-comment codec
 *
 * A parameter's comment field carries its formula binding:
 *
 *   CA0:L #Length of the main beam
 *   ^^^ ^  ^^^^^^^^^^^^^^^^^^^^^^^^
 *   |   |  note (everything after the first "#", verbatim)
 *   |   symbol
 *   namespace ("CA" + digits)
 *
 * Both directions are total: anything that does not match decodes to the
 * empty record, so free text typed by users in the CAD application never
 * breaks a read.
 */

// ─── Types ───────────────────────────────────────────────

export interface MappingRecord {
  symbol: string | null;
  note: string | null;
}

export const DEFAULT_NAMESPACE = "CA0";

export const EMPTY_MAPPING: Readonly<MappingRecord> = Object.freeze({
  symbol: null,
  note: null,
});

const NAMESPACE_PREFIX = "CA";

function emptyMapping(): MappingRecord {
  return { symbol: null, note: null };
}

// ─── Validation ──────────────────────────────────────────

/** "CA" followed by one or more decimal digits */
export function isValidNamespace(namespace: string): boolean {
  if (!namespace.startsWith(NAMESPACE_PREFIX) || namespace.length < 3) return false;
  return /^\d+$/.test(namespace.slice(NAMESPACE_PREFIX.length));
}

export function isValidSymbol(symbol: string): boolean {
  const s = symbol.trim();
  return s.length > 0 && !s.includes(":");
}

// ─── Decode ──────────────────────────────────────────────

export function decodeComment(raw: string): MappingRecord {
  if (!raw || !raw.trim()) return emptyMapping();

  const comment = raw.trim();

  // Only the first "#" delimits; the rest belongs to the note.
  let mappingPart = comment;
  let note: string | null = null;
  const hashIdx = comment.indexOf("#");
  if (hashIdx !== -1) {
    mappingPart = comment.slice(0, hashIdx);
    note = comment.slice(hashIdx + 1).trim() || null;
  }

  mappingPart = mappingPart.trim();
  const colonIdx = mappingPart.indexOf(":");
  if (colonIdx === -1) return emptyMapping();

  const namespace = mappingPart.slice(0, colonIdx).trim();
  const symbol = mappingPart.slice(colonIdx + 1).trim();

  if (!isValidNamespace(namespace)) return emptyMapping();
  if (!symbol || symbol.includes(":")) return emptyMapping();

  return { symbol, note };
}

// ─── Encode ──────────────────────────────────────────────

/**
 * Build the comment string for a binding. A note is never written without
 * a symbol, and is written as-is: "#" and backticks inside it are not escaped.
 */
export function encodeComment(
  symbol: string | null | undefined,
  note?: string | null,
  namespace: string = DEFAULT_NAMESPACE,
): string {
  if (!symbol) return "";

  let comment = `${namespace}:${symbol}`;
  if (note && note.trim()) {
    comment = `${comment} #${note.trim()}`;
  }
  return comment;
}

// ─── Symbol Index ────────────────────────────────────────

export interface SymbolConflict {
  symbol: string;
  parameters: string[];
}

export interface SymbolIndex {
  /** symbol → name of the first parameter bound to it */
  symbols: Record<string, string>;
  conflicts: SymbolConflict[];
}

/**
 * Index decoded bindings by symbol. A symbol claimed by more than one
 * parameter is reported once in `conflicts`, listing every claimant in order.
 */
export function indexSymbols(
  parameters: ReadonlyArray<{ name: string; mapping: string | null }>,
): SymbolIndex {
  const owners = new Map<string, string[]>();
  for (const p of parameters) {
    if (!p.mapping) continue;
    const list = owners.get(p.mapping);
    if (list) list.push(p.name);
    else owners.set(p.mapping, [p.name]);
  }

  const conflicts: SymbolConflict[] = [];
  for (const [symbol, names] of owners) {
    if (names.length > 1) conflicts.push({ symbol, parameters: names });
  }
  // fromEntries defines own properties, so "__proto__" is kept as a key.
  const symbols = Object.fromEntries(
    [...owners].map(([symbol, names]): [string, string] => [symbol, names[0]]),
  );
  return { symbols, conflicts };
}

/** Parameter bound to `symbol`, ignoring keys inherited from Object.prototype */
export function symbolOwner(index: SymbolIndex, symbol: string): string | undefined {
  return Object.hasOwn(index.symbols, symbol) ? index.symbols[symbol] : undefined;
}
