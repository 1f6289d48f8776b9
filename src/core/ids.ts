// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Identifiers
// ═══════════════════════════════════════════════════════════════════════════════

let counter = 0;

/** Time-ordered, process-unique id: `<prefix>_<base36 time>_<counter>_<random>`. */
export function generateId(prefix?: string): string {
  const body = `${Date.now().toString(36)}_${(++counter).toString(36)}_${Math.random().toString(36).slice(2, 7)}`;
  return prefix ? `${prefix}_${body}` : body;
}
