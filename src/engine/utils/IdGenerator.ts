// ─────────────────────────────────────────────
//  Sequential id generator
//  One counter per prefix, scoped to the owner of the generator
//  so two managers never share a sequence.
// ─────────────────────────────────────────────

export type IdGenerator = (prefix: string) => string;

export function createIdGenerator(): IdGenerator {
  const counters = new Map<string, number>();
  return (prefix: string) => {
    const next = (counters.get(prefix) ?? 0) + 1;
    counters.set(prefix, next);
    return `${prefix}_${next}`;
  };
}
