import * as crypto from 'crypto';

/**
 * Canonical JSON serialization for deterministic hashing.
 *
 * Rules:
 * 1. Object keys sorted recursively (code-unit order)
 * 2. BigInt → decimal string
 * 3. Map → entries array sorted by key
 * 4. Set → sorted array
 * 5. Date → ISO string
 * 6. Arrays keep their order
 * 7. undefined object members are dropped
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function canonicalize(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (typeof value !== 'object' || value === null) {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (value instanceof Map) {
    return [...value.entries()]
      .map(([k, v]): [unknown, unknown] => [canonicalize(k), canonicalize(v)])
      .sort((a, b) => compareKeys(String(a[0]), String(b[0])));
  }

  if (value instanceof Set) {
    return [...value]
      .map(canonicalize)
      .sort((a, b) => compareKeys(String(a), String(b)));
  }

  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  const sorted: Record<string, unknown> = {};
  for (const [key, member] of Object.entries(value).sort((a, b) => compareKeys(a[0], b[0]))) {
    const canonical = canonicalize(member);
    if (canonical !== undefined) {
      sorted[key] = canonical;
    }
  }
  return sorted;
}

export function computeHash(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
