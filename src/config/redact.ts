const SECRET_KEYS: ReadonlySet<string> = new Set(["OPENAI_API_KEY", "API_KEY"]);

export function redactConfigSnapshot(obj: unknown): unknown {
  // shallow-ish safe redaction: replaces known secret values anywhere in the tree
  const seen = new WeakSet<object>();

  function walk(v: unknown): unknown {
    if (v && typeof v === "object") {
      if (seen.has(v)) return v;
      seen.add(v);

      if (Array.isArray(v)) return v.map(walk);

      const out: Record<string, unknown> = {};
      for (const [k, val] of Object.entries(v)) {
        if (SECRET_KEYS.has(k)) out[k] = val == null ? val : "<redacted>";
        else out[k] = walk(val);
      }
      return out;
    }
    return v;
  }

  return walk(obj);
}
