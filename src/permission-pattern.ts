/**
 * Permission glob patterns
 *
 * Three-tier CompiledPattern design:
 * - "all"   → "*" matches everything, short-circuit return
 * - "exact" → no wildcards, direct string comparison, zero RegExp overhead
 * - "regex" → contains wildcards, compiled into an anchored RegExp
 *
 * Shell-style semantics over the whole string:
 * - "*" matches any run of characters, "/" included ("tests/*" covers nested files)
 * - "?" matches exactly one character
 * - "[abc]" / "[a-z]" match a class, "[!abc]" its complement
 * Every other character is literal.
 */

export type CompiledPattern =
  | { kind: "all" }
  | { kind: "exact"; value: string }
  | { kind: "regex"; value: RegExp };

const WILDCARD_CHARS = /[*?[]/;

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Translate one bracket expression starting at `start` (the "[")
 *
 * Returns null when the bracket is never closed; the "[" is then literal.
 */
function translateClass(pattern: string, start: number): { source: string; end: number } | null {
  let i = start + 1;
  let negate = false;
  if (pattern[i] === "!") {
    negate = true;
    i += 1;
  }
  // A "]" right after the opening bracket is part of the class
  let body = "";
  if (pattern[i] === "]") {
    body += "\\]";
    i += 1;
  }
  while (i < pattern.length && pattern[i] !== "]") {
    const ch = pattern[i];
    body += ch === "\\" || ch === "^" || ch === "[" ? `\\${ch}` : ch;
    i += 1;
  }
  if (i >= pattern.length) return null;
  return { source: `[${negate ? "^" : ""}${body}]`, end: i };
}

function translate(pattern: string): string {
  let out = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "*") {
      out += ".*";
    } else if (ch === "?") {
      out += ".";
    } else if (ch === "[") {
      const cls = translateClass(pattern, i);
      if (cls) {
        out += cls.source;
        i = cls.end;
      } else {
        out += "\\[";
      }
    } else {
      out += escapeRegex(ch);
    }
  }
  return out;
}

const cache = new Map<string, CompiledPattern>();

export function compilePattern(pattern: string): CompiledPattern {
  const cached = cache.get(pattern);
  if (cached) return cached;

  let compiled: CompiledPattern;
  if (pattern === "*") {
    compiled = { kind: "all" };
  } else if (!WILDCARD_CHARS.test(pattern)) {
    compiled = { kind: "exact", value: pattern };
  } else {
    // "s" flag: "*" must also cross newlines in multi-line shell commands
    compiled = { kind: "regex", value: new RegExp(`^${translate(pattern)}$`, "s") };
  }
  cache.set(pattern, compiled);
  return compiled;
}

export function matchesPattern(value: string, pattern: string | CompiledPattern): boolean {
  const compiled = typeof pattern === "string" ? compilePattern(pattern) : pattern;
  switch (compiled.kind) {
    case "all":
      return true;
    case "exact":
      return value === compiled.value;
    case "regex":
      return compiled.value.test(value);
  }
}
