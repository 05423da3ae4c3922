import { PcodeError } from "../errors.js";

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonical(v: unknown, indent: string, depth: number): string {
  if (v === null) return "null";
  if (typeof v === "number") {
    if (!Number.isInteger(v)) throw new PcodeError("E_CANON_FLOAT");
    return String(v);
  }
  if (typeof v === "string") return JSON.stringify(v);
  if (typeof v === "boolean") return v ? "true" : "false";

  const pad = indent ? `\n${indent.repeat(depth + 1)}` : "";
  const close = indent ? `\n${indent.repeat(depth)}` : "";
  const sep = indent ? ": " : ":";

  if (Array.isArray(v)) {
    if (v.length === 0) return "[]";
    return "[" + v.map((item: unknown) => pad + canonical(item, indent, depth + 1)).join(",") + close + "]";
  }
  if (typeof v === "object" && v !== null && isPlainObject(v)) {
    const keys = Object.keys(v)
      .filter((k) => v[k] !== undefined)
      .sort();
    if (keys.length === 0) return "{}";
    const entries = keys.map((k) => pad + JSON.stringify(k) + sep + canonical(v[k], indent, depth + 1));
    return "{" + entries.join(",") + close + "}";
  }
  throw new PcodeError("E_CANON_TYPE");
}

export function canonicalJsonBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonical(value, "", 0));
}

export function canonicalJson(value: unknown): string {
  return `${canonical(value, "", 0)}\n`;
}

export function prettyCanonicalJson(value: unknown): string {
  return `${canonical(value, "  ", 0)}\n`;
}
