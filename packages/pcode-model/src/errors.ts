export class PcodeError extends Error {
  readonly code: string;
  readonly path: string;

  constructor(code: string, path = "/") {
    super(`${code} ${path}`);
    this.name = "PcodeError";
    this.code = code;
    this.path = path;
  }
}

export function isPcodeError(error: unknown): error is PcodeError {
  return error instanceof PcodeError;
}

function escapePointerSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function pointer(...segments: Array<string | number>): string {
  if (segments.length === 0) return "/";
  return `/${segments.map((segment) => escapePointerSegment(String(segment))).join("/")}`;
}
