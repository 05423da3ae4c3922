import type { ErrorObject } from "ajv";

/** Path segments of the value an ajv error is about, including the offending key. */
export function errorSegments(error: ErrorObject): string[] {
  const base = error.instancePath.split("/").slice(1).map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"));
  if (error.keyword === "additionalProperties") {
    return [...base, String(error.params.additionalProperty)];
  }
  if (error.keyword === "required") {
    return [...base, String(error.params.missingProperty)];
  }
  return base;
}

function keywordScore(keyword: string): number {
  switch (keyword) {
    case "type":
      return 4;
    case "required":
    case "additionalProperties":
      return 3;
    case "const":
    case "minimum":
    case "minLength":
    case "maxItems":
    case "pattern":
      return 2;
    default:
      return 1;
  }
}

/** Shallowest error first; on a tie, structural keywords before value checks. */
export function firstRelevantError(errors: ErrorObject[] | null | undefined): ErrorObject | undefined {
  if (!errors || errors.length === 0) return undefined;
  const ranked = [...errors].sort((a, b) => {
    const depthDiff = errorSegments(a).length - errorSegments(b).length;
    if (depthDiff !== 0) return depthDiff;
    return keywordScore(b.keyword) - keywordScore(a.keyword);
  });
  return ranked[0];
}
