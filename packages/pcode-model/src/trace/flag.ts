let cachedTrace: boolean | undefined;
let cachedStderr: boolean | undefined;

function flagSet(name: string): boolean {
  const value = (process.env[name] ?? "").toLowerCase();
  return value === "1" || value === "true";
}

export function traceEnabled(): boolean {
  if (cachedTrace === undefined) {
    cachedTrace = flagSet("PCODE_TRACE");
  }
  return cachedTrace;
}

export function traceToStderr(): boolean {
  if (cachedStderr === undefined) {
    cachedStderr = flagSet("PCODE_TRACE_STDERR");
  }
  return cachedStderr;
}

export function resetTraceFlagsForTest(): void {
  cachedTrace = undefined;
  cachedStderr = undefined;
}
