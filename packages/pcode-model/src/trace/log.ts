import type { TraceTag } from "./tags.js";
import { resetTraceFlagsForTest, traceEnabled, traceToStderr } from "./flag.js";

const log: TraceTag[] = [];

export function emitTag(tag: TraceTag): void {
  if (!traceEnabled()) return;
  if (traceToStderr()) {
    process.stderr.write(`${JSON.stringify({ ts: Date.now(), tag })}\n`);
  }
  log.push(tag);
}

export function flush(): TraceTag[] {
  const out = log.slice();
  log.length = 0;
  return out;
}

export function resetTraceForTest(): void {
  resetTraceFlagsForTest();
  log.length = 0;
}
