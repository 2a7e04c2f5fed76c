// Outcomes of recent model calls, oldest first. Prompts and answers are not kept.

export interface LLMCall {
  label: string;
  elapsed_ms: number;
  ok: boolean;
  error?: string;
  parsed?: boolean;
}

const MAX_CALLS = 50;
const calls: LLMCall[] = [];

export function recordLLMCall(label: string, startedAt: number, outcome: { error: unknown } | { parsed: boolean }): LLMCall {
  const elapsed_ms = Date.now() - startedAt;
  const call: LLMCall = 'error' in outcome
    ? { label, elapsed_ms, ok: false, error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error) }
    : { label, elapsed_ms, ok: true, parsed: outcome.parsed };
  calls.push(call);
  if (calls.length > MAX_CALLS) calls.splice(0, calls.length - MAX_CALLS);
  if (process.env.DEBUG_LLM) console.debug(`[llm] ${label} ms=${elapsed_ms} ok=${call.ok}`, call.error ?? `parsed=${call.parsed}`);
  return call;
}

export function recentLLMCalls(label: string): LLMCall[] {
  return calls.filter(c => c.label === label);
}

export function clearLLMCalls() {
  calls.length = 0;
}
