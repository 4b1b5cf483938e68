import type { ContextPayload } from "../cognition/types.js";
import type { Outcome } from "../experience/types.js";

export interface ResponderReply {
  readonly text: string;
  readonly outcomeHint?: Outcome;
}

/** Produces the agent's reply for a turn. Honour the signal; it fires on timeout. */
export interface Responder {
  generate(payload: ContextPayload, signal: AbortSignal): Promise<ResponderReply>;
}
