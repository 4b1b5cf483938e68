import type { Writable } from "node:stream";
import { renderContext } from "../cognition/context.js";
import type { ContextPayload } from "../cognition/types.js";
import type { Responder, ResponderReply } from "./types.js";

/** Writes the rendered context of every turn, then delegates. */
export class TracingResponder implements Responder {
  constructor(
    private readonly inner: Responder,
    private readonly out: Writable,
  ) {}

  generate(payload: ContextPayload, signal: AbortSignal): Promise<ResponderReply> {
    this.out.write(`${renderContext(payload)}\n\n`);
    return this.inner.generate(payload, signal);
  }
}
