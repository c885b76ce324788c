import { createTaggedError } from "../core/Retry.js";
import type { DecisionProvider, DecisionRequest } from "./DecisionProvider.js";

/**
 * One scripted reply: text, an error to throw, or a function of the request.
 */
export type ScriptedReply =
  | string
  | Error
  | ((request: DecisionRequest) => string | Promise<string>);

/**
 * Replays queued replies in order. Throws `script_exhausted` when empty.
 */
export class ScriptedDecisionProvider implements DecisionProvider {
  readonly name = "scripted";
  readonly requests: DecisionRequest[] = [];
  private readonly queue: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.queue = [...replies];
  }

  push(...replies: ScriptedReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.queue.length;
  }

  async decide(request: DecisionRequest): Promise<string> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw createTaggedError("script_exhausted", "No scripted decision left");
    }
    if (next instanceof Error) throw next;
    if (typeof next === "function") return next(request);
    return next;
  }
}
