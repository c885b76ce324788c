import path from "node:path";
import type { Tool, ValidatedArgs } from "../types/ToolSpec.js";
import type { DenyReason, PolicyDecision, PolicySnapshot } from "../types/Policy.js";
import type { Session } from "../types/Session.js";

/**
 * Policy configuration accepted by the gate. Missing fields are the
 * restrictive default.
 */
export interface PolicyConfig {
  allowNetwork?: boolean;
  allowedDomains?: string[];
  allowWrites?: boolean;
  /** Defaults to the process working directory */
  workspaceRoot?: string;
  deniedTools?: string[];
}

const ALLOW: PolicyDecision = Object.freeze({ allowed: true });

function deny(reason: DenyReason): PolicyDecision {
  return Object.freeze({ allowed: false, reason });
}

/**
 * Build a frozen policy snapshot from configuration.
 */
export function createPolicySnapshot(config: PolicyConfig = {}): PolicySnapshot {
  return Object.freeze({
    allowNetwork: config.allowNetwork ?? false,
    allowedDomains: Object.freeze(
      (config.allowedDomains ?? []).map(normalizeHost).filter((d) => d.length > 0),
    ),
    allowWrites: config.allowWrites ?? false,
    workspaceRoot: path.resolve(config.workspaceRoot ?? process.cwd()),
    deniedTools: Object.freeze([...(config.deniedTools ?? [])]),
  });
}

/**
 * Policy gate: decides whether a validated tool call may run.
 * Decisions are a pure function of (tool, args, policy snapshot).
 */
export class PolicyGate {
  private current: PolicySnapshot;

  constructor(config: PolicyConfig = {}) {
    this.current = createPolicySnapshot(config);
  }

  /**
   * Policy in force for sessions that start now.
   */
  snapshot(): PolicySnapshot {
    return this.current;
  }

  /**
   * Swap in a new policy. Sessions already running keep their snapshot.
   */
  reload(config: PolicyConfig): PolicySnapshot {
    const next = createPolicySnapshot(config);
    this.current = next;
    return next;
  }

  /**
   * Authorize a call against the snapshot the session captured at start.
   */
  authorize(
    tool: Tool,
    args: ValidatedArgs,
    session: Pick<Session, "policy">,
  ): PolicyDecision {
    return evaluatePolicy(session.policy, tool, args);
  }

  /**
   * Human-readable summary for the system prompt.
   */
  describe(policy: PolicySnapshot = this.current): string {
    return describePolicy(policy);
  }
}

/**
 * Fixed precedence, first match wins:
 * network, then filesystem-write, then the deny list.
 */
export function evaluatePolicy(
  policy: PolicySnapshot,
  tool: Pick<Tool, "name" | "riskClass" | "targetArg">,
  args: ValidatedArgs,
): PolicyDecision {
  if (tool.riskClass === "network") {
    if (!policy.allowNetwork) return deny("network_disabled");
    if (tool.targetArg !== undefined) {
      const host = extractHost(args[tool.targetArg]);
      if (host === undefined || !isDomainAllowed(host, policy.allowedDomains)) {
        return deny("domain_not_allowed");
      }
    }
  }

  if (tool.riskClass === "filesystem-write") {
    const target = args[tool.targetArg ?? "path"];
    if (typeof target !== "string" || !isInsideRoot(target, policy.workspaceRoot)) {
      return deny("path_outside_workspace");
    }
    if (!policy.allowWrites) return deny("writes_disabled");
  }

  if (policy.deniedTools.includes(tool.name)) return deny("tool_denied");

  return ALLOW;
}

export function describePolicy(policy: PolicySnapshot): string {
  const domains =
    policy.allowedDomains.length > 0 ? policy.allowedDomains.join(", ") : "(none)";
  const denied =
    policy.deniedTools.length > 0 ? policy.deniedTools.join(", ") : "(none)";
  return [
    `Network access: ${policy.allowNetwork ? `enabled (domains: ${domains})` : "disabled"}`,
    `File writes: ${policy.allowWrites ? "enabled" : "disabled"} (workspace: ${policy.workspaceRoot})`,
    `Denied tools: ${denied}`,
  ].join("\n");
}

/**
 * Host equals an allowed domain or is a subdomain of one.
 */
export function isDomainAllowed(host: string, allowedDomains: readonly string[]): boolean {
  const h = normalizeHost(host);
  return allowedDomains.some((d) => h === d || h.endsWith(`.${d}`));
}

/**
 * Lexical containment check; the executor repeats it on real paths.
 */
export function isInsideRoot(target: string, root: string): boolean {
  const resolved = path.resolve(root, target);
  const rel = path.relative(root, resolved);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

function extractHost(value: unknown): string | undefined {
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const raw = value.trim();
  if (raw.includes("://")) {
    try {
      return new URL(raw).hostname;
    } catch {
      return undefined;
    }
  }
  return raw.split(/[/:]/, 1)[0];
}

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, "");
}
