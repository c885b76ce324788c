/**
 * Immutable policy configuration. A session captures the snapshot that is
 * current when it starts and uses it for every decision.
 */
export interface PolicySnapshot {
  readonly allowNetwork: boolean;
  /** Domains network tools may reach; subdomains match too */
  readonly allowedDomains: readonly string[];
  readonly allowWrites: boolean;
  /** Absolute path all filesystem writes must stay inside */
  readonly workspaceRoot: string;
  readonly deniedTools: readonly string[];
}

/**
 * Stable deny reason codes, shown to the model and asserted in tests.
 */
export type DenyReason =
  | "network_disabled"
  | "domain_not_allowed"
  | "path_outside_workspace"
  | "writes_disabled"
  | "tool_denied";

export type PolicyDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenyReason };
