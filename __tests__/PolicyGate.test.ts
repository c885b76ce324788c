import { describe, it, expect } from "vitest";
import {
  PolicyGate,
  createPolicySnapshot,
  describePolicy,
  evaluatePolicy,
  isDomainAllowed,
  isInsideRoot,
} from "../src/core/PolicyGate.js";
import type { Tool } from "../src/types/ToolSpec.js";

type GateTool = Pick<Tool, "name" | "riskClass" | "targetArg">;

const pure: GateTool = { name: "calc", riskClass: "pure" };
const reader: GateTool = { name: "read", riskClass: "filesystem-read" };
const writer: GateTool = { name: "write", riskClass: "filesystem-write" };
const fetcher: GateTool = { name: "fetch", riskClass: "network", targetArg: "url" };
const pinger: GateTool = { name: "ping", riskClass: "network" };

describe("PolicyGate", () => {
  describe("createPolicySnapshot", () => {
    it("defaults to the restrictive policy", () => {
      const policy = createPolicySnapshot({ workspaceRoot: "/srv/ws" });
      expect(policy).toEqual({
        allowNetwork: false,
        allowedDomains: [],
        allowWrites: false,
        workspaceRoot: "/srv/ws",
        deniedTools: [],
      });
      expect(Object.isFrozen(policy)).toBe(true);
    });

    it("normalizes allowed domains", () => {
      const policy = createPolicySnapshot({ allowedDomains: [" Example.COM. ", ""] });
      expect(policy.allowedDomains).toEqual(["example.com"]);
    });
  });

  describe("evaluatePolicy", () => {
    const closed = createPolicySnapshot({ workspaceRoot: "/srv/ws" });
    const open = createPolicySnapshot({
      workspaceRoot: "/srv/ws",
      allowNetwork: true,
      allowedDomains: ["example.com"],
      allowWrites: true,
    });

    it("allows pure and read-only tools", () => {
      expect(evaluatePolicy(closed, pure, {})).toEqual({ allowed: true });
      expect(evaluatePolicy(closed, reader, { path: "/etc/hosts" })).toEqual({ allowed: true });
    });

    it("denies network tools when the network is off", () => {
      expect(evaluatePolicy(closed, fetcher, { url: "https://example.com" })).toEqual({
        allowed: false,
        reason: "network_disabled",
      });
    });

    it("scopes network targets to allowed domains and subdomains", () => {
      const verdict = (url: unknown) => evaluatePolicy(open, fetcher, { url });
      expect(verdict("https://example.com/a").allowed).toBe(true);
      expect(verdict("https://api.EXAMPLE.com/a").allowed).toBe(true);
      expect(verdict("api.example.com:8080/path").allowed).toBe(true);
      expect(verdict("https://notexample.com/")).toEqual({
        allowed: false,
        reason: "domain_not_allowed",
      });
      expect(verdict(42)).toEqual({ allowed: false, reason: "domain_not_allowed" });
    });

    it("does not scope network tools without a target argument", () => {
      expect(evaluatePolicy(open, pinger, {})).toEqual({ allowed: true });
    });

    it("checks the write path before the write switch", () => {
      expect(evaluatePolicy(closed, writer, { path: "../escape.txt" })).toEqual({
        allowed: false,
        reason: "path_outside_workspace",
      });
      expect(evaluatePolicy(closed, writer, { path: "notes/a.txt" })).toEqual({
        allowed: false,
        reason: "writes_disabled",
      });
      expect(evaluatePolicy(open, writer, { path: "/etc/passwd" })).toEqual({
        allowed: false,
        reason: "path_outside_workspace",
      });
      expect(evaluatePolicy(open, writer, { path: "notes/a.txt" })).toEqual({ allowed: true });
    });

    it("reads the write target from targetArg", () => {
      const saver: GateTool = { name: "save", riskClass: "filesystem-write", targetArg: "file" };
      expect(evaluatePolicy(open, saver, { path: "/etc/x", file: "ok.txt" })).toEqual({
        allowed: true,
      });
      expect(evaluatePolicy(open, saver, { path: "ok.txt" })).toEqual({
        allowed: false,
        reason: "path_outside_workspace",
      });
    });

    it("applies the deny list last", () => {
      const denying = createPolicySnapshot({
        workspaceRoot: "/srv/ws",
        allowWrites: true,
        deniedTools: ["calc", "write", "fetch"],
      });
      expect(evaluatePolicy(denying, pure, {})).toEqual({ allowed: false, reason: "tool_denied" });
      expect(evaluatePolicy(denying, writer, { path: "a.txt" })).toEqual({
        allowed: false,
        reason: "tool_denied",
      });
      expect(evaluatePolicy(denying, fetcher, { url: "https://example.com" })).toEqual({
        allowed: false,
        reason: "network_disabled",
      });
    });
  });

  describe("reload", () => {
    it("swaps the current snapshot without changing earlier ones", () => {
      const gate = new PolicyGate({ workspaceRoot: "/srv/ws" });
      const before = gate.snapshot();
      const after = gate.reload({ workspaceRoot: "/srv/ws", allowWrites: true });

      expect(gate.snapshot()).toBe(after);
      expect(before.allowWrites).toBe(false);
      const tool: Tool = { ...writer, inputSchema: {}, execute: () => "" };
      expect(gate.authorize(tool, { path: "a" }, { policy: before })).toEqual({
        allowed: false,
        reason: "writes_disabled",
      });
    });

    it("gives the same decision for the same call on every attempt and in every session", () => {
      const gate = new PolicyGate({
        workspaceRoot: "/srv/ws",
        allowNetwork: true,
        allowedDomains: ["example.com"],
      });
      const tool: Tool = { ...fetcher, inputSchema: {}, execute: () => "" };
      const first = { policy: gate.snapshot() };
      const second = { policy: gate.snapshot() };
      const decide = (session: { policy: ReturnType<PolicyGate["snapshot"]> }) =>
        [{ url: "https://example.com/a" }, { url: "https://evil.test/" }].map((args) =>
          gate.authorize(tool, args, session),
        );

      expect(decide(first)).toEqual([
        { allowed: true },
        { allowed: false, reason: "domain_not_allowed" },
      ]);
      expect(decide(first)).toEqual(decide(first));
      expect(decide(second)).toEqual(decide(first));
    });
  });

  describe("describePolicy", () => {
    it("summarizes the snapshot for the prompt", () => {
      const policy = createPolicySnapshot({
        workspaceRoot: "/srv/ws",
        allowNetwork: true,
        allowedDomains: ["example.com", "docs.test"],
        deniedTools: ["http_get"],
      });
      expect(describePolicy(policy)).toBe(
        [
          "Network access: enabled (domains: example.com, docs.test)",
          "File writes: disabled (workspace: /srv/ws)",
          "Denied tools: http_get",
        ].join("\n"),
      );
    });

    it("marks empty lists", () => {
      const gate = new PolicyGate({ workspaceRoot: "/srv/ws" });
      expect(gate.describe()).toBe(
        "Network access: disabled\nFile writes: disabled (workspace: /srv/ws)\nDenied tools: (none)",
      );
    });
  });

  describe("helpers", () => {
    it("isInsideRoot compares paths lexically", () => {
      expect(isInsideRoot("a/b.txt", "/srv/ws")).toBe(true);
      expect(isInsideRoot("/srv/ws", "/srv/ws")).toBe(true);
      expect(isInsideRoot("..foo", "/srv/ws")).toBe(true);
      expect(isInsideRoot("../ws2/a", "/srv/ws")).toBe(false);
      expect(isInsideRoot("/srv/ws-other/a", "/srv/ws")).toBe(false);
    });

    it("isDomainAllowed matches whole labels only", () => {
      expect(isDomainAllowed("a.b.example.com", ["example.com"])).toBe(true);
      expect(isDomainAllowed("example.com.", ["example.com"])).toBe(true);
      expect(isDomainAllowed("badexample.com", ["example.com"])).toBe(false);
      expect(isDomainAllowed("example.com", [])).toBe(false);
    });
  });
});
