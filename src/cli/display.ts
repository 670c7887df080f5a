/**
 * Shared display helpers for the chat CLI.
 */

import type { RefreshSummary } from "../lib/llm/model-refresh";
import type { Message, OrchestratedResponse, ProviderStatus, ToolDefinition } from "../lib/llm/types";

// ─── Responses ───────────────────────────────────────────────────────────────

export function formatAttempts(response: OrchestratedResponse): string {
  return response.attempts
    .map((a) => `${a.provider}/${a.model} ${a.success ? "ok" : "failed"} ${a.latencyMs}ms`)
    .join(" -> ");
}

export function printResponseFooter(response: OrchestratedResponse, indent = "  "): void {
  console.log();
  if (response.outcome === "degraded") {
    console.log(`${indent}[degraded] ${response.failure}`);
  } else {
    console.log(`${indent}Provider:    ${response.provider} (${response.model})`);
  }
  console.log(`${indent}Latency:     ${response.latencyMs}ms`);
  console.log(
    `${indent}Tokens:      ${response.usage.promptTokens} in / ${response.usage.completionTokens} out`
  );
  if (response.attempts.length > 1) {
    console.log(`${indent}Attempts:    ${formatAttempts(response)}`);
  }
}

// ─── Providers & Tools ───────────────────────────────────────────────────────

export function formatProviderStatus(status: ProviderStatus): string {
  const key = status.hasValidApiKey ? "key" : "no key";
  const failed =
    status.lastFailureAt !== null ? `, last failure ${new Date(status.lastFailureAt).toISOString()}` : "";
  return `${status.name.padEnd(10)} ${status.model.padEnd(32)} ${status.state} (${key}${failed})`;
}

export function printProviders(statuses: ProviderStatus[], indent = "  "): void {
  console.log(`${indent}--- Providers ---`);
  for (const status of statuses) {
    console.log(`${indent}  ${formatProviderStatus(status)}`);
  }
}

export function printTools(tools: ToolDefinition[], indent = "  "): void {
  console.log(`${indent}--- Tools ---`);
  for (const tool of tools) {
    console.log(`${indent}  ${tool.name.padEnd(14)} ${tool.description}`);
  }
}

export function printRefreshSummary(summary: RefreshSummary | null, indent = "  "): void {
  if (!summary) {
    console.log(`${indent}Model refresh already in progress.`);
    return;
  }
  console.log(`${indent}Refreshed:   ${summary.refreshed.join(", ") || "(none)"}`);
  for (const [provider, model] of Object.entries(summary.upgraded)) {
    console.log(`${indent}Upgraded:    ${provider} -> ${model}`);
  }
  if (summary.failed.length > 0) {
    console.log(`${indent}Failed:      ${summary.failed.join(", ")}`);
  }
}

// ─── History ─────────────────────────────────────────────────────────────────

export function printHistory(messages: Message[], indent = "  "): void {
  console.log(`${indent}--- Conversation History (${messages.length} messages) ---`);
  for (const message of messages) {
    const label = message.toolName ? `${message.role}:${message.toolName}` : message.role;
    message.content.split("\n").forEach((line, i) => {
      console.log(`${indent}  ${i === 0 ? `[${label}]`.padEnd(12) : " ".repeat(12)} ${line}`);
    });
  }
}
