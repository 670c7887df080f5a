import { createLogger, type Logger } from "../logger";
import { errorMessage } from "./errors";
import type { ProviderRegistry } from "./registry";
import type { LLMProvider, Model } from "./types";

export const DEFAULT_REFRESH_INTERVAL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_REFRESH_INITIAL_DELAY_MS = 2 * 60 * 1000;

export interface ModelRefreshOptions {
  intervalMs?: number;
  initialDelayMs?: number;
  logger?: Logger;
}

export interface RefreshSummary {
  refreshed: string[];
  /** provider name → new model id */
  upgraded: Record<string, string>;
  failed: string[];
}

// ─── Model family heuristics ─────────────────────────────────────────────────

/**
 * Family name with vendor prefix and version tokens removed:
 * "openai/gpt-4-turbo-2024-04-09" → "gpt-turbo", "gpt-4-turbo-latest" → "gpt-turbo".
 */
export function baseModelName(modelId: string): string {
  return modelId
    .toLowerCase()
    .replace(/^[^/]+\//, "")
    .replace(/-latest\b/g, "")
    .replace(/-\d+(\.\d+)?/g, "");
}

/** Every numeric group in the id, in order: "claude-3-5-sonnet-20241022" → [3, 5, 20241022] */
export function modelVersion(modelId: string): number[] {
  const id = modelId.replace(/^[^/]+\//, "");
  return (id.match(/\d+/g) ?? []).map(Number);
}

export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function coversCapabilities(candidate: Model, current: Model): boolean {
  return (
    (candidate.supportsToolCalls || !current.supportsToolCalls) &&
    (candidate.supportsVision || !current.supportsVision) &&
    candidate.maxContextLength >= current.maxContextLength
  );
}

/**
 * Newer model in the same family as `current`, or null. A "latest" alias
 * wins outright; otherwise the highest version among capability-compatible
 * entries, provided it is strictly newer than the current one.
 */
export function findUpgrade(current: Model, catalog: readonly Model[]): Model | null {
  // Already tracking the moving alias
  if (current.id.includes("latest")) return null;

  const family = baseModelName(current.id);
  const siblings = catalog.filter(
    (m) => m.id !== current.id && baseModelName(m.id) === family
  );

  const latest = siblings.find((m) => m.id.includes("latest"));
  if (latest) return latest;

  const currentVersion = modelVersion(current.id);
  let best: Model | null = null;
  for (const candidate of siblings) {
    if (!coversCapabilities(candidate, current)) continue;
    if (!best || compareVersions(modelVersion(candidate.id), modelVersion(best.id)) > 0) {
      best = candidate;
    }
  }

  if (best && compareVersions(modelVersion(best.id), currentVersion) > 0) {
    return best;
  }
  return null;
}

// ─── Scheduler ───────────────────────────────────────────────────────────────

/**
 * Periodically re-reads each credentialed provider's model catalog and moves
 * providers onto newer models of the same family. Runs are single-flight:
 * a request made while one is in progress is dropped.
 */
export class ModelRefreshScheduler {
  private readonly registry: ProviderRegistry;
  private readonly intervalMs: number;
  private readonly initialDelayMs: number;
  private readonly logger: Logger;
  private initialTimer: NodeJS.Timeout | null = null;
  private intervalTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<RefreshSummary> | null = null;

  constructor(registry: ProviderRegistry, options: ModelRefreshOptions = {}) {
    this.registry = registry;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_REFRESH_INITIAL_DELAY_MS;
    this.logger = options.logger ?? createLogger("model-refresh");
  }

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  get isScheduled(): boolean {
    return this.initialTimer !== null || this.intervalTimer !== null;
  }

  start(): void {
    if (this.isScheduled) return;

    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.intervalMs);
      this.intervalTimer.unref();
    }, this.initialDelayMs);
    this.initialTimer.unref();

    this.logger.info(
      { intervalMs: this.intervalMs, initialDelayMs: this.initialDelayMs },
      "Model refresh scheduled"
    );
  }

  stop(): void {
    if (this.initialTimer) clearTimeout(this.initialTimer);
    if (this.intervalTimer) clearInterval(this.intervalTimer);
    this.initialTimer = null;
    this.intervalTimer = null;
    this.logger.info("Model refresh stopped");
  }

  /**
   * Refreshes every credentialed provider. Resolves to null without doing
   * anything when a run is already in progress.
   */
  async refreshAll(): Promise<RefreshSummary | null> {
    if (this.inFlight) {
      this.logger.info("Model refresh already in progress, skipping");
      return null;
    }

    this.inFlight = this.runRefresh();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  /** Re-fetches one provider's catalog without switching its model */
  async refreshProvider(name: string): Promise<boolean> {
    const provider = this.registry.get(name);
    if (!provider) {
      this.logger.warn({ provider: name }, "Provider not found for model refresh");
      return false;
    }
    if (!provider.hasValidApiKey) {
      this.logger.warn(
        { provider: provider.name },
        "Cannot refresh models for provider without valid API key"
      );
      return false;
    }

    try {
      const models = await provider.fetchAvailableModels();
      this.logger.info({ provider: provider.name, count: models.length }, "Refreshed models");
      return true;
    } catch (error) {
      this.logger.error(
        { provider: provider.name, err: errorMessage(error) },
        "Error refreshing models"
      );
      return false;
    }
  }

  private tick(): void {
    this.refreshAll().catch((error: unknown) => {
      this.logger.error({ err: errorMessage(error) }, "Scheduled model refresh failed");
    });
  }

  private async runRefresh(): Promise<RefreshSummary> {
    const summary: RefreshSummary = { refreshed: [], upgraded: {}, failed: [] };
    this.logger.info("Refreshing models for all providers with valid API keys");

    for (const provider of this.registry.list()) {
      if (!provider.hasValidApiKey) continue;
      try {
        const upgradedTo = await this.refreshAndUpgrade(provider);
        summary.refreshed.push(provider.name);
        if (upgradedTo) summary.upgraded[provider.name] = upgradedTo;
      } catch (error) {
        summary.failed.push(provider.name);
        this.logger.error(
          { provider: provider.name, err: errorMessage(error) },
          "Error refreshing models"
        );
      }
    }

    this.logger.info(summary, "Model refresh completed");
    return summary;
  }

  private async refreshAndUpgrade(provider: LLMProvider): Promise<string | null> {
    const models = await provider.fetchAvailableModels();
    this.logger.info({ provider: provider.name, count: models.length }, "Refreshed models");

    const current = provider.currentModel;
    const upgrade = findUpgrade(current, models);
    if (!upgrade) return null;

    const switched = await provider.setModel(upgrade.id);
    if (!switched) {
      this.logger.warn(
        { provider: provider.name, model: upgrade.id },
        "Provider rejected upgraded model"
      );
      return null;
    }

    this.logger.info(
      { provider: provider.name, from: current.id, to: upgrade.id },
      "Upgraded provider model"
    );
    return upgrade.id;
  }
}
