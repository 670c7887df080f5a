import type { LLMProvider, ProviderStatus } from "./types";

export const DEFAULT_BACKOFF_MS = 5 * 60 * 1000;

export type ProviderState = ProviderStatus["state"];

export type ProviderFilter = (provider: LLMProvider) => boolean;

export interface ProviderRegistryOptions {
  backoffMs?: number;
  now?: () => number;
}

/**
 * Configured providers plus their live bookkeeping: initialization outcome,
 * last failure time and the active selection.
 *
 * Not synchronized on its own. Every read-then-write goes through
 * FailoverController, which serializes access.
 */
export class ProviderRegistry {
  readonly backoffMs: number;
  private readonly providers: LLMProvider[];
  private readonly initialized = new Map<string, boolean>();
  private readonly failures = new Map<string, number>();
  private activeProvider: LLMProvider | undefined;
  private readonly now: () => number;

  constructor(providers: LLMProvider[], options: ProviderRegistryOptions = {}) {
    this.providers = [...providers];
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.now = options.now ?? Date.now;
  }

  list(): readonly LLMProvider[] {
    return this.providers;
  }

  get size(): number {
    return this.providers.length;
  }

  /** Case-insensitive lookup by provider name */
  get(name: string): LLMProvider | undefined {
    const wanted = name.toLowerCase();
    return this.providers.find((p) => p.name.toLowerCase() === wanted);
  }

  get active(): LLMProvider | undefined {
    return this.activeProvider;
  }

  setActive(provider: LLMProvider | undefined): void {
    this.activeProvider = provider;
  }

  markInitialized(provider: LLMProvider, succeeded: boolean): void {
    this.initialized.set(provider.name, succeeded);
  }

  isInitialized(provider: LLMProvider): boolean {
    return this.initialized.get(provider.name) === true;
  }

  recordFailure(provider: LLMProvider): number {
    const at = this.now();
    this.failures.set(provider.name, at);
    return at;
  }

  lastFailure(provider: LLMProvider): number | undefined {
    return this.failures.get(provider.name);
  }

  /** Stale records are ignored rather than swept */
  isBackedOff(provider: LLMProvider, at: number = this.now()): boolean {
    const failedAt = this.failures.get(provider.name);
    return failedAt !== undefined && at - failedAt < this.backoffMs;
  }

  isEligible(provider: LLMProvider, at: number = this.now()): boolean {
    return provider.hasValidApiKey && !this.isBackedOff(provider, at);
  }

  stateOf(provider: LLMProvider): ProviderState {
    if (this.isBackedOff(provider)) return "failed";
    if (this.activeProvider === provider) return "active";
    const init = this.initialized.get(provider.name);
    if (init === undefined) return "unknown";
    return init ? "initialized" : "uninitialized";
  }

  /**
   * Preference order: initialized, credentialed and not backed off; then
   * credentialed and not backed off; then any credentialed provider; then the
   * first configured one.
   */
  chooseActive(): LLMProvider | undefined {
    const at = this.now();
    return (
      this.providers.find((p) => this.isInitialized(p) && this.isEligible(p, at)) ??
      this.providers.find((p) => this.isEligible(p, at)) ??
      this.providers.find((p) => p.hasValidApiKey) ??
      this.providers[0]
    );
  }

  firstEligible(exclude: readonly LLMProvider[], filter?: ProviderFilter): LLMProvider | undefined {
    const at = this.now();
    return this.providers.find(
      (p) => !exclude.includes(p) && this.isEligible(p, at) && (!filter || filter(p))
    );
  }
}
