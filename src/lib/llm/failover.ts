import { createLogger, type Logger } from "../logger";
import { errorMessage } from "./errors";
import { Mutex } from "./mutex";
import type { ProviderFilter, ProviderRegistry } from "./registry";
import type { LLMProvider } from "./types";

/**
 * Owns every decision about which provider serves a request. Decisions run
 * under one mutex and never await provider I/O while holding it.
 */
export class FailoverController {
  private readonly registry: ProviderRegistry;
  private readonly lock = new Mutex();
  private readonly logger: Logger;

  constructor(registry: ProviderRegistry, logger?: Logger) {
    this.registry = registry;
    this.logger = logger ?? createLogger("failover");
  }

  /** Initializes every provider, then picks the active one */
  async initialize(): Promise<LLMProvider | undefined> {
    for (const provider of this.registry.list()) {
      try {
        await provider.initialize();
        this.registry.markInitialized(provider, true);
        this.logger.info({ provider: provider.name }, "Initialized LLM provider");
      } catch (error) {
        this.registry.markInitialized(provider, false);
        this.logger.error(
          { provider: provider.name, err: errorMessage(error) },
          "Error initializing LLM provider"
        );
      }
    }
    return this.selectActive();
  }

  selectActive(): Promise<LLMProvider | undefined> {
    return this.lock.runExclusive(() => this.reselect());
  }

  /** The active provider, selecting one lazily if none has been chosen yet */
  currentProvider(): Promise<LLMProvider | undefined> {
    return this.lock.runExclusive(() => this.registry.active ?? this.reselect());
  }

  markFailed(provider: LLMProvider): Promise<void> {
    return this.lock.runExclusive(() => {
      this.recordFailure(provider);
    });
  }

  /** First eligible provider other than the active one */
  getFallback(): Promise<LLMProvider | null> {
    return this.lock.runExclusive(() => {
      const active = this.registry.active;
      return this.registry.firstEligible(active ? [active] : []) ?? null;
    });
  }

  /**
   * Demotes `failed` and returns the provider that should take the retry:
   * the newly selected active provider when it is eligible, otherwise the
   * first eligible provider other than `failed`.
   */
  demote(failed: LLMProvider, filter?: ProviderFilter): Promise<LLMProvider | null> {
    return this.lock.runExclusive(() => {
      this.recordFailure(failed);
      const active = this.registry.active;
      if (
        active &&
        active !== failed &&
        this.registry.isEligible(active) &&
        (!filter || filter(active))
      ) {
        return active;
      }
      return this.registry.firstEligible([failed], filter) ?? null;
    });
  }

  /**
   * Provider for a request that needs a capability: the active one when it
   * qualifies and is not backed off, else the first eligible one that does.
   */
  resolveWith(filter: ProviderFilter): Promise<LLMProvider | null> {
    return this.lock.runExclusive(() => {
      const active = this.registry.active ?? this.reselect();
      if (active && filter(active) && this.registry.isEligible(active)) {
        return active;
      }
      return this.registry.firstEligible([], filter) ?? null;
    });
  }

  /** Manual override; ignores backoff */
  setActive(name: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const provider = this.registry.get(name);
      if (!provider) {
        this.logger.warn({ provider: name }, "LLM provider not found");
        return false;
      }
      this.registry.setActive(provider);
      this.logger.info({ provider: provider.name }, "Active LLM provider set");
      return true;
    });
  }

  // Callers must hold the lock.
  private recordFailure(provider: LLMProvider): void {
    this.registry.recordFailure(provider);
    this.logger.warn(
      { provider: provider.name, backoffMs: this.registry.backoffMs },
      "LLM provider marked failed"
    );
    if (this.registry.active === provider) {
      this.reselect();
    }
  }

  private reselect(): LLMProvider | undefined {
    const previous = this.registry.active;
    const chosen = this.registry.chooseActive();
    this.registry.setActive(chosen);

    if (!chosen) {
      this.logger.warn("No active LLM provider available");
    } else if (chosen !== previous) {
      this.logger.info({ provider: chosen.name }, "Active LLM provider set");
    }
    return chosen;
  }
}
