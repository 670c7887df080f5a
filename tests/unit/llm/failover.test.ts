import { FailoverController } from "@/lib/llm/failover";
import { ProviderRegistry } from "@/lib/llm/registry";
import { MockProvider } from "../../helpers/mock-provider";

const BACKOFF_MS = 60_000;

function setup(providers: MockProvider[]) {
  let clock = 1_000_000;
  const registry = new ProviderRegistry(providers, { backoffMs: BACKOFF_MS, now: () => clock });
  const controller = new FailoverController(registry);
  return {
    registry,
    controller,
    advance(ms: number) {
      clock += ms;
    },
  };
}

describe("ProviderRegistry", () => {
  it("looks providers up case-insensitively", () => {
    const a = new MockProvider("claude");
    const { registry } = setup([a]);

    expect(registry.get("Claude")).toBe(a);
    expect(registry.get("CLAUDE")).toBe(a);
    expect(registry.get("gemini")).toBeUndefined();
  });

  it("prefers an initialized, credentialed, non-failed provider", () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { registry } = setup([a, b]);
    registry.markInitialized(a, false);
    registry.markInitialized(b, true);

    expect(registry.chooseActive()).toBe(b);
  });

  it("falls back to any credentialed provider, then the first configured", () => {
    const a = new MockProvider("a", { hasValidApiKey: false });
    const b = new MockProvider("b");
    expect(setup([a, b]).registry.chooseActive()).toBe(b);

    const c = new MockProvider("c", { hasValidApiKey: false });
    expect(setup([a, c]).registry.chooseActive()).toBe(a);
    expect(setup([]).registry.chooseActive()).toBeUndefined();
  });

  it("skips backed-off providers before any has been initialized", () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { registry, advance } = setup([a, b]);

    registry.recordFailure(a);
    expect(registry.chooseActive()).toBe(b);

    registry.recordFailure(b);
    expect(registry.chooseActive()).toBe(a);

    advance(BACKOFF_MS);
    expect(registry.chooseActive()).toBe(a);
  });

  it("reports provider state", () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const c = new MockProvider("c");
    const { registry } = setup([a, b, c]);

    expect(registry.stateOf(a)).toBe("unknown");
    registry.markInitialized(a, true);
    registry.markInitialized(b, false);
    registry.setActive(a);
    expect(registry.stateOf(a)).toBe("active");
    expect(registry.stateOf(b)).toBe("uninitialized");

    registry.markInitialized(c, true);
    expect(registry.stateOf(c)).toBe("initialized");
    registry.recordFailure(c);
    expect(registry.stateOf(c)).toBe("failed");
  });
});

describe("FailoverController", () => {
  it("initializes every provider and activates the first healthy one", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    a.initialize.mockRejectedValueOnce(new Error("bad key"));
    const { controller, registry } = setup([a, b]);

    await expect(controller.initialize()).resolves.toBe(b);
    expect(a.initialize).toHaveBeenCalledTimes(1);
    expect(registry.isInitialized(a)).toBe(false);
    expect(registry.isInitialized(b)).toBe(true);
    expect(registry.active).toBe(b);
  });

  it("selects lazily when no provider is active yet", async () => {
    const a = new MockProvider("a");
    const { controller } = setup([a]);

    await expect(controller.currentProvider()).resolves.toBe(a);
  });

  it("never returns a provider inside its backoff window", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { controller } = setup([a, b]);
    await controller.initialize();

    await controller.markFailed(a);

    await expect(controller.currentProvider()).resolves.toBe(b);
    await expect(controller.selectActive()).resolves.toBe(b);
    await expect(controller.getFallback()).resolves.toBeNull();
  });

  it("makes a provider eligible again once its backoff has elapsed", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { controller, advance } = setup([a, b]);
    await controller.initialize();
    await controller.markFailed(a);

    advance(BACKOFF_MS - 1);
    await expect(controller.getFallback()).resolves.toBeNull();

    advance(1);
    await expect(controller.getFallback()).resolves.toBe(a);
    await expect(controller.selectActive()).resolves.toBe(a);
  });

  it("demotes a failed provider and hands back its substitute", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { controller, registry } = setup([a, b]);
    await controller.initialize();

    await expect(controller.demote(a)).resolves.toBe(b);
    expect(registry.active).toBe(b);
    expect(registry.lastFailure(a)).toBe(1_000_000);
  });

  it("returns no substitute when every other provider is failed", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { controller } = setup([a, b]);
    await controller.initialize();

    await controller.markFailed(b);
    await expect(controller.demote(a)).resolves.toBeNull();
  });

  it("applies a capability filter to substitutes and resolution", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const c = new MockProvider("c", { supportsVision: true });
    const { controller, registry } = setup([a, b, c]);
    await controller.initialize();

    const vision = (p: { supportsVision: boolean }) => p.supportsVision;
    await expect(controller.resolveWith(vision)).resolves.toBe(c);
    expect(registry.active).toBe(a);

    await expect(controller.demote(a, vision)).resolves.toBe(c);
    expect(registry.active).toBe(b);
  });

  it("lets a manual override pick a backed-off provider", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const { controller, registry } = setup([a, b]);
    await controller.initialize();
    await controller.markFailed(a);

    await expect(controller.setActive("A")).resolves.toBe(true);
    expect(registry.active).toBe(a);
    await expect(controller.setActive("missing")).resolves.toBe(false);
    expect(registry.active).toBe(a);
  });
});
