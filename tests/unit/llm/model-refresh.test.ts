import {
  ModelRefreshScheduler,
  baseModelName,
  compareVersions,
  findUpgrade,
  modelVersion,
} from "@/lib/llm/model-refresh";
import { ProviderRegistry } from "@/lib/llm/registry";
import { MockProvider, makeModel } from "../../helpers/mock-provider";

describe("model family heuristics", () => {
  it("strips vendor prefix, version numbers and the latest suffix", () => {
    expect(baseModelName("gpt-4-turbo")).toBe("gpt-turbo");
    expect(baseModelName("gpt-4-turbo-latest")).toBe("gpt-turbo");
    expect(baseModelName("openai/GPT-4-Turbo-2024-04-09")).toBe("gpt-turbo");
    expect(baseModelName("claude-3-5-sonnet-20241022")).toBe("claude-sonnet");
  });

  it("extracts every numeric group as the version", () => {
    expect(modelVersion("claude-3-5-sonnet-20241022")).toEqual([3, 5, 20241022]);
    expect(modelVersion("acme/model-3.10")).toEqual([3, 10]);
    expect(modelVersion("chat")).toEqual([]);
  });

  it("compares versions segment by segment", () => {
    expect(compareVersions([3, 10], [3, 5])).toBeGreaterThan(0);
    expect(compareVersions([3], [3, 0])).toBe(0);
    expect(compareVersions([2, 9], [3])).toBeLessThan(0);
  });
});

describe("findUpgrade", () => {
  it("moves to the latest alias of the same family", () => {
    const current = makeModel("gpt-4-turbo");
    const catalog = [current, makeModel("gpt-4o"), makeModel("gpt-4-turbo-latest")];

    expect(findUpgrade(current, catalog)?.id).toBe("gpt-4-turbo-latest");
  });

  it("leaves a model that already tracks latest alone", () => {
    const current = makeModel("gpt-4-turbo-latest");
    expect(findUpgrade(current, [current, makeModel("gpt-4-turbo-2024-04-09")])).toBeNull();
  });

  it("picks the newest sibling that keeps the current capabilities", () => {
    const current = makeModel("acme-chat-2", { supportsVision: true });
    const catalog = [
      current,
      makeModel("acme-chat-3", { supportsVision: true }),
      makeModel("acme-chat-10", { supportsVision: false }),
      makeModel("other-chat-9", { supportsVision: true }),
    ];

    expect(findUpgrade(current, catalog)?.id).toBe("acme-chat-3");
  });

  it("treats 3.10 as newer than 3.5", () => {
    const current = makeModel("acme-3.5");
    expect(findUpgrade(current, [current, makeModel("acme-3.10")])?.id).toBe("acme-3.10");
  });

  it("never downgrades", () => {
    const current = makeModel("acme-chat-2");
    expect(findUpgrade(current, [current, makeModel("acme-chat-1")])).toBeNull();
  });
});

describe("ModelRefreshScheduler", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("upgrades gpt-4-turbo to gpt-4-turbo-latest", async () => {
    const openai = new MockProvider("openai", { model: { id: "gpt-4-turbo" } });
    openai.catalog = [openai.currentModel, makeModel("gpt-4-turbo-latest")];
    const scheduler = new ModelRefreshScheduler(new ProviderRegistry([openai]));

    const summary = await scheduler.refreshAll();

    expect(summary).toEqual({ refreshed: ["openai"], upgraded: { openai: "gpt-4-turbo-latest" }, failed: [] });
    expect(openai.setModel).toHaveBeenCalledWith("gpt-4-turbo-latest");
    expect(openai.currentModel.id).toBe("gpt-4-turbo-latest");
  });

  it("skips providers without keys and isolates failures", async () => {
    const a = new MockProvider("a");
    const b = new MockProvider("b");
    const c = new MockProvider("c", { hasValidApiKey: false });
    a.fetchAvailableModels.mockRejectedValueOnce(new Error("catalog down"));
    const scheduler = new ModelRefreshScheduler(new ProviderRegistry([a, b, c]));

    const summary = await scheduler.refreshAll();

    expect(summary).toEqual({ refreshed: ["b"], upgraded: {}, failed: ["a"] });
    expect(c.fetchAvailableModels).not.toHaveBeenCalled();
  });

  it("drops a refresh requested while one is already running", async () => {
    const a = new MockProvider("a");
    let release: () => void = () => undefined;
    a.fetchAvailableModels.mockImplementationOnce(
      () =>
        new Promise((resolve) => {
          release = () => resolve([a.currentModel]);
        })
    );
    const scheduler = new ModelRefreshScheduler(new ProviderRegistry([a]));

    const first = scheduler.refreshAll();
    expect(scheduler.isRunning).toBe(true);
    await expect(scheduler.refreshAll()).resolves.toBeNull();

    release();
    await expect(first).resolves.toEqual({ refreshed: ["a"], upgraded: {}, failed: [] });
    expect(scheduler.isRunning).toBe(false);
    expect(a.fetchAvailableModels).toHaveBeenCalledTimes(1);
  });

  it("refreshes a single provider without switching models", async () => {
    const openai = new MockProvider("openai", { model: { id: "gpt-4-turbo" } });
    openai.catalog = [openai.currentModel, makeModel("gpt-4-turbo-latest")];
    const offline = new MockProvider("offline", { hasValidApiKey: false });
    const broken = new MockProvider("broken");
    broken.fetchAvailableModels.mockRejectedValueOnce(new Error("500"));
    const scheduler = new ModelRefreshScheduler(new ProviderRegistry([openai, offline, broken]));

    await expect(scheduler.refreshProvider("OpenAI")).resolves.toBe(true);
    expect(openai.setModel).not.toHaveBeenCalled();
    expect(openai.currentModel.id).toBe("gpt-4-turbo");

    await expect(scheduler.refreshProvider("missing")).resolves.toBe(false);
    await expect(scheduler.refreshProvider("offline")).resolves.toBe(false);
    await expect(scheduler.refreshProvider("broken")).resolves.toBe(false);
  });

  it("runs after the initial delay and then on every interval until stopped", async () => {
    jest.useFakeTimers();
    const a = new MockProvider("a");
    const scheduler = new ModelRefreshScheduler(new ProviderRegistry([a]), {
      initialDelayMs: 1_000,
      intervalMs: 10_000,
    });

    scheduler.start();
    expect(scheduler.isScheduled).toBe(true);

    await jest.advanceTimersByTimeAsync(999);
    expect(a.fetchAvailableModels).not.toHaveBeenCalled();

    await jest.advanceTimersByTimeAsync(1);
    expect(a.fetchAvailableModels).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(10_000);
    expect(a.fetchAvailableModels).toHaveBeenCalledTimes(2);

    scheduler.stop();
    expect(scheduler.isScheduled).toBe(false);
    await jest.advanceTimersByTimeAsync(30_000);
    expect(a.fetchAvailableModels).toHaveBeenCalledTimes(2);
  });
});
