import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TurnResult } from "../agent/types.ts";
import { BindingStore } from "../state/binding-store.ts";
import { SessionTable } from "../state/session-table.ts";
import {
  EditableSurface,
  FakeAgent,
  FakeSurface,
  MemoryStorage,
  deferred,
  fixedClock,
} from "../testing/fakes.ts";
import { TRUNCATION_MARKER } from "./overflow.ts";
import {
  CANCELLED_NOTICE,
  EMPTY_OUTPUT_NOTICE,
  MessageRouter,
  UNBOUND_MESSAGE,
  threadName,
  type RouterOptions,
} from "./router.ts";
import type { InboundEvent, SendOptions } from "./types.ts";

/** Holds the cancellable placeholder until `release` resolves. */
class SlowPlaceholderSurface extends EditableSurface {
  posting = deferred<void>();
  release = deferred<void>();

  async sendMessage(targetId: string, text: string, options: SendOptions = {}): Promise<string> {
    if (options.cancellable) {
      this.posting.resolve();
      await this.release.promise;
    }
    return super.sendMessage(targetId, text, options);
  }
}

function makeRouter(
  overrides: Partial<RouterOptions> = {},
  surface: FakeSurface = new FakeSurface(),
) {
  const storage = new MemoryStorage();
  const bindings = new BindingStore(storage, new Map(), fixedClock());
  const sessions = new SessionTable(storage, new Map(), fixedClock());
  const agent = new FakeAgent();
  const router = new MessageRouter({
    bindings,
    sessions,
    surface,
    agent,
    options: {
      sessionMode: "chat",
      overflowPolicy: "split",
      messageLimit: 2000,
      turnTimeoutMs: 60_000,
      progressIntervalMs: 1000,
      ...overrides,
    },
  });
  return { storage, bindings, sessions, agent, surface, router };
}

function channelEvent(text: string, overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    messageId: "m-1",
    channelId: "c1",
    channelName: "issue-840",
    isThread: false,
    author: { id: "u1", name: "alice" },
    text,
    ...overrides,
  };
}

function threadEvent(threadId: string, text: string, overrides: Partial<InboundEvent> = {}): InboundEvent {
  return channelEvent(text, { messageId: `m-${threadId}-${text.length}`, threadId, isThread: true, ...overrides });
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("threadName", () => {
  it("uses the first non-empty line with whitespace collapsed", () => {
    expect(threadName("\n  fix   the\tlogin bug \nmore", "issue-1")).toBe("fix the login bug");
  });

  it("cuts long lines with an ellipsis", () => {
    expect(threadName("a".repeat(100), "main")).toBe("a".repeat(89) + "…");
  });

  it("falls back to the branch", () => {
    expect(threadName("   \n ", "issue-840")).toBe("issue-840 session");
  });
});

describe("MessageRouter: channel messages", () => {
  it("opens a thread on the channel's branch and replies in it", async () => {
    const { router, bindings, sessions, agent, surface } = makeRouter();
    await bindings.set("c1", "webapp");

    const outcome = await router.handle(channelEvent("fix the login bug"));

    expect(outcome).toEqual({ kind: "completed", threadId: "t1", chunks: 1 });
    expect(surface.threads).toEqual([
      { id: "t1", channelId: "c1", name: "fix the login bug", sourceMessageId: "m-1" },
    ]);
    expect(agent.requests[0]).toMatchObject({
      projectId: "webapp",
      branch: "issue-840",
      text: "fix the login bug",
      resumeToken: undefined,
    });
    expect(surface.transcript("t1")).toEqual(["echo: fix the login bug"]);
    expect(sessions.get("t1")).toMatchObject({
      channelId: "c1",
      projectId: "webapp",
      branch: "issue-840",
      status: "completed",
      resumeToken: "tok-1",
      turns: 1,
      sourceMessageId: "m-1",
    });
  });

  it("uses the binding's fixed branch", async () => {
    const { router, bindings, agent } = makeRouter();
    await bindings.set("c1", "webapp", "develop");

    await router.handle(channelEvent("hello"));

    expect(agent.requests[0]?.branch).toBe("develop");
  });

  it("applies an @branch override and strips it from the prompt", async () => {
    const { router, bindings, agent, surface, sessions } = makeRouter();
    await bindings.set("c1", "webapp", "develop");

    await router.handle(channelEvent("@feat/login fix the button"));

    expect(surface.threads[0]?.name).toBe("fix the button");
    expect(agent.requests[0]).toMatchObject({ branch: "feat/login", text: "fix the button" });
    expect(sessions.get("t1")?.branch).toBe("feat/login");
  });

  it("rejects an unbound channel in the channel", async () => {
    const { router, surface, agent } = makeRouter();

    const outcome = await router.handle(channelEvent("hello"));

    expect(outcome).toEqual({ kind: "rejected", code: "UnboundChannel", message: UNBOUND_MESSAGE });
    expect(surface.transcript("c1")).toEqual([UNBOUND_MESSAGE]);
    expect(surface.threads).toEqual([]);
    expect(agent.requests).toEqual([]);
  });

  it("uses the default project for unbound channels", async () => {
    const { router, agent } = makeRouter({ defaultProject: "sandbox" });

    await router.handle(channelEvent("hello", { channelName: "master" }));

    expect(agent.requests[0]).toMatchObject({ projectId: "sandbox", branch: "main" });
  });

  it("rejects an invalid override branch", async () => {
    const { router, bindings, surface } = makeRouter();
    await bindings.set("c1", "webapp");

    const outcome = await router.handle(channelEvent("@bad..name do it"));

    const message = "Invalid branch `bad..name`: branch name cannot contain '..'.";
    expect(outcome).toEqual({ kind: "rejected", code: "InvalidBranchName", message });
    expect(surface.transcript("c1")).toEqual([message]);
  });

  it("ignores empty prompts", async () => {
    const { router, bindings, surface } = makeRouter();
    await bindings.set("c1", "webapp");

    expect(await router.handle(channelEvent("   "))).toEqual({ kind: "ignored", reason: "empty" });
    expect(await router.handle(channelEvent("@feat/x"))).toEqual({ kind: "ignored", reason: "empty" });
    expect(surface.threads).toEqual([]);
  });

  it("opens one thread for a message delivered twice", async () => {
    const { router, bindings, surface, agent } = makeRouter();
    await bindings.set("c1", "webapp");

    const outcomes = await Promise.all([
      router.handle(channelEvent("hello")),
      router.handle(channelEvent("hello")),
    ]);

    expect(outcomes).toEqual([
      { kind: "completed", threadId: "t1", chunks: 1 },
      { kind: "ignored", reason: "duplicate" },
    ]);
    expect(surface.threads).toHaveLength(1);
    expect(agent.requests).toHaveLength(1);
  });

  it("reports unexpected failures in the channel", async () => {
    const { router, bindings, storage, surface } = makeRouter();
    await bindings.set("c1", "webapp");
    storage.failing.add("saveSession");

    const outcome = await router.handle(channelEvent("hello"));

    expect(outcome).toEqual({ kind: "error", message: "saveSession failed" });
    expect(surface.transcript("c1")).toEqual(["Something went wrong: saveSession failed"]);
  });
});

describe("MessageRouter: thread messages", () => {
  it("resumes the thread's conversation in chat mode", async () => {
    const { router, bindings, agent, sessions } = makeRouter();
    await bindings.set("c1", "webapp");
    await router.handle(channelEvent("fix the login bug"));

    const outcome = await router.handle(threadEvent("t1", "now add a test"));

    expect(outcome).toEqual({ kind: "completed", threadId: "t1", chunks: 1 });
    expect(agent.requests[1]).toMatchObject({ branch: "issue-840", text: "now add a test", resumeToken: "tok-1" });
    expect(sessions.get("t1")?.turns).toBe(2);
  });

  it("rejects an @branch override inside a thread", async () => {
    const { router, bindings, agent, surface } = makeRouter();
    await bindings.set("c1", "webapp");
    await router.handle(channelEvent("start"));

    const outcome = await router.handle(threadEvent("t1", "@feat/other switch"));

    expect(outcome).toMatchObject({ kind: "rejected", code: "InvalidContext" });
    expect(agent.requests).toHaveLength(1);
    expect(surface.transcript("t1")[1]).toMatch(/^`@branch` overrides only work in a channel message/);
  });

  it("rejects an invalid @branch override inside a thread as out of context", async () => {
    const { router, bindings, agent } = makeRouter();
    await bindings.set("c1", "webapp");
    await router.handle(channelEvent("start"));

    const outcome = await router.handle(threadEvent("t1", "@bad..name hi"));

    expect(outcome).toMatchObject({ kind: "rejected", code: "InvalidContext" });
    expect(agent.requests).toHaveLength(1);
  });

  it("adopts a thread the bridge did not open", async () => {
    const { router, bindings, sessions, agent } = makeRouter();
    await bindings.set("c1", "webapp");

    const outcome = await router.handle(threadEvent("t9", "hello"));

    expect(outcome).toEqual({ kind: "completed", threadId: "t9", chunks: 1 });
    expect(sessions.get("t9")).toMatchObject({ channelId: "c1", projectId: "webapp", branch: "issue-840" });
    expect(sessions.get("t9")).not.toHaveProperty("sourceMessageId");
    expect(agent.requests).toHaveLength(1);
  });

  it("creates one session for concurrent first messages in a foreign thread", async () => {
    const { router, bindings, sessions, agent } = makeRouter();
    await bindings.set("c1", "webapp");

    await Promise.all([
      router.handle(threadEvent("t9", "first", { messageId: "a" })),
      router.handle(threadEvent("t9", "second", { messageId: "b" })),
    ]);

    expect(sessions.list()).toHaveLength(1);
    expect(agent.requests.map((r) => r.text)).toEqual(["first", "second"]);
    expect(agent.requests[1]?.resumeToken).toBe("tok-1");
    expect(sessions.get("t9")?.turns).toBe(2);
  });

  it("rejects a foreign thread in an unbound channel", async () => {
    const { router } = makeRouter();
    expect(await router.handle(threadEvent("t9", "hello"))).toMatchObject({
      kind: "rejected",
      code: "UnboundChannel",
    });
  });
});

describe("MessageRouter: turn outcomes", () => {
  it("discards output that arrives after a cancel", async () => {
    const { router, bindings, agent, sessions, surface } = makeRouter();
    await bindings.set("c1", "webapp");
    const gate = deferred<TurnResult>();
    const started = deferred<void>();
    agent.respondWith(() => {
      started.resolve();
      return gate.promise;
    });

    const pending = router.handle(channelEvent("long task"));
    await started.promise;
    expect(router.activeThreadCount).toBe(1);
    expect(await sessions.cancel("t1")).toBe(true);
    expect(router.abortTurn("t1")).toBe(true);
    gate.resolve({ status: "completed", output: "late output", resumeToken: "tok-late" });

    expect(await pending).toEqual({ kind: "cancelled", threadId: "t1" });
    expect(surface.transcript("t1")).toEqual([CANCELLED_NOTICE]);
    expect(sessions.get("t1")).toMatchObject({ status: "cancelled", turns: 0 });
    expect(sessions.get("t1")).not.toHaveProperty("resumeToken");
    expect(agent.requests[0]?.signal.aborted).toBe(true);
  });

  it("stops a turn cancelled while its placeholder is being posted", async () => {
    const surface = new SlowPlaceholderSurface();
    const { router, bindings, agent, sessions } = makeRouter({}, surface);
    await bindings.set("c1", "webapp");

    const pending = router.handle(channelEvent("long task"));
    await surface.posting.promise;
    expect(await sessions.cancel("t1")).toBe(true);
    expect(router.abortTurn("t1")).toBe(true);
    surface.release.resolve();

    expect(await pending).toEqual({ kind: "cancelled", threadId: "t1" });
    expect(agent.requests).toHaveLength(0);
    expect(surface.transcript("t1")).toEqual([CANCELLED_NOTICE]);
  });

  it("answers messages in a cancelled thread with a hint", async () => {
    const { router, bindings, sessions, surface, agent } = makeRouter();
    await bindings.set("c1", "webapp");
    const gate = deferred<TurnResult>();
    agent.respondWith(() => gate.promise);
    const pending = router.handle(channelEvent("long task"));
    await vi.waitFor(() => expect(sessions.get("t1")?.status).toBe("running"));
    await sessions.cancel("t1");
    router.abortTurn("t1");
    await pending;

    const outcome = await router.handle(threadEvent("t1", "are you there?"));

    expect(outcome).toEqual({ kind: "ignored", reason: "session-closed" });
    expect(surface.transcript("t1")[1]).toBe(
      "This conversation was cancelled. Post in the channel to start a new conversation.",
    );
  });

  it("records a failed turn and closes the thread", async () => {
    const { router, bindings, agent, sessions, surface } = makeRouter();
    await bindings.set("c1", "webapp");
    agent.respondWith(() => ({ status: "failed", error: "model overloaded" }));

    const outcome = await router.handle(channelEvent("hello"));
    const followUp = await router.handle(threadEvent("t1", "retry"));

    expect(outcome).toEqual({ kind: "failed", threadId: "t1", error: "model overloaded" });
    expect(followUp).toEqual({ kind: "ignored", reason: "session-closed" });
    expect(sessions.get("t1")).toMatchObject({ status: "failed", lastError: "model overloaded" });
    expect(surface.transcript("t1")).toEqual([
      "⚠️ Agent failed: model overloaded",
      "This conversation ended with an error. Post in the channel to start a new conversation.",
    ]);
  });

  it("treats a throwing runner as a failed turn", async () => {
    const { router, bindings, agent } = makeRouter();
    await bindings.set("c1", "webapp");
    agent.respondWith(() => {
      throw new Error("runtime crashed");
    });

    expect(await router.handle(channelEvent("hello"))).toEqual({
      kind: "failed",
      threadId: "t1",
      error: "runtime crashed",
    });
  });

  it("sends a notice for empty output", async () => {
    const { router, bindings, agent, surface } = makeRouter();
    await bindings.set("c1", "webapp");
    agent.respondWith(() => ({ status: "completed", output: "" }));

    expect(await router.handle(channelEvent("hello"))).toEqual({ kind: "completed", threadId: "t1", chunks: 1 });
    expect(surface.transcript("t1")).toEqual([EMPTY_OUTPUT_NOTICE]);
  });

  it("splits long output into several messages", async () => {
    const { router, bindings, agent, surface } = makeRouter({ messageLimit: 100 });
    await bindings.set("c1", "webapp");
    agent.respondWith(() => ({ status: "completed", output: "x".repeat(250) }));

    expect(await router.handle(channelEvent("hello"))).toEqual({ kind: "completed", threadId: "t1", chunks: 3 });
    expect(surface.transcript("t1").map((m) => m.length)).toEqual([100, 100, 50]);
  });

  it("trims long output to one message under the trim policy", async () => {
    const { router, bindings, agent, surface } = makeRouter({ messageLimit: 100, overflowPolicy: "trim" });
    await bindings.set("c1", "webapp");
    agent.respondWith(() => ({ status: "completed", output: "x".repeat(250) }));

    await router.handle(channelEvent("hello"));

    const messages = surface.transcript("t1");
    expect(messages).toHaveLength(1);
    expect(messages[0]).toBe("x".repeat(100 - TRUNCATION_MARKER.length) + TRUNCATION_MARKER);
  });

  it("closes a completed thread in stateless mode", async () => {
    const { router, bindings, agent, sessions, surface } = makeRouter({ sessionMode: "stateless" });
    await bindings.set("c1", "webapp");

    await router.handle(channelEvent("one-off question"));
    const followUp = await router.handle(threadEvent("t1", "and another"));

    expect(sessions.get("t1")).toMatchObject({ mode: "stateless", status: "completed" });
    expect(sessions.get("t1")).not.toHaveProperty("resumeToken");
    expect(followUp).toEqual({ kind: "ignored", reason: "session-closed" });
    expect(agent.requests).toHaveLength(1);
    expect(surface.transcript("t1")[1]).toBe(
      "Conversations here are one-shot. Post in the channel to start a new conversation.",
    );
  });

  it("streams progress into a placeholder and replaces it with the answer", async () => {
    const surface = new EditableSurface();
    const { router, bindings, agent } = makeRouter({}, surface);
    await bindings.set("c1", "webapp");
    agent.respondWith((req) => {
      req.onProgress?.("thinking");
      return { status: "completed", output: "final answer" };
    });

    await router.handle(channelEvent("hello"));

    expect(surface.sent[0]).toEqual({
      id: "m1",
      targetId: "t1",
      text: "_Working on `webapp` @ `issue-840`…_",
      cancellable: true,
    });
    expect(surface.transcript("t1")).toEqual(["final answer"]);
  });

  it("returns false from abortTurn when nothing is running", () => {
    const { router } = makeRouter();
    expect(router.abortTurn("t1")).toBe(false);
  });
});

describe("MessageRouter: turn timeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("fails a turn that runs past the timeout", async () => {
    const { router, bindings, agent, surface } = makeRouter({ turnTimeoutMs: 60_000 });
    await bindings.set("c1", "webapp");
    const started = deferred<void>();
    agent.respondWith(() => {
      started.resolve();
      return new Promise<TurnResult>(() => {});
    });

    const pending = router.handle(channelEvent("slow"));
    await started.promise;
    await vi.advanceTimersByTimeAsync(60_000);

    expect(await pending).toEqual({
      kind: "failed",
      threadId: "t1",
      error: "Agent turn timed out after 60s",
    });
    expect(surface.transcript("t1")).toEqual(["⚠️ Agent failed: Agent turn timed out after 60s"]);
  });
});

describe("MessageRouter: storage failures during a turn", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("releases the thread when the end of a turn cannot be saved", async () => {
    const surface = new EditableSurface();
    const { router, bindings, agent, sessions, storage } = makeRouter({}, surface);
    await bindings.set("c1", "webapp");
    agent.respondWith((req) => {
      req.onProgress?.("partial");
      storage.failing.add("saveSession");
      return { status: "completed", output: "done" };
    });

    const outcome = await router.handle(channelEvent("hello"));

    expect(outcome).toEqual({ kind: "failed", threadId: "t1", error: "saveSession failed" });
    expect(vi.getTimerCount()).toBe(0);
    expect(surface.transcript("t1")).toEqual(["⚠️ saveSession failed"]);
    expect(sessions.get("t1")).toMatchObject({ status: "failed", lastError: "saveSession failed" });

    const followUp = await router.handle(threadEvent("t1", "still there?"));

    expect(followUp).toEqual({ kind: "ignored", reason: "session-closed" });
    expect(surface.transcript("t1")[1]).toBe(
      "This conversation ended with an error. Post in the channel to start a new conversation.",
    );
  });
});
