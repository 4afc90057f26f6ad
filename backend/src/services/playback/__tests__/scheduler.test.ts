import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { PlaybackScheduler, type RevealSink } from "../scheduler.js";

function recordingSink() {
  const appended: string[] = [];
  const sink: RevealSink = {
    reveal: (_revealed, chunk) => {
      appended.push(chunk);
    },
  };
  return { sink, appended };
}

describe("PlaybackScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reveals tokens at word and whitespace pace, then completes", async () => {
    const { sink, appended } = recordingSink();
    const onFinalize = vi.fn();
    const scheduler = new PlaybackScheduler({ wordMs: 40, whitespaceMs: 10 });

    const session = scheduler.start("Hello big world", sink, onFinalize);
    expect(appended).toEqual(["Hello"]);
    expect(session.state).toBe("playing");

    await vi.advanceTimersByTimeAsync(39);
    expect(appended).toEqual(["Hello"]);

    await vi.advanceTimersByTimeAsync(1);
    expect(appended).toEqual(["Hello", " "]);

    await vi.advanceTimersByTimeAsync(10);
    expect(appended).toEqual(["Hello", " ", "big"]);

    await vi.advanceTimersByTimeAsync(100);
    await session.done;

    expect(appended.join("")).toBe("Hello big world");
    expect(session.state).toBe("completed");
    expect(session.revealed).toBe("Hello big world");
    expect(onFinalize).toHaveBeenCalledTimes(1);
    expect(scheduler.active).toBeNull();
  });

  it("flushes the rest on cancel and finalizes once", async () => {
    const { sink, appended } = recordingSink();
    const onFinalize = vi.fn();
    const scheduler = new PlaybackScheduler();

    const session = scheduler.start("one two three [1]", sink, onFinalize);
    await vi.advanceTimersByTimeAsync(40);

    expect(scheduler.cancel()).toBe(true);
    expect(appended).toEqual(["one", " ", "two three [1]"]);
    expect(session.revealed).toBe("one two three [1]");
    expect(session.state).toBe("completed");
    expect(session.flushed).toBe(true);

    expect(session.cancel()).toBe(false);
    await vi.runAllTimersAsync();
    await session.done;

    expect(appended).toHaveLength(3);
    expect(onFinalize).toHaveBeenCalledTimes(1);
  });

  it("finalizes the playing session before the next one emits", () => {
    const events: string[] = [];
    const scheduler = new PlaybackScheduler();

    const first = scheduler.start(
      "alpha beta",
      { reveal: (_r, chunk) => events.push(`A:${chunk}`) },
      () => {
        events.push("A:finalized");
      },
    );
    const second = scheduler.start(
      "gamma",
      { reveal: (_r, chunk) => events.push(`B:${chunk}`) },
      () => {
        events.push("B:finalized");
      },
    );

    expect(events).toEqual(["A:alpha", "A: beta", "A:finalized", "B:gamma", "B:finalized"]);
    expect(first.state).toBe("completed");
    expect(first.flushed).toBe(true);
    expect(second.state).toBe("completed");
    expect(second.flushed).toBe(false);
  });

  it("completes an empty text without revealing anything", async () => {
    const { sink, appended } = recordingSink();
    const onFinalize = vi.fn();

    const session = new PlaybackScheduler().start("", sink, onFinalize);
    await session.done;

    expect(appended).toEqual([]);
    expect(session.state).toBe("completed");
    expect(onFinalize).toHaveBeenCalledTimes(1);
  });

  it("flushes and finalizes when the sink throws", async () => {
    let calls = 0;
    const onFinalize = vi.fn();
    const session = new PlaybackScheduler().start(
      "a b",
      {
        reveal: () => {
          calls++;
          if (calls === 1) throw new Error("closed");
        },
      },
      onFinalize,
    );

    await session.done;

    expect(session.state).toBe("completed");
    expect(session.flushed).toBe(true);
    expect(session.revealed).toBe("a b");
    expect(onFinalize).toHaveBeenCalledTimes(1);
  });

  it("settles done only after an async finalize hook has finished", async () => {
    const steps: string[] = [];
    const session = new PlaybackScheduler({ wordMs: 40, whitespaceMs: 10 }).start(
      "slow commit",
      { reveal: () => undefined },
      async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        steps.push("committed");
      },
    );

    const done = session.done.then(() => {
      steps.push("done");
    });
    await vi.advanceTimersByTimeAsync(60);
    await done;

    expect(steps).toEqual(["committed", "done"]);
  });

  it("waits for the finalize hook when cancelled mid-playback", async () => {
    const steps: string[] = [];
    const session = new PlaybackScheduler().start("a b c", { reveal: () => undefined }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      steps.push("committed");
    });

    const done = session.done.then(() => {
      steps.push("done");
    });
    session.cancel();
    expect(steps).toEqual([]);

    await vi.advanceTimersByTimeAsync(5);
    await done;

    expect(steps).toEqual(["committed", "done"]);
  });

  it("settles done even when the finalize hook rejects", async () => {
    const session = new PlaybackScheduler().start("x", { reveal: () => undefined }, () =>
      Promise.reject(new Error("disk full")),
    );

    await expect(session.done).resolves.toBeUndefined();
    expect(session.state).toBe("completed");
  });
});
