import { beforeEach, describe, expect, it } from "vitest";
import { readFile } from "fs/promises";
import { join } from "path";
import { SynthesisInvoker } from "../synthesis-invoker.service";
import { FakeSpeechSynthesizer, delay, hangUntilAborted, makeTempDir } from "../../../__tests__/support/fakes";
import { TextChunk } from "../../../domain/entities/text-chunk";

const chunk = (text: string, sequenceIndex = 0): TextChunk => ({ sequenceIndex, text, voice: "alloy" });

describe("SynthesisInvoker", () => {
  let dir: string;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    sleeps = [];
  });

  it("writes the returned audio and reports success", async () => {
    const synthesizer = new FakeSpeechSynthesizer(async () => Buffer.from("mp3-bytes"));
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 1, retryBackoffMs: 0, sleep });
    const audioPath = join(dir, "chunk_001.mp3");

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Hello."), audioPath });

    expect(segment).toEqual({ sequenceIndex: 0, status: "succeeded", audioPath, attempts: 1 });
    expect((await readFile(audioPath)).toString()).toBe("mp3-bytes");
    expect(synthesizer.calls).toEqual([{ text: "Hello.", voice: "alloy" }]);
  });

  it("fails empty text without calling the service", async () => {
    const synthesizer = new FakeSpeechSynthesizer();
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 3, retryBackoffMs: 0, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("  \n "), audioPath: join(dir, "a.mp3") });

    expect(segment).toMatchObject({ status: "failed", failureKind: "empty-audio", attempts: 0 });
    expect(synthesizer.calls).toHaveLength(0);
  });

  it("treats an empty audio response as a failure", async () => {
    const synthesizer = new FakeSpeechSynthesizer(async () => Buffer.alloc(0));
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 1, retryBackoffMs: 0, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Text."), audioPath: join(dir, "a.mp3") });

    expect(segment).toEqual({
      sequenceIndex: 0,
      status: "failed",
      failureKind: "empty-audio",
      reason: "Speech service returned no audio",
      attempts: 1,
    });
  });

  it("retries with exponential backoff up to maxAttempts", async () => {
    let calls = 0;
    const synthesizer = new FakeSpeechSynthesizer(async () => {
      calls++;
      if (calls < 3) throw new Error("503 Service Unavailable");
      return Buffer.from("ok");
    });
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 3, retryBackoffMs: 100, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Retry me."), audioPath: join(dir, "a.mp3") });

    expect(segment).toMatchObject({ status: "succeeded", attempts: 3 });
    expect(sleeps).toEqual([100, 200]);
  });

  it("reports the last service error once attempts are exhausted", async () => {
    const synthesizer = new FakeSpeechSynthesizer(async () => {
      throw new Error("bad gateway");
    });
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 2, retryBackoffMs: 10, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Nope.", 4), audioPath: join(dir, "a.mp3") });

    expect(segment).toEqual({
      sequenceIndex: 4,
      status: "failed",
      failureKind: "service",
      reason: "bad gateway",
      attempts: 2,
    });
    expect(synthesizer.calls).toHaveLength(2);
  });

  it("times out a call that never completes and aborts it", async () => {
    let seenSignal: AbortSignal | undefined;
    const synthesizer = new FakeSpeechSynthesizer((_text, _voice, signal) => {
      seenSignal = signal;
      return hangUntilAborted(signal);
    });
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 20, maxAttempts: 1, retryBackoffMs: 0, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Slow."), audioPath: join(dir, "a.mp3") });

    expect(segment).toMatchObject({
      status: "failed",
      failureKind: "timeout",
      reason: "Synthesis timed out after 20ms",
    });
    expect(seenSignal?.aborted).toBe(true);
  });

  it("stops without retrying when cancelled mid-call", async () => {
    const controller = new AbortController();
    const synthesizer = new FakeSpeechSynthesizer((_text, _voice, signal) => hangUntilAborted(signal));
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 5000, maxAttempts: 3, retryBackoffMs: 0, sleep });

    const pending = invoker.synthesizeChunk({ chunk: chunk("Cancel me."), audioPath: join(dir, "a.mp3"), signal: controller.signal });
    await delay(5);
    controller.abort();
    const segment = await pending;

    expect(segment).toMatchObject({ status: "failed", failureKind: "cancelled", attempts: 1 });
    expect(synthesizer.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it("cuts the retry backoff short when cancelled", async () => {
    const controller = new AbortController();
    const synthesizer = new FakeSpeechSynthesizer(async () => {
      setTimeout(() => controller.abort(), 10);
      throw new Error("upstream 503");
    });
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 3, retryBackoffMs: 60_000 });
    const started = Date.now();

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Retry me."), audioPath: join(dir, "a.mp3"), signal: controller.signal });

    expect(segment).toMatchObject({ status: "failed", failureKind: "cancelled", attempts: 1 });
    expect(synthesizer.calls).toHaveLength(1);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("does not call the service when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const synthesizer = new FakeSpeechSynthesizer();
    const invoker = new SynthesisInvoker(synthesizer, { timeoutMs: 1000, maxAttempts: 1, retryBackoffMs: 0, sleep });

    const segment = await invoker.synthesizeChunk({ chunk: chunk("Hi."), audioPath: join(dir, "a.mp3"), signal: controller.signal });

    expect(segment).toMatchObject({ status: "failed", failureKind: "cancelled", attempts: 0 });
    expect(synthesizer.calls).toHaveLength(0);
  });
});
