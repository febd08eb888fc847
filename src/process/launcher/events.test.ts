import { afterEach, describe, expect, it } from "vitest";
import * as zmq from "zeromq";
import { LaunchError } from "./errors.js";
import { createEventPublisher, eventTopic, type LaunchEventPublisher } from "./events.js";

describe("launch event plane", () => {
  const testEventAddr = "tcp://127.0.0.1:19891";

  let publisher: LaunchEventPublisher | null = null;
  let subscriber: zmq.Subscriber | null = null;

  afterEach(async () => {
    if (subscriber) {
      subscriber.close();
      subscriber = null;
    }
    if (publisher) {
      await publisher.close();
      publisher = null;
    }
    // Give sockets time to close
    await new Promise((r) => setTimeout(r, 100));
  });

  async function connectSubscriber(): Promise<zmq.Subscriber> {
    const socket = new zmq.Subscriber();
    socket.connect(testEventAddr);
    socket.subscribe(eventTopic(""));
    // PUB drops messages until the subscription has propagated
    await new Promise((r) => setTimeout(r, 300));
    return socket;
  }

  it("should publish stamped events on the job topic", async () => {
    publisher = await createEventPublisher(testEventAddr);
    subscriber = await connectSubscriber();

    await publisher.publish({
      kind: "job.exited",
      jobId: "123456",
      exitCode: 3,
      exitSignal: null,
      reason: "exit",
    });

    const [topic, payload] = await subscriber.receive();
    expect(topic?.toString()).toBe("launch:123456");
    const event: unknown = JSON.parse(payload?.toString() ?? "null");
    expect(event).toMatchObject({
      kind: "job.exited",
      jobId: "123456",
      exitCode: 3,
      exitSignal: null,
      reason: "exit",
      version: 1,
      seq: 0,
    });
  });

  it("should number events in publication order", async () => {
    publisher = await createEventPublisher(testEventAddr);
    subscriber = await connectSubscriber();

    void publisher.publish({ kind: "job.signal", jobId: "7", received: "SIGINT", forwarded: "SIGTERM" });
    await publisher.publish({ kind: "job.signal", jobId: "7", received: "SIGTERM", forwarded: "SIGTERM" });

    const seqs: unknown[] = [];
    for (let i = 0; i < 2; i++) {
      const [, payload] = await subscriber.receive();
      const event: unknown = JSON.parse(payload?.toString() ?? "null");
      if (typeof event === "object" && event !== null && "seq" in event) {
        seqs.push(event.seq);
      }
    }
    expect(seqs).toEqual([0, 1]);
  });

  it("should do nothing without an address", async () => {
    publisher = await createEventPublisher(undefined);
    await expect(
      publisher.publish({ kind: "job.failed", jobId: "1", errorKind: "SpawnFailure", error: "x" }),
    ).resolves.toBeUndefined();
  });

  it("should report an unusable address as a configuration error", async () => {
    await expect(createEventPublisher("bogus://nowhere")).rejects.toBeInstanceOf(LaunchError);
    await expect(createEventPublisher("bogus://nowhere")).rejects.toMatchObject({
      kind: "InvalidConfiguration",
    });
  });
});
