/**
 * Launch Event Plane
 *
 * Optional PUB socket announcing job.started / job.signal / job.exited /
 * job.failed so an outside monitor can follow the launch. Topic is
 * `launch:<jobId>`, payload is the JSON event.
 */

import * as zmq from "zeromq";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { LaunchError, toError } from "./errors.js";
import { DEFAULT_EVENT_LINGER_MS, EVENT_TOPIC_PREFIX, PROTOCOL_VERSION } from "./protocol.js";
import type { LaunchEvent, LaunchEventBody } from "./types.js";

const log = createSubsystemLogger("launcher/events");

export interface LaunchEventPublisher {
  /** Queue an event; resolves once it is handed to the socket. Never rejects. */
  publish(event: LaunchEventBody): Promise<void>;
  /** Flush queued events and close the socket */
  close(): Promise<void>;
}

export type CreateEventPublisher = (address?: string) => Promise<LaunchEventPublisher>;

const noopPublisher: LaunchEventPublisher = {
  publish: async () => {},
  close: async () => {},
};

export function eventTopic(jobId: string): string {
  return `${EVENT_TOPIC_PREFIX}${jobId}`;
}

export const createEventPublisher: CreateEventPublisher = async (address) => {
  if (!address) {
    return noopPublisher;
  }

  const socket = new zmq.Publisher({ linger: DEFAULT_EVENT_LINGER_MS });
  try {
    await socket.bind(address);
  } catch (err) {
    socket.close();
    throw new LaunchError(
      "InvalidConfiguration",
      `Failed to bind event socket ${address}: ${toError(err).message}`,
      toError(err),
    );
  }
  log.info(`Publishing launch events on ${address}`);

  let nextSeq = 0;
  // Serialize sends; the socket rejects a send while another is in flight
  let queue: Promise<void> = Promise.resolve();

  return {
    publish(body) {
      const event: LaunchEvent = { ...body, version: PROTOCOL_VERSION, seq: nextSeq++, ts: Date.now() };
      queue = queue.then(async () => {
        try {
          await socket.send([eventTopic(event.jobId), JSON.stringify(event)]);
        } catch (err) {
          log.error(`Failed to publish ${event.kind}: ${toError(err).message}`);
        }
      });
      return queue;
    },

    async close() {
      await queue;
      socket.close();
    },
  };
};
