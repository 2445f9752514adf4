import type {
  AckHandle,
  ChannelPublisher,
  PublishOptions,
  PublishReceipt,
} from "../../types/index.js";

export interface PublishedMessage {
  subject: string;
  payload: Uint8Array;
  options: PublishOptions;
}

/**
 * In-memory channel: records every publish, optionally failing the first N.
 */
export class FakePublisher implements ChannelPublisher {
  readonly published: PublishedMessage[] = [];
  attempts = 0;
  failuresLeft = 0;
  failWith = new Error("nats down");
  private sequence = 0;

  async publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PublishReceipt> {
    this.attempts++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw this.failWith;
    }
    this.published.push({ subject, payload, options });
    return { stream: "invoices", sequence: ++this.sequence, duplicate: false };
  }

  decoded(index: number): unknown {
    return JSON.parse(new TextDecoder().decode(this.published[index].payload));
  }
}

/**
 * Ack handle that records how the message was settled.
 */
export class RecordingAck implements AckHandle {
  commits = 0;
  releases: number[] = [];
  events: string[];

  constructor(events: string[] = []) {
    this.events = events;
  }

  async commit(): Promise<void> {
    this.commits++;
    this.events.push("commit");
  }

  release(delayMs: number): void {
    this.releases.push(delayMs);
    this.events.push(`release ${delayMs}`);
  }
}
