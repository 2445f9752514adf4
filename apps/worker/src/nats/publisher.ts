import { headers as natsHeaders, type JetStreamClient } from "nats";
import { HEADERS, type ChannelPublisher, type PublishOptions, type PublishReceipt } from "../types/index.js";

/** Satisfied by NatsClient once connected */
export interface JetStreamSource {
  getJetStream(): Pick<JetStreamClient, "publish">;
}

/**
 * JetStream implementation of the channel publisher.
 * Resolves only once the stream acknowledged the message.
 */
export class JetStreamPublisher implements ChannelPublisher {
  constructor(private readonly natsClient: JetStreamSource) {}

  async publish(subject: string, payload: Uint8Array, options: PublishOptions): Promise<PublishReceipt> {
    const hdrs = natsHeaders();
    hdrs.set(HEADERS.MESSAGE_KEY, options.key);
    if (options.traceId) {
      hdrs.set(HEADERS.TRACE_ID, options.traceId);
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      hdrs.set(name, value);
    }

    const ack = await this.natsClient.getJetStream().publish(subject, payload, {
      msgID: options.msgId,
      headers: hdrs,
      timeout: options.timeoutMs,
    });

    return { stream: ack.stream, sequence: ack.seq, duplicate: ack.duplicate };
  }
}
