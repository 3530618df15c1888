import type { Writable } from "node:stream";
import type { OutboundSink } from "./types.js";

/** Writes deliveries to a stream, one block per message. */
export class ConsoleSink implements OutboundSink {
  constructor(private readonly out: Writable) {}

  async deliver(channelId: string, text: string): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.out.write(`[${channelId}] ${text}\n`, (err) => (err ? reject(err) : resolve()));
    });
  }
}
