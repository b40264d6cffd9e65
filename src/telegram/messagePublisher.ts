import type { DomainEvent } from "../types.js";
import type { MessageGovernor } from "../governor/messageGovernor.js";
import type { TelegramBotLike } from "./sendTelegramMessageSafe.js";
import { sendTelegramMessageSafe } from "./sendTelegramMessageSafe.js";
import { formatEventText } from "./telegramFormatter.js";
import { orderEvents } from "./messageOrder.js";

export class MessagePublisher {
  // Single publish queue to serialize all messages
  private publishQueue: Promise<void> = Promise.resolve();
  private counters = { sent: 0, blocked: 0, failed: 0 };

  constructor(
    private governor: MessageGovernor,
    private bot: TelegramBotLike,
    private chatId: number,
    private readonly instanceId: string,
    private readonly pauseMs: number = 100
  ) {}

  getCounters(): { sent: number; blocked: number; failed: number } {
    return { ...this.counters };
  }

  /**
   * Publish event through MessageGovernor (single choke point)
   */
  private async publish(event: DomainEvent): Promise<boolean> {
    const text = formatEventText(event);
    if (!text) return false;
    if (!this.governor.shouldSend(event)) {
      this.counters.blocked += 1;
      return false;
    }
    await sendTelegramMessageSafe(this.bot, this.chatId, `[${this.instanceId}] ${text}`);
    this.counters.sent += 1;
    return true;
  }

  /**
   * Publish a batch in strict priority order. Batches are queued so they never interleave;
   * a failed send is logged and the rest of the batch still goes out.
   */
  async publishOrdered(events: DomainEvent[]): Promise<void> {
    if (events.length === 0) return;

    this.publishQueue = this.publishQueue.then(() => this.publishBatch(events));
    await this.publishQueue;
  }

  /** Send raw text (command replies), serialized behind queued alerts. */
  async sendText(text: string): Promise<void> {
    const run = this.publishQueue.then(() => sendTelegramMessageSafe(this.bot, this.chatId, text));
    // The queue itself must stay resolved; the caller still sees the rejection
    this.publishQueue = run.catch(() => undefined);
    await run;
  }

  private async publishBatch(events: DomainEvent[]): Promise<void> {
    const ordered = orderEvents(events);
    const total = ordered.length;
    for (let idx = 0; idx < total; idx++) {
      const event = ordered[idx]!;
      try {
        const sent = await this.publish(event);
        if (sent) {
          console.log(`[PUB] sent ${event.type} ${event.symbol} idx=${idx + 1}/${total}`);
          // Small delay to ensure Telegram receives in order
          if (this.pauseMs > 0) await new Promise((r) => setTimeout(r, this.pauseMs));
        }
      } catch (err: unknown) {
        this.counters.failed += 1;
        console.error(`[PUB] failed ${event.type} ${event.symbol}:`, err instanceof Error ? err.message : err);
      }
    }
  }
}
