// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { MailboxSender, Message } from "./types.js";

// Dequeued slots are compacted away once this many accumulate
const COMPACT_THRESHOLD = 1024;

/**
 * Per-subscriber FIFO message queue.
 *
 * One consuming side (the owning Subscriber) and any number of producing
 * handles obtained from `sender()`. Unbounded unless a capacity is given;
 * a full mailbox rejects new messages instead of blocking.
 */
export class Mailbox<Topic, Content> {
  private queue: Message<Topic, Content>[] = [];
  private head = 0;
  private isClosed = false;
  private enqueued = 0;
  private dequeued = 0;

  constructor(readonly capacity: number = Infinity) {}

  get size(): number {
    return this.queue.length - this.head;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Sequence number of the newest queued message (count of accepted pushes).
   */
  get sequence(): number {
    return this.enqueued;
  }

  /**
   * Count of messages removed so far; the next `shift()` returns message
   * number `consumed + 1`.
   */
  get consumed(): number {
    return this.dequeued;
  }

  /**
   * Producing handle for the registry.
   *
   * The handle references the mailbox weakly: once the owning subscriber is
   * unreachable, the mailbox is collected and `send()` returns false.
   */
  sender(): MailboxSender<Topic, Content> {
    const ref = new WeakRef(this);
    return {
      send: (message) => ref.deref()?.push(message) ?? false,
    };
  }

  push(message: Message<Topic, Content>): boolean {
    if (this.isClosed || this.size >= this.capacity) {
      return false;
    }
    this.queue.push(message);
    this.enqueued++;
    return true;
  }

  shift(): Message<Topic, Content> | undefined {
    if (this.head >= this.queue.length) {
      return undefined;
    }
    const message = this.queue[this.head++];
    this.dequeued++;
    if (this.head === this.queue.length) {
      this.queue = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return message;
  }

  /**
   * Remove and return every queued message in arrival order.
   */
  drain(): Message<Topic, Content>[] {
    const messages = this.head === 0 ? this.queue : this.queue.slice(this.head);
    this.dequeued += messages.length;
    this.queue = [];
    this.head = 0;
    return messages;
  }

  /**
   * Drop the consuming side. Queued messages are discarded and every later
   * `push()` is rejected.
   */
  close(): void {
    this.isClosed = true;
    this.dequeued = this.enqueued;
    this.queue = [];
    this.head = 0;
  }
}
