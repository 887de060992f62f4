// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Schema-typed networks: one schema per topic, content validated on publish.
 *
 * Core never creates validators; `@topicbus/zod` and `@topicbus/valibot`
 * inject theirs and compute the per-topic input/output types.
 */

import { createNetwork, type NetworkBuilder } from "./builder.js";
import { LOG_CONTEXT } from "./constants.js";
import type { LoggerAdapter } from "./logger.js";
import { normalizeOptions, type NetworkOptions } from "./options.js";
import type { Publisher } from "./publisher.js";
import type { Subscriber } from "./subscriber.js";
import type { Message } from "./types.js";

export type ValidationOutcome =
  | { ok: true; value: unknown }
  | { ok: false; issues: readonly unknown[]; message: string };

/**
 * Validator contract implemented by schema library adapters.
 */
export interface ContentValidator<Schema> {
  validate(schema: Schema, content: unknown): ValidationOutcome;
}

/**
 * Delivered message of a schema network, discriminated by topic.
 */
export type SchemaMessage<Out, K extends keyof Out> = {
  [P in K]: readonly [topic: P, content: Out[P]];
}[K];

export class SchemaNetworkBuilder<
  Topics extends string,
  In extends Record<Topics, unknown>,
  Out extends Record<Topics, unknown>,
  Schema,
> {
  private readonly builder: NetworkBuilder<Topics, unknown>;
  private readonly logger: LoggerAdapter;

  constructor(
    private readonly validator: ContentValidator<Schema>,
    private readonly schemas: Record<Topics, Schema>,
    options?: NetworkOptions<unknown>,
  ) {
    const resolved = normalizeOptions(options);
    this.logger = resolved.logger;
    this.builder = createNetwork<Topics, unknown>(resolved);
  }

  addSubscriber<K extends Topics>(topics: readonly K[]): SchemaSubscriber<Out, K> {
    return new SchemaSubscriber<Out, K>(this.builder.addSubscriber(topics), topics);
  }

  build(): SchemaPublisher<Topics, In, Schema> {
    return new SchemaPublisher<Topics, In, Schema>(
      this.builder.build(),
      this.validator,
      this.schemas,
      this.logger,
    );
  }
}

export class SchemaPublisher<
  Topics extends string,
  In extends Record<Topics, unknown>,
  Schema,
> {
  /**
   * @internal Obtain publishers from `SchemaNetworkBuilder.build()` or `clone()`.
   */
  constructor(
    private readonly publisher: Publisher<Topics, unknown>,
    private readonly validator: ContentValidator<Schema>,
    private readonly schemas: Record<Topics, Schema>,
    private readonly logger: LoggerAdapter,
  ) {}

  /**
   * Validates `content` against the topic's schema and delivers the parsed
   * value. Invalid content, or a validator that throws, is logged and
   * dropped. Topics without a schema are ignored. Never throws.
   */
  publish<K extends Topics>(topic: K, content: In[K]): void {
    if (!Object.hasOwn(this.schemas, topic)) return;

    let outcome: ValidationOutcome;
    try {
      outcome = this.validator.validate(this.schemas[topic], content);
    } catch (error) {
      this.logger.warn(
        LOG_CONTEXT.VALIDATION,
        `Content validation failed for topic "${topic}"`,
        { topic, error },
      );
      return;
    }
    if (!outcome.ok) {
      this.logger.warn(
        LOG_CONTEXT.VALIDATION,
        `Content rejected for topic "${topic}": ${outcome.message}`,
        { topic, issues: outcome.issues },
      );
      return;
    }
    this.publisher.publish(topic, outcome.value);
  }

  clone(): SchemaPublisher<Topics, In, Schema> {
    return new SchemaPublisher<Topics, In, Schema>(
      this.publisher.clone(),
      this.validator,
      this.schemas,
      this.logger,
    );
  }

  hasTopic(topic: Topics): boolean {
    return this.publisher.hasTopic(topic);
  }

  listTopics(): readonly Topics[] {
    return this.publisher.listTopics();
  }
}

export class SchemaSubscriber<Out, K extends keyof Out & string> {
  private readonly accepted: ReadonlySet<string>;

  constructor(
    private readonly subscriber: Subscriber<string, unknown>,
    readonly topics: readonly K[],
  ) {
    this.accepted = new Set(topics);
  }

  get closed(): boolean {
    return this.subscriber.closed;
  }

  fetch(): SchemaMessage<Out, K>[] {
    return this.subscriber.fetch().filter(this.isSchemaMessage);
  }

  drain(): IterableIterator<SchemaMessage<Out, K>> {
    return this.narrow(this.subscriber.drain());
  }

  close(): void {
    this.subscriber.close();
  }

  private *narrow(
    messages: Iterable<Message<string, unknown>>,
  ): IterableIterator<SchemaMessage<Out, K>> {
    for (const message of messages) {
      if (this.isSchemaMessage(message)) yield message;
    }
  }

  // Type narrowing only: the registry delivers this subscriber's topics, and
  // the publisher sends each one's parsed schema output.
  private readonly isSchemaMessage = (
    message: Message<string, unknown>,
  ): message is SchemaMessage<Out, K> => this.accepted.has(message[0]);
}
