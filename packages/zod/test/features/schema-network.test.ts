// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createLogger, LOG_CONTEXT } from "@topicbus/core";
import { describe, expect, expectTypeOf, it, vi } from "vitest";
import { createSchemaNetwork, z, type InferMessage } from "../../src/index.js";

const schemas = {
  "order.placed": z.object({ id: z.string(), qty: z.number().default(1) }),
  "order.shipped": z.object({ id: z.string() }),
  "order.note": z.string().transform((note) => note.length),
};

describe("createSchemaNetwork (zod)", () => {
  it("delivers parsed content with defaults applied", () => {
    const builder = createSchemaNetwork(schemas);
    const billing = builder.addSubscriber(["order.placed"]);
    const publisher = builder.build();

    publisher.publish("order.placed", { id: "o-1" });

    expect(billing.fetch()).toEqual([["order.placed", { id: "o-1", qty: 1 }]]);
  });

  it("delivers transformed output", () => {
    const builder = createSchemaNetwork(schemas);
    const notes = builder.addSubscriber(["order.note"]);
    const publisher = builder.build();

    publisher.publish("order.note", "fragile");

    expect(notes.fetch()).toEqual([["order.note", 7]]);
  });

  it("filters by topic like any network", () => {
    const builder = createSchemaNetwork(schemas);
    const billing = builder.addSubscriber(["order.placed"]);
    const shipping = builder.addSubscriber(["order.placed", "order.shipped"]);
    const publisher = builder.build();

    publisher.publish("order.shipped", { id: "o-2" });

    expect(billing.fetch()).toEqual([]);
    expect(shipping.fetch()).toEqual([["order.shipped", { id: "o-2" }]]);
  });

  it("drops invalid content and logs the issues", () => {
    const log = vi.fn();
    const builder = createSchemaNetwork(schemas, {
      logger: createLogger({ log }),
    });
    const billing = builder.addSubscriber(["order.placed"]);
    const publisher = builder.build();

    // Untyped input, as from a JavaScript caller
    const raw = JSON.parse('{ "id": "o-3", "qty": "many" }');
    expect(() => publisher.publish("order.placed", raw)).not.toThrow();

    expect(billing.fetch()).toEqual([]);
    expect(log).toHaveBeenCalledTimes(1);
    const [level, context, message, data] = log.mock.calls[0] ?? [];
    expect(level).toBe("warn");
    expect(context).toBe(LOG_CONTEXT.VALIDATION);
    expect(message).toContain('Content rejected for topic "order.placed":');
    expect(data).toMatchObject({
      topic: "order.placed",
      issues: [{ path: ["qty"] }],
    });
  });

  it("drops content whose transform throws", () => {
    const log = vi.fn();
    const builder = createSchemaNetwork(
      {
        "order.raw": z.string().transform((text): unknown => JSON.parse(text)),
      },
      { logger: createLogger({ log }) },
    );
    const raw = builder.addSubscriber(["order.raw"]);
    const publisher = builder.build();

    expect(() => publisher.publish("order.raw", "{not json")).not.toThrow();
    publisher.publish("order.raw", '{"id":"o-4"}');

    expect(raw.fetch()).toEqual([["order.raw", { id: "o-4" }]]);
    expect(log).toHaveBeenCalledTimes(1);
    const [level, context, message, data] = log.mock.calls[0] ?? [];
    expect(level).toBe("warn");
    expect(context).toBe(LOG_CONTEXT.VALIDATION);
    expect(message).toBe('Content validation failed for topic "order.raw"');
    expect(data).toMatchObject({ topic: "order.raw" });
  });

  it("ignores topics outside the schema map", () => {
    const builder = createSchemaNetwork(schemas);
    const billing = builder.addSubscriber(["order.placed"]);
    const publisher = builder.build();

    // Untyped topic, as from a JavaScript caller
    const topic = JSON.parse('"order.lost"');
    expect(() => publisher.publish(topic, { id: "o-5" })).not.toThrow();

    expect(billing.fetch()).toEqual([]);
  });

  it("infers message types per topic", () => {
    const builder = createSchemaNetwork(schemas);
    const subscriber = builder.addSubscriber(["order.placed", "order.note"]);

    expectTypeOf(subscriber.fetch()).toEqualTypeOf<
      InferMessage<typeof schemas, "order.placed" | "order.note">[]
    >();
    expectTypeOf<InferMessage<typeof schemas, "order.note">>().toEqualTypeOf<
      readonly [topic: "order.note", content: number]
    >();
  });
});
