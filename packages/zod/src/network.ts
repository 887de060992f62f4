// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { SchemaNetworkBuilder, type NetworkOptions } from "@topicbus/core";
import type { z } from "zod";
import type {
  InferInputs,
  InferOutputs,
  TopicOf,
  TopicSchemas,
  ZodNetworkBuilder,
} from "./types.js";
import { zodValidator } from "./validator.js";

/**
 * Starts a network whose topics are the keys of `schemas`.
 *
 * Content is parsed with the topic's schema on publish, so subscribers receive
 * the schema's output (defaults and transforms applied). Invalid content is
 * logged under the "validation" context and dropped.
 *
 * @example
 * ```typescript
 * import { createSchemaNetwork, z } from "@topicbus/zod";
 *
 * const builder = createSchemaNetwork({
 *   "order.placed": z.object({ id: z.string(), total: z.number() }),
 *   "order.shipped": z.object({ id: z.string() }),
 * });
 * const billing = builder.addSubscriber(["order.placed"]);
 * const publisher = builder.build();
 *
 * publisher.publish("order.placed", { id: "o-1", total: 42 });
 *
 * for (const [topic, order] of billing.fetch()) {
 *   // order: { id: string; total: number }
 * }
 * ```
 */
export function createSchemaNetwork<S extends TopicSchemas>(
  schemas: S,
  options?: NetworkOptions<unknown>,
): ZodNetworkBuilder<S> {
  return new SchemaNetworkBuilder<
    TopicOf<S>,
    InferInputs<S>,
    InferOutputs<S>,
    z.ZodType
  >(zodValidator(), schemas, options);
}
