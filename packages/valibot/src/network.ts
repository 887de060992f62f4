// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { SchemaNetworkBuilder, type NetworkOptions } from "@topicbus/core";
import type { GenericSchema } from "valibot";
import type {
  InferInputs,
  InferOutputs,
  TopicOf,
  TopicSchemas,
  ValibotNetworkBuilder,
} from "./types.js";
import { valibotValidator } from "./validator.js";

/**
 * Starts a network whose topics are the keys of `schemas`; content is parsed
 * with Valibot on publish and invalid content is dropped.
 *
 * @example
 * ```typescript
 * import { createSchemaNetwork, v } from "@topicbus/valibot";
 *
 * const builder = createSchemaNetwork({
 *   "sensor.reading": v.object({ id: v.string(), celsius: v.number() }),
 * });
 * const dashboard = builder.addSubscriber(["sensor.reading"]);
 * const publisher = builder.build();
 * ```
 */
export function createSchemaNetwork<S extends TopicSchemas>(
  schemas: S,
  options?: NetworkOptions<unknown>,
): ValibotNetworkBuilder<S> {
  return new SchemaNetworkBuilder<
    TopicOf<S>,
    InferInputs<S>,
    InferOutputs<S>,
    GenericSchema
  >(valibotValidator(), schemas, options);
}
