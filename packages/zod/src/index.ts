// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * @topicbus/zod - Zod-typed topics for topicbus networks
 *
 * Canonical import source for Zod-based networks.
 *
 * @example
 * ```typescript
 * import { z, createSchemaNetwork } from "@topicbus/zod";
 *
 * const builder = createSchemaNetwork({ ping: z.object({ at: z.number() }) });
 * const subscriber = builder.addSubscriber(["ping"]);
 * const publisher = builder.build();
 * ```
 */

// Canonical Zod instance (single import source)
export { z } from "zod";

export { createSchemaNetwork } from "./network.js";
export { zodValidator } from "./validator.js";

// Type inference utilities (type-level only)
export type {
  InferInputs,
  InferMessage,
  InferOutputs,
  TopicOf,
  TopicSchemas,
  ZodNetworkBuilder,
  ZodPublisher,
  ZodSubscriber,
} from "./types.js";
