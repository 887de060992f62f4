// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Type-level inference utilities for Zod topic schemas.
 * All operations are compile-time only (zero runtime cost).
 */

import type {
  SchemaMessage,
  SchemaNetworkBuilder,
  SchemaPublisher,
  SchemaSubscriber,
} from "@topicbus/core";
import type { z } from "zod";

/**
 * Topic name → Zod schema of the content published under it.
 */
export type TopicSchemas = Record<string, z.ZodType>;

export type TopicOf<S extends TopicSchemas> = Extract<keyof S, string>;

/** What publishers pass for each topic (before parsing). */
export type InferInputs<S extends TopicSchemas> = {
  [K in TopicOf<S>]: z.input<S[K]>;
};

/** What subscribers receive for each topic (after parsing). */
export type InferOutputs<S extends TopicSchemas> = {
  [K in TopicOf<S>]: z.output<S[K]>;
};

export type ZodNetworkBuilder<S extends TopicSchemas> = SchemaNetworkBuilder<
  TopicOf<S>,
  InferInputs<S>,
  InferOutputs<S>,
  z.ZodType
>;

export type ZodPublisher<S extends TopicSchemas> = SchemaPublisher<
  TopicOf<S>,
  InferInputs<S>,
  z.ZodType
>;

export type ZodSubscriber<
  S extends TopicSchemas,
  K extends TopicOf<S> = TopicOf<S>,
> = SchemaSubscriber<InferOutputs<S>, K>;

export type InferMessage<
  S extends TopicSchemas,
  K extends TopicOf<S> = TopicOf<S>,
> = SchemaMessage<InferOutputs<S>, K>;
