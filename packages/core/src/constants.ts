// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Global constants: default option values and log contexts.
 */

// Default configuration
export const DEFAULTS = {
  MAILBOX_CAPACITY: Infinity,
  LOG_LEVEL: "warn",
} as const;

/**
 * Log context constants used by the network.
 *
 * Applications can use these to filter or categorize logs.
 */
export const LOG_CONTEXT = {
  REGISTRY: "registry",
  PUBLISH: "publish",
  MAILBOX: "mailbox",
  VALIDATION: "validation",
} as const;

export type LogContext = (typeof LOG_CONTEXT)[keyof typeof LOG_CONTEXT];
