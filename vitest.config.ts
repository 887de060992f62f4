// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    // Lets tests force garbage collection of dropped subscribers
    poolOptions: { forks: { execArgv: ["--expose-gc"] } },
  },
});
