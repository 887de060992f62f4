// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { describe, expect, expectTypeOf, it } from "vitest";
import {
  createNetwork,
  NetworkError,
  type NetworkBuilder,
  type Publisher,
} from "../../src/index.js";

describe("setup freeze", () => {
  it("build() yields a publisher type without addSubscriber", () => {
    expectTypeOf<Publisher<string, string>>().not.toHaveProperty("addSubscriber");
    expectTypeOf<NetworkBuilder<string, string>>().toHaveProperty("addSubscriber");
    expectTypeOf<NetworkBuilder<string, string>["build"]>().returns.toEqualTypeOf<
      Publisher<string, string>
    >();
  });

  it("publisher has no setup-phase methods at runtime", () => {
    const publisher = createNetwork<string, string>().build();

    expect("addSubscriber" in publisher).toBe(false);
    expect("build" in publisher).toBe(false);
  });

  it("a leaked builder cannot add subscribers to the built network", () => {
    const builder = createNetwork<string, string>();
    builder.addSubscriber(["t"]);
    const publisher = builder.build();

    expect(() => builder.addSubscriber(["late"])).toThrow(NetworkError);
    expect(publisher.listTopics()).toEqual(["t"]);
  });

  it("reports NETWORK_SEALED for a second build()", () => {
    const builder = createNetwork<string, string>();
    builder.build();

    try {
      builder.build();
      expect.unreachable("second build() must throw");
    } catch (err) {
      expect(err).toBeInstanceOf(NetworkError);
      if (err instanceof NetworkError) {
        expect(err.code).toBe("NETWORK_SEALED");
      }
    }
  });

  it("rejects invalid options at createNetwork()", () => {
    expect(() => createNetwork({ mailboxCapacity: 0 })).toThrow(
      "mailboxCapacity must be a positive integer or Infinity, got 0",
    );
  });
});
