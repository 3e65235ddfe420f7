// Tests for session configuration

import { describe, it, expect } from "vitest";
import {
  Format,
  MAX_CLIENT_ID_LENGTH,
  parseFormat,
  parseObjectId,
  formatObjectId,
  parsePort,
  validateClientId,
  resolveSessionConfig,
} from "./config.ts";
import { ConfigurationError } from "./errors.ts";

function configError(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e;
    throw e;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseFormat", () => {
  it("accepts JSON and AVRO in any case", () => {
    expect(parseFormat("JSON")).toBe(Format.Json);
    expect(parseFormat("avro")).toBe(Format.Avro);
    expect(parseFormat(" Json ")).toBe(Format.Json);
  });

  it("rejects anything else", () => {
    const err = configError(() => parseFormat("XML"));
    expect(err.field).toBe("format");
    expect(err.message).toBe('unknown format "XML", expected JSON or AVRO');
  });
});

describe("parseObjectId", () => {
  it("parses database and table", () => {
    expect(parseObjectId("shop.orders")).toEqual({ database: "shop", table: "orders" });
  });

  it("parses an optional version", () => {
    expect(parseObjectId("shop.orders.000002")).toEqual({
      database: "shop",
      table: "orders",
      version: "000002",
    });
  });

  it.each(["orders", "a.b.c.d", "shop..orders", ".orders", "shop.", "shop.my orders", ""])(
    "rejects %j",
    (value) => {
      expect(configError(() => parseObjectId(value)).field).toBe("object");
    },
  );

  it("formats back to the wire form", () => {
    expect(formatObjectId(parseObjectId("shop.orders"))).toBe("shop.orders");
    expect(formatObjectId(parseObjectId("shop.orders.000002"))).toBe("shop.orders.000002");
  });
});

describe("parsePort", () => {
  it("accepts numbers and numeric strings in range", () => {
    expect(parsePort(4001)).toBe(4001);
    expect(parsePort("1")).toBe(1);
    expect(parsePort("65535")).toBe(65535);
  });

  it.each([0, 65536, 3.5, -1, "abc", ""])("rejects %j", (value) => {
    expect(configError(() => parsePort(value)).field).toBe("port");
  });
});

describe("validateClientId", () => {
  it("accepts a UUID without dashes", () => {
    const id = "0b7c9d1e4f7a4b0e9a526f0e4c1d2a3b";
    expect(validateClientId(id)).toBe(id);
  });

  it("accepts exactly 32 characters", () => {
    expect(validateClientId("x".repeat(32))).toBe("x".repeat(32));
  });

  it("rejects ids the server would cut short", () => {
    expect(configError(() => validateClientId("a,b")).field).toBe("clientId");
    expect(configError(() => validateClientId("a b")).field).toBe("clientId");
    expect(configError(() => validateClientId("x".repeat(33))).field).toBe("clientId");
    expect(configError(() => validateClientId("")).field).toBe("clientId");
  });
});

describe("resolveSessionConfig", () => {
  it("applies defaults", () => {
    const config = resolveSessionConfig({ object: "shop.orders", clientId: "client-1" });
    expect(config).toEqual({
      host: "localhost",
      port: 4001,
      user: "",
      password: "",
      object: { database: "shop", table: "orders" },
      format: "JSON",
      clientId: "client-1",
    });
  });

  it("generates a client id when none is given", () => {
    const config = resolveSessionConfig({ object: "shop.orders" });
    expect(config.clientId).toMatch(/^[0-9a-f]{32}$/);
    expect(config.clientId.length).toBeLessThanOrEqual(MAX_CLIENT_ID_LENGTH);
  });

  it("returns a frozen object", () => {
    const config = resolveSessionConfig({ object: "shop.orders" });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.object)).toBe(true);
  });

  it("normalizes format and port", () => {
    const config = resolveSessionConfig({ object: "shop.orders", format: "avro", port: "5000" });
    expect(config.format).toBe("AVRO");
    expect(config.port).toBe(5000);
  });

  it("rejects an empty host", () => {
    expect(configError(() => resolveSessionConfig({ object: "a.b", host: " " })).field).toBe(
      "host",
    );
  });
});
