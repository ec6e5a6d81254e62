/**
 * Boundary tests for DefaultNetworkLayer against a real HTTP server.
 *
 * @vitest-environment node
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { DefaultNetworkLayer } from "./network";
import { createTestServer, type TestServer } from "./network.test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";

describe("DefaultNetworkLayer", () => {
  let server: TestServer;

  beforeAll(async () => {
    server = createTestServer({
      "/hang": () => {
        // never responds
      },
    });
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  it("returns the response for a successful request", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger());

    const response = await network.fetch(server.url("/json"));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok" });
  });

  it("returns non-2xx responses without throwing", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger());

    const response = await network.fetch(server.url("/error/404"));

    expect(response.status).toBe(404);
    await response.body?.cancel();
  });

  it("sends default and per-request headers", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger(), {
      defaultHeaders: { "User-Agent": "release-fetch-test", Accept: "text/plain" },
    });

    const response = await network.fetch(server.url("/echo-headers"), {
      headers: { Accept: "application/json" },
    });
    const headers: unknown = await response.json();

    expect(headers).toMatchObject({
      "user-agent": "release-fetch-test",
      accept: "application/json",
    });
  });

  it("aborts when the response does not arrive in time", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger());

    await expect(network.fetch(server.url("/hang"), { timeout: 50 })).rejects.toMatchObject({
      name: "AbortError",
    });
  });

  it("rejects immediately for an already aborted signal", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger());
    const controller = new AbortController();
    controller.abort();

    await expect(
      network.fetch(server.url("/json"), { signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
  });

  it("cancels the body when the external signal fires after the headers", async () => {
    const network = new DefaultNetworkLayer(createSilentLogger());
    const controller = new AbortController();

    const response = await network.fetch(server.url("/stall"), { signal: controller.signal });
    const reader = response.body?.getReader();
    expect(reader).toBeDefined();
    const first = await reader?.read();
    expect(first?.done).toBe(false);

    const pending = reader?.read();
    controller.abort();

    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });
});
