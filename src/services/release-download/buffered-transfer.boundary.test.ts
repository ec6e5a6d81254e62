/**
 * Boundary tests for BufferedTransfer against a real HTTP server.
 *
 * @vitest-environment node
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { BufferedTransfer } from "./buffered-transfer";
import { DefaultNetworkLayer } from "../platform/network";
import { createTestServer, type TestServer } from "../platform/network.test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";
import { createTempDir, type TempDir } from "../test-utils";

const PAYLOAD = Buffer.from("0123456789".repeat(1000));

describe("BufferedTransfer (boundary)", () => {
  let server: TestServer;
  let tempDir: TempDir;

  beforeAll(async () => {
    server = createTestServer({
      "/payload.bin": (_req, res) => {
        res.writeHead(200, {
          "Content-Type": "application/octet-stream",
          "Content-Length": String(PAYLOAD.length),
        });
        res.end(PAYLOAD);
      },
    });
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
  });

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("downloads a body larger than the buffer", async () => {
    const transfer = new BufferedTransfer(
      new DefaultNetworkLayer(createSilentLogger()),
      createSilentLogger(),
      { bufferSize: 1024 }
    );
    const destination = join(tempDir.path, "payload.bin");
    let lastProgress = 0;

    const result = await transfer.transfer(server.url("/payload.bin"), destination, {
      onProgress: (progress) => {
        lastProgress = progress.bytesDownloaded;
      },
    });

    expect(result.bytesWritten).toBe(PAYLOAD.length);
    expect(lastProgress).toBe(PAYLOAD.length);
    expect((await readFile(destination)).equals(PAYLOAD)).toBe(true);
  });

  it("fails with HTTP_ERROR for a 404", async () => {
    const transfer = new BufferedTransfer(
      new DefaultNetworkLayer(createSilentLogger()),
      createSilentLogger(),
      { bufferSize: 1024 }
    );

    await expect(
      transfer.transfer(server.url("/error/404"), join(tempDir.path, "missing.bin"))
    ).rejects.toMatchObject({ errorCode: "HTTP_ERROR", status: 404 });
  });

  it("aborts a stalled body", async () => {
    const transfer = new BufferedTransfer(
      new DefaultNetworkLayer(createSilentLogger()),
      createSilentLogger(),
      { bufferSize: 1024 }
    );

    await expect(
      transfer.transfer(server.url("/stall"), join(tempDir.path, "stall.bin"), {
        signal: AbortSignal.timeout(200),
      })
    ).rejects.toMatchObject({ errorCode: "ABORTED" });
  });
});
