import { describe, it, expect, afterEach } from "vitest";
import * as net from "net";
import { createPortProbe, isPortFreeOnHost } from "../ports/probe";

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Server has no port"));
      }
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("isPortFreeOnHost", () => {
  let server: net.Server | null = null;

  afterEach(async () => {
    if (server?.listening) await close(server);
    server = null;
  });

  it("reports a listening port as busy", async () => {
    server = net.createServer((socket) => socket.destroy());
    const port = await listen(server);

    await expect(isPortFreeOnHost(port)).resolves.toBe(false);
  });

  it("reports a port as free once nothing listens on it", async () => {
    server = net.createServer((socket) => socket.destroy());
    const port = await listen(server);
    await close(server);

    await expect(createPortProbe(300)(port)).resolves.toBe(true);
  });
});
