import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Server } from "http";
import { createApp } from "../api";
import { ProfileManager } from "../manager";
import { RANGE_START, WIREGUARD_CONF, createTestManager } from "./fakes";

describe("REST API", () => {
  let manager: ProfileManager;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    manager = createTestManager().manager;
    server = createApp(manager).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    baseUrl = address && typeof address === "object" ? `http://127.0.0.1:${address.port}` : "";
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function send(method: string, route: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("lists profiles", async () => {
    const res = await send("GET", "/profiles");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject([{ name: "alpha" }, { name: "bravo" }, { name: "charlie" }]);
  });

  it("connects and disconnects a profile", async () => {
    const connected = await send("POST", "/profiles/alpha/connect", {});
    expect(connected.status).toBe(200);
    expect(await connected.json()).toEqual({ name: "alpha", port: RANGE_START, pid: 1000 });

    const disconnected = await send("POST", "/profiles/alpha/disconnect");
    expect(disconnected.status).toBe(200);
    expect(await disconnected.json()).toMatchObject({ name: "alpha", running: false, lastPort: RANGE_START });
  });

  it("maps a missing profile to 404", async () => {
    const res = await send("POST", "/profiles/nope/connect", {});

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Profile 'nope' not found", code: "profile-not-found" });
  });

  it("maps a contended port to 409 unless overridden", async () => {
    await send("POST", "/profiles/alpha/connect", {});

    const refused = await send("POST", "/profiles/bravo/connect", { port: RANGE_START });
    expect(refused.status).toBe(409);
    expect(await refused.json()).toMatchObject({ code: "port-contended" });

    const forced = await send("POST", "/profiles/bravo/connect", { port: RANGE_START, override: true });
    expect(forced.status).toBe(200);
    expect(manager.get("alpha").running).toBe(false);
  });

  it("maps an out-of-range port to 400", async () => {
    await send("PUT", "/settings", { portLimit: 2 });

    const res = await send("POST", "/profiles/alpha/connect", { port: RANGE_START + 9 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "port-out-of-range" });
  });

  it("imports config text", async () => {
    const res = await send("POST", "/profiles", { name: "alpha", content: WIREGUARD_CONF });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ name: "alpha_1", running: false, host: "vpn.example.com" });
  });

  it("rejects malformed bodies with 400", async () => {
    const res = await send("POST", "/profiles", { name: "x" });
    expect(res.status).toBe(400);
  });

  it("renames a profile", async () => {
    const res = await send("PATCH", "/profiles/alpha", { name: "delta" });

    expect(res.status).toBe(200);
    expect(manager.list().map((p) => p.name)).toEqual(["delta", "bravo", "charlie"]);
  });

  it("rejects a rename that would leave the profiles directory", async () => {
    const res = await send("PATCH", "/profiles/alpha", { name: "../x" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "invalid-config" });
    expect(manager.list().map((p) => p.name)).toEqual(["alpha", "bravo", "charlie"]);
  });

  it("deletes a profile", async () => {
    const res = await send("DELETE", "/profiles/charlie");

    expect(res.status).toBe(204);
    expect(manager.list().map((p) => p.name)).toEqual(["alpha", "bravo"]);
  });

  it("reads and validates settings", async () => {
    const invalid = await send("PUT", "/settings", { proxyType: "ftp" });
    expect(invalid.status).toBe(400);

    const updated = await send("PUT", "/settings", { proxyType: "http", portLimit: 4 });
    expect(updated.status).toBe(200);

    const res = await send("GET", "/settings");
    expect(await res.json()).toMatchObject({
      proxyType: "http",
      portLimit: 4,
      allowedRange: { start: RANGE_START, end: RANGE_START + 3 },
    });
  });

  it("starts auto-connect in the background", async () => {
    const res = await send("POST", "/auto-connect", {});

    expect(res.status).toBe(202);
    await manager.whenAutoConnectIdle();
    expect(manager.list().every((p) => p.running)).toBe(true);
  });
});
