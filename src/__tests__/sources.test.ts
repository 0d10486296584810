import { describe, it, expect, beforeEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ProfileSources, assertProfileName, parseEndpointHost, sanitizeName } from "../profiles/sources";
import { ArtifactExistsError, InvalidConfigError } from "../errors";
import { createProfile } from "../state";
import { WIREGUARD_CONF, makeTempDir } from "./fakes";

describe("parseEndpointHost", () => {
  it("strips the port from a hostname", () => {
    expect(parseEndpointHost(WIREGUARD_CONF)).toBe("vpn.example.com");
  });

  it("unwraps bracketed IPv6 endpoints", () => {
    expect(parseEndpointHost("[Peer]\nEndpoint = [2001:db8::1]:51820\n")).toBe("2001:db8::1");
  });

  it("ignores trailing comments", () => {
    expect(parseEndpointHost("Endpoint = 198.51.100.4:51820 # exit node\n")).toBe("198.51.100.4");
  });

  it("returns null without an endpoint", () => {
    expect(parseEndpointHost("[Interface]\nAddress = 10.0.0.2/32\n")).toBeNull();
  });
});

describe("sanitizeName", () => {
  it("keeps letters, digits, dash and underscore", () => {
    expect(sanitizeName("  my vpn-1_a! ")).toBe("myvpn-1_a");
  });

  it("falls back when nothing survives", () => {
    expect(sanitizeName("!!!")).toBe("imported");
  });

  it("drops a trailing launch config suffix", () => {
    expect(sanitizeName("vpn_wireproxy")).toBe("vpn");
    expect(sanitizeName("_wireproxy")).toBe("imported");
  });
});

describe("assertProfileName", () => {
  it("accepts plain names", () => {
    expect(() => assertProfileName("home-2_b")).not.toThrow();
  });

  it.each(["../x", "a/b", "a\\b", "has space", ""])("rejects %j", (name) => {
    expect(() => assertProfileName(name)).toThrow(InvalidConfigError);
  });

  it("rejects names that look like launch configs", () => {
    expect(() => assertProfileName("vpn_wireproxy")).toThrow("names may not end in '_wireproxy'");
  });
});

describe("ProfileSources", () => {
  let dir: string;
  let sources: ProfileSources;

  beforeEach(() => {
    dir = makeTempDir();
    sources = new ProfileSources(dir);
  });

  it("suffixes imported text on name collisions", () => {
    fs.writeFileSync(path.join(dir, "home_1.conf"), WIREGUARD_CONF);

    const profile = sources.importText("home", WIREGUARD_CONF, new Set(["home"]));

    expect(profile.name).toBe("home_2");
    expect(profile.confPath).toBe(path.join(dir, "home_2.conf"));
    expect(fs.readFileSync(profile.confPath, "utf8")).toBe(WIREGUARD_CONF);
  });

  it("rejects text that is not a WireGuard config", () => {
    expect(() => sources.importText("x", "hello", new Set())).toThrow(InvalidConfigError);
  });

  it("discovers new .conf files and skips launch configs", () => {
    fs.writeFileSync(path.join(dir, "b.conf"), WIREGUARD_CONF);
    fs.writeFileSync(path.join(dir, "a.conf"), WIREGUARD_CONF);
    fs.writeFileSync(path.join(dir, "a_wireproxy.conf"), "WGConfig = x");
    fs.writeFileSync(path.join(dir, "notes.txt"), "");

    expect(sources.discover(new Set(["b"])).map((p) => p.name)).toEqual(["a"]);
  });

  it("imports a file by its base name and refuses to overwrite", () => {
    const outside = makeTempDir();
    const file = path.join(outside, "travel.conf");
    fs.writeFileSync(file, WIREGUARD_CONF);

    const profile = sources.importFile(file);
    expect(profile.name).toBe("travel");
    expect(fs.existsSync(path.join(dir, "travel.conf"))).toBe(true);
    expect(() => sources.importFile(file)).toThrow(ArtifactExistsError);
  });

  it("keeps imported text out of the launch config namespace", () => {
    const profile = sources.importText("vpn_wireproxy", WIREGUARD_CONF, new Set());

    expect(profile.name).toBe("vpn");
    sources.cleanupLaunchConfigs(new Set());
    expect(fs.existsSync(profile.confPath)).toBe(true);
    expect(sources.discover(new Set()).map((p) => p.name)).toEqual(["vpn"]);
  });

  it("refuses to import a file named like a launch config", () => {
    const file = path.join(makeTempDir(), "vpn_wireproxy.conf");
    fs.writeFileSync(file, WIREGUARD_CONF);

    expect(() => sources.importFile(file)).toThrow(InvalidConfigError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("refuses to relocate outside the profiles directory", () => {
    const profile = sources.importText("a", WIREGUARD_CONF, new Set());

    expect(() => sources.relocate(profile, "../escaped")).toThrow(InvalidConfigError);
    expect(() => sources.relocate(profile, "a_wireproxy")).toThrow(InvalidConfigError);
    expect(fs.existsSync(path.join(dir, "a.conf"))).toBe(true);
    expect(fs.existsSync(path.join(dir, "..", "escaped.conf"))).toBe(false);
  });

  it("relocates on rename unless the target exists", () => {
    const profile = sources.importText("a", WIREGUARD_CONF, new Set());
    fs.writeFileSync(path.join(dir, "taken.conf"), WIREGUARD_CONF);

    expect(() => sources.relocate(profile, "taken")).toThrow(ArtifactExistsError);
    expect(sources.relocate(profile, "b")).toBe(path.join(dir, "b.conf"));
    expect(fs.existsSync(path.join(dir, "a.conf"))).toBe(false);
  });

  it("caches the endpoint host until the config is rewritten", () => {
    const profile = sources.importText("a", WIREGUARD_CONF, new Set());
    expect(sources.endpointHost(profile)).toBe("vpn.example.com");

    sources.write(profile, WIREGUARD_CONF.replace("vpn.example.com", "other.example.net"));
    expect(sources.endpointHost(profile)).toBe("other.example.net");
  });

  it("relinks a missing source to a copy", () => {
    const profile = createProfile("gone", path.join(dir, "elsewhere", "gone.conf"));
    const replacement = path.join(makeTempDir(), "new.conf");
    fs.writeFileSync(replacement, WIREGUARD_CONF);

    expect(sources.exists(profile)).toBe(false);
    sources.relink(profile, replacement);

    expect(profile.confPath).toBe(path.join(dir, "gone.conf"));
    expect(sources.exists(profile)).toBe(true);
  });

  it("removes launch configs except those kept", () => {
    fs.writeFileSync(path.join(dir, "a_wireproxy.conf"), "");
    fs.writeFileSync(path.join(dir, "b_wireproxy.conf"), "");
    fs.writeFileSync(path.join(dir, "a.conf"), WIREGUARD_CONF);

    expect(sources.cleanupLaunchConfigs(new Set(["b"]))).toBe(1);
    expect(fs.readdirSync(dir).sort()).toEqual(["a.conf", "b_wireproxy.conf"]);
  });
});
