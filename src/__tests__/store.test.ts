import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProfileStore } from "../profiles/store";
import { createProfile } from "../state";
import { DuplicateNameError, ProfileNotFoundError } from "../errors";

describe("ProfileStore", () => {
  const alive = new Set<number>();
  let store: ProfileStore;

  beforeEach(() => {
    alive.clear();
    store = new ProfileStore((pid) => pid !== undefined && alive.has(pid));
  });

  it("drops duplicate names on load, keeping the first", () => {
    store.replaceAll([
      createProfile("a", "/p/a.conf"),
      createProfile("a", "/p/other.conf"),
      createProfile("b", "/p/b.conf"),
    ]);

    expect(store.list().map((p) => [p.name, p.confPath])).toEqual([
      ["a", "/p/a.conf"],
      ["b", "/p/b.conf"],
    ]);
  });

  it("never trusts a recorded pid that is not alive", () => {
    alive.add(10);
    store.replaceAll([
      createProfile("live", "/p/live.conf", { pid: 10, proxyPort: 60000, running: false }),
      createProfile("dead", "/p/dead.conf", { pid: 11, proxyPort: 60001, running: true }),
    ]);

    const died = store.refresh();

    expect(died.map((p) => p.name)).toEqual(["dead"]);
    expect(store.get("live").running).toBe(true);
    expect(store.get("dead")).toMatchObject({ running: false, pid: undefined, proxyPort: undefined, lastPort: 60001 });
  });

  it("refreshes a single profile on lookup", () => {
    alive.add(10);
    store.replaceAll([createProfile("a", "/p/a.conf", { pid: 10, proxyPort: 60000, running: true })]);
    alive.delete(10);

    expect(store.findByName("a")?.running).toBe(false);
    expect(store.findByPort(60000)).toBeUndefined();
  });

  it("throws for unknown names", () => {
    expect(() => store.get("missing")).toThrow(ProfileNotFoundError);
  });

  it("rejects duplicate adds", () => {
    store.add(createProfile("a", "/p/a.conf"));
    expect(() => store.add(createProfile("a", "/p/a2.conf"))).toThrow(DuplicateNameError);
  });

  it("renames through the relocate callback", () => {
    store.add(createProfile("a", "/p/a.conf"));
    const relocate = vi.fn(() => "/p/b.conf");

    const renamed = store.rename("a", "b", relocate);

    expect(relocate).toHaveBeenCalledWith(renamed, "b");
    expect(renamed).toMatchObject({ name: "b", confPath: "/p/b.conf" });
    expect(store.has("a")).toBe(false);
  });

  it("refuses to rename onto an existing name", () => {
    store.add(createProfile("a", "/p/a.conf"));
    store.add(createProfile("b", "/p/b.conf"));
    const relocate = vi.fn(() => "/p/x.conf");

    expect(() => store.rename("a", "b", relocate)).toThrow(DuplicateNameError);
    expect(relocate).not.toHaveBeenCalled();
  });

  it("moves the bound port to lastPort on stop", () => {
    const profile = createProfile("a", "/p/a.conf");
    store.add(profile);
    alive.add(42);

    store.markStarted(profile, 42, 60005, "http");
    expect(store.running()).toEqual([profile]);
    expect(profile.proxyType).toBe("http");

    store.markStopped(profile);
    expect(profile).toMatchObject({ running: false, proxyPort: undefined, pid: undefined, lastPort: 60005 });
    expect(profile.proxyType).toBeUndefined();
  });

  it("lets one launch at a time claim a profile", () => {
    const profile = createProfile("a", "/p/a.conf");
    store.add(profile);

    expect(store.beginLaunch(profile)).toBe(true);
    expect(store.beginLaunch(profile)).toBe(false);
    expect(store.isLaunching(profile)).toBe(true);

    store.endLaunch(profile);
    expect(store.isLaunching(profile)).toBe(false);
  });
});
