import { describe, it, expect, vi, afterEach } from "vitest";
import { PosixBackend, Win32Backend, selectBackend } from "../process/backend";

function errno(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

describe("process backends", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("picks the backend from the platform", () => {
    expect(selectBackend("win32").platform).toBe("win32");
    expect(selectBackend("linux").platform).toBe("posix");
  });

  describe.each([new PosixBackend(), new Win32Backend()])("$platform isAlive", (backend) => {
    it("checks liveness with signal 0", () => {
      const kill = vi.spyOn(process, "kill").mockImplementation(() => true);

      expect(backend.isAlive(4321)).toBe(true);
      expect(kill).toHaveBeenCalledWith(4321, 0);
    });

    it("treats a process owned by another user as alive", () => {
      vi.spyOn(process, "kill").mockImplementation(() => {
        throw errno("EPERM");
      });
      expect(backend.isAlive(4321)).toBe(true);
    });

    it("treats a missing process as dead", () => {
      vi.spyOn(process, "kill").mockImplementation(() => {
        throw errno("ESRCH");
      });
      expect(backend.isAlive(4321)).toBe(false);
    });
  });
});
