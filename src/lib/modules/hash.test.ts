import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { fingerprintFile, hashBuffer } from "./hash.js";

let tmp: string;

beforeEach(() => {
  tmp = mkdtempSync(join(tmpdir(), "converge-hash-"));
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

describe("hashBuffer", () => {
  it("is the sha256 hex digest", () => {
    expect(hashBuffer(Buffer.alloc(0))).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("differs for different content", () => {
    expect(hashBuffer(Buffer.from("hello"))).not.toBe(hashBuffer(Buffer.from("world")));
  });
});

describe("fingerprintFile", () => {
  it("returns null when nothing is there", () => {
    expect(fingerprintFile(join(tmp, "missing.conf"))).toBeNull();
  });

  it("reports hash and permission bits", () => {
    const file = join(tmp, "secret.conf");
    writeFileSync(file, "token = test-secret\n");
    chmodSync(file, 0o600);
    expect(fingerprintFile(file)).toEqual({ hash: hashBuffer(Buffer.from("token = test-secret\n")), mode: 0o600, isFile: true });
  });

  it("marks directories as not files", () => {
    const dir = join(tmp, "conf.d");
    mkdirSync(dir);
    chmodSync(dir, 0o755);
    expect(fingerprintFile(dir)).toEqual({ hash: "", mode: 0o755, isFile: false });
  });
});
