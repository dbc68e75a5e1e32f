import { describe, it, expect } from "vitest";
import { mergeOverrides } from "./merge.js";

describe("mergeOverrides", () => {
  it("overrides scalars", () => {
    const result = mergeOverrides({ settings: { concurrency: 1 } }, { settings: { concurrency: 4 } });
    expect(result).toEqual({ settings: { concurrency: 4 } });
  });

  it("merges a single unit field without touching its siblings", () => {
    const result = mergeOverrides(
      {
        units: {
          kea: { kind: "package", version: "2.4.0" },
          dnsmasq: { kind: "package" },
        },
      },
      { units: { kea: { version: "2.6.1" } } },
    );
    expect(result).toEqual({
      units: {
        kea: { kind: "package", version: "2.6.1" },
        dnsmasq: { kind: "package" },
      },
    });
  });

  it("null removes a unit", () => {
    const result = mergeOverrides(
      { units: { kea: { kind: "package" }, dhcpd: { kind: "service" } } },
      { units: { dhcpd: null } },
    );
    expect(result).toEqual({ units: { kea: { kind: "package" } } });
  });

  it("replaces sequences entirely", () => {
    const result = mergeOverrides(
      { units: { web: { kind: "service", depends_on: ["a", "b"] } } },
      { units: { web: { depends_on: ["c"] } } },
    );
    expect(result).toEqual({ units: { web: { kind: "service", depends_on: ["c"] } } });
  });

  it("does not mutate the base document", () => {
    const base = { settings: { rollback: true } };
    mergeOverrides(base, { settings: { rollback: false } });
    expect(base).toEqual({ settings: { rollback: true } });
  });
});
