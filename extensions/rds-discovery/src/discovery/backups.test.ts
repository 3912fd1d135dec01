import { describe, it, expect } from "vitest";
import { backupCategoryFor, correlateBackups } from "./backups.js";
import { FakeProviderGateway } from "../testing/fake-gateway.js";
import { makeClusterSnapshot, makeSnapshot } from "../testing/fixtures.js";
import { ProviderError } from "../errors.js";

describe("correlateBackups", () => {
  it("collects manual and automated snapshots of the owner", async () => {
    const gateway = new FakeProviderGateway()
      .addBackup(makeSnapshot("rds:my-db-2026-03-02", "my-db", "automated"))
      .addBackup(makeSnapshot("my-db-before-upgrade", "my-db", "manual"))
      .addBackup(makeSnapshot("other-db-snap", "other-db", "manual"));

    const result = await correlateBackups("my-db", "instance", { gateway, includeTags: true });

    expect(result.unavailable).toEqual([]);
    expect(result.backups.map((b) => [b.identifier, b.type])).toEqual([
      ["my-db-before-upgrade", "manual"],
      ["rds:my-db-2026-03-02", "automated"],
    ]);
    expect(gateway.calls).toEqual(["backups:instance:my-db:manual", "backups:instance:my-db:automated"]);
  });

  it("drops artifacts from another origin even when the server returns them", async () => {
    const gateway = new FakeProviderGateway().setListing("my-db", "instance", "manual", [
      makeSnapshot("my-db-1", "my-db"),
      makeSnapshot("my-db-copy", "my-db-restored"),
    ]);

    const result = await correlateBackups("my-db", "instance", { gateway, includeTags: true });

    expect(result.backups.map((b) => b.identifier)).toEqual(["my-db-1"]);
    expect(result.unavailable).toEqual([]);
  });

  it("reports artifacts without an origin as ambiguous", async () => {
    const gateway = new FakeProviderGateway().setListing("prod", "cluster", "automated", [
      makeClusterSnapshot("rds:prod-2026-03-01", undefined, "automated"),
    ]);

    const result = await correlateBackups("prod", "cluster", { gateway, includeTags: true });

    expect(result.backups).toEqual([]);
    expect(result.unavailable).toEqual([
      {
        scope: "prod",
        category: "clusterSnapshots",
        identifier: "rds:prod-2026-03-01",
        backupType: "automated",
        reason: "ambiguous-origin",
        message: "snapshot does not record the resource it was taken from",
      },
    ]);
  });

  it("keeps valid snapshots when the listing carried unidentified items", async () => {
    const gateway = new FakeProviderGateway().setListing("my-db", "instance", "manual", [makeSnapshot("my-db-1", "my-db")], 2);

    const result = await correlateBackups("my-db", "instance", { gateway, includeTags: true });

    expect(result.backups.map((b) => b.identifier)).toEqual(["my-db-1"]);
    expect(result.unavailable).toEqual([
      {
        scope: "my-db",
        category: "snapshots",
        backupType: "manual",
        reason: "Malformed",
        message: "2 snapshot(s) listed without an identifier",
      },
    ]);
  });

  it("marks only the failing backup type unavailable", async () => {
    const gateway = new FakeProviderGateway()
      .addBackup(makeSnapshot("my-db-1", "my-db", "manual"))
      .fail("backups:instance:my-db:automated", new ProviderError("RateLimited", "Rate exceeded"));

    const result = await correlateBackups("my-db", "instance", { gateway, includeTags: true });

    expect(result.backups.map((b) => b.identifier)).toEqual(["my-db-1"]);
    expect(result.unavailable).toEqual([
      { scope: "my-db", category: "snapshots", backupType: "automated", reason: "RateLimited", message: "Rate exceeded" },
    ]);
  });

  it("strips tags when tags are disabled", async () => {
    const gateway = new FakeProviderGateway().addBackup(makeSnapshot("my-db-1", "my-db"));

    const result = await correlateBackups("my-db", "instance", { gateway, includeTags: false });

    expect(result.backups[0]?.tags).toEqual({});
  });
});

describe("backupCategoryFor", () => {
  it("maps kinds to snapshot categories", () => {
    expect(backupCategoryFor("instance")).toBe("snapshots");
    expect(backupCategoryFor("cluster")).toBe("clusterSnapshots");
  });
});
