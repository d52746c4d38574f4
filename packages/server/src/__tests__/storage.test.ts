/**
 * Storage driver tests.
 *
 * Both drivers run against a temporary directory.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import { existsSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import {
  DID_CBOR_MIME,
  FanErrorCode,
  buildDIDDocument,
  generateKeyPair,
  isFanError,
  type DIDDocumentWire,
} from "@fan-auth/core";
import { Database } from "../db/schema.js";
import { FileSystemStorage, SqliteStorage, type StorageDriver } from "../services/storage.js";
import { makeTestDir, removeTestDir } from "./helpers.js";

const MODIFIED = new Date("2026-01-02T03:04:05Z");

let aliceDoc: DIDDocumentWire;
let rootDoc: DIDDocumentWire;
let testDir: string;

beforeAll(async () => {
  const key = await generateKeyPair("P-256");
  aliceDoc = buildDIDDocument("did:fan:agent.test:alice", { authentication: [key.publicJwk] });
  rootDoc = buildDIDDocument("did:fan:agent.test:fan-agent", { authentication: [key.publicJwk] });
});

beforeEach(() => {
  testDir = makeTestDir("storage-test");
});

afterEach(() => {
  removeTestDir(testDir);
});

// ---------------------------------------------------------------------------
// Shared behavior
// ---------------------------------------------------------------------------

const drivers: Array<[string, () => StorageDriver]> = [
  ["SqliteStorage", () => new SqliteStorage(new Database(join(testDir, "test.db")))],
  ["FileSystemStorage", () => new FileSystemStorage(join(testDir, "root"))],
];

describe.each(drivers)("%s", (_name, create) => {
  let storage: StorageDriver;

  beforeEach(() => {
    storage = create();
  });

  afterEach(() => {
    storage.close();
  });

  it("returns undefined for documents never stored", async () => {
    expect(await storage.loadRoot()).toBeUndefined();
    expect(await storage.load("alice")).toBeUndefined();
  });

  it("stores and loads user documents with their modification time", async () => {
    await storage.save("alice", aliceDoc, MODIFIED);
    const loaded = await storage.load("alice");
    expect(loaded?.document).toEqual(aliceDoc);
    expect(loaded?.modifiedAt.getTime()).toBe(MODIFIED.getTime());
  });

  it("keeps the root document apart from user documents", async () => {
    await storage.saveRoot(rootDoc, MODIFIED);
    expect((await storage.loadRoot())?.document.id).toBe("did:fan:agent.test:fan-agent");
    expect(await storage.load("fan.did")).toBeUndefined();
  });

  it("replaces a document on save", async () => {
    await storage.save("alice", rootDoc, MODIFIED);
    const later = new Date("2026-02-01T00:00:00Z");
    await storage.save("alice", aliceDoc, later);
    const loaded = await storage.load("alice");
    expect(loaded?.document.id).toBe("did:fan:agent.test:alice");
    expect(loaded?.modifiedAt.getTime()).toBe(later.getTime());
  });

  it("stores Unicode identifiers under their decoded name", async () => {
    await storage.save("無爲", aliceDoc, MODIFIED);
    expect((await storage.load("無爲"))?.document).toEqual(aliceDoc);
  });

  it("removes user documents", async () => {
    await storage.save("alice", aliceDoc, MODIFIED);
    expect(await storage.remove("alice")).toBe(true);
    expect(await storage.remove("alice")).toBe(false);
    expect(await storage.load("alice")).toBeUndefined();
  });

  it("lists stored user identifiers in order", async () => {
    expect(await storage.list()).toEqual([]);
    await storage.saveRoot(rootDoc, MODIFIED);
    await storage.save("bob", aliceDoc, MODIFIED);
    await storage.save("alice", aliceDoc, MODIFIED);
    expect(await storage.list()).toEqual(["alice", "bob"]);

    await storage.remove("bob");
    expect(await storage.list()).toEqual(["alice"]);
  });

  it("rejects names that could escape the store", async () => {
    for (const name of ["", "../alice", "a/b", "a\\b", ".hidden"]) {
      await expect(storage.load(name)).rejects.toMatchObject({
        code: FanErrorCode.MALFORMED_ADDRESS,
      });
    }
  });
});

// ---------------------------------------------------------------------------
// FileSystemStorage layout
// ---------------------------------------------------------------------------

describe("FileSystemStorage layout", () => {
  it("writes fan.did.<ext> and user/<name>.<ext>", async () => {
    const storage = new FileSystemStorage(testDir);
    await storage.saveRoot(rootDoc);
    await storage.save("alice", aliceDoc);

    expect(existsSync(join(testDir, "fan.did.json"))).toBe(true);
    expect(existsSync(join(testDir, "user", "alice.json"))).toBe(true);
  });

  it("writes CBOR when configured for it", async () => {
    const storage = new FileSystemStorage(testDir, DID_CBOR_MIME);
    await storage.save("alice", aliceDoc, MODIFIED);

    expect(existsSync(join(testDir, "user", "alice.cbor"))).toBe(true);
    expect((await storage.load("alice"))?.document).toEqual(aliceDoc);
  });

  it("reads documents stored in the other format", async () => {
    await new FileSystemStorage(testDir).save("alice", aliceDoc, MODIFIED);
    const cbor = new FileSystemStorage(testDir, DID_CBOR_MIME);
    expect((await cbor.load("alice"))?.document).toEqual(aliceDoc);
  });

  it("reports files that are not DID documents", async () => {
    mkdirSync(join(testDir, "user"), { recursive: true });
    writeFileSync(join(testDir, "user", "broken.json"), "{ not json");
    const storage = new FileSystemStorage(testDir);
    await expect(storage.load("broken")).rejects.toMatchObject({
      code: FanErrorCode.MALFORMED_DOCUMENT,
    });
  });

  it("lists each identifier once across formats", async () => {
    await new FileSystemStorage(testDir).save("alice", aliceDoc, MODIFIED);
    await new FileSystemStorage(testDir, DID_CBOR_MIME).save("alice", aliceDoc, MODIFIED);
    writeFileSync(join(testDir, "user", "notes.txt"), "not a document");

    expect(await new FileSystemStorage(testDir).list()).toEqual(["alice"]);
  });

  it("refuses unsupported formats", () => {
    let thrown: unknown;
    try {
      new FileSystemStorage(testDir, "text/plain");
    } catch (err) {
      thrown = err;
    }
    expect(isFanError(thrown, FanErrorCode.MALFORMED_DOCUMENT)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------

describe("Database", () => {
  it("lists documents per kind", () => {
    const db = new Database(join(testDir, "test.db"));
    const modified_at = MODIFIED.toISOString();
    db.putDocument({ kind: "root", name: "", document: "{}", modified_at });
    db.putDocument({ kind: "user", name: "bob", document: "{}", modified_at });
    db.putDocument({ kind: "user", name: "alice", document: "{}", modified_at });

    expect(db.listDocumentNames("user")).toEqual(["alice", "bob"]);
    expect(db.listDocumentNames("root")).toEqual([""]);
    expect(db.deleteDocument("user", "bob")).toBe(true);
    expect(db.getDocument("user", "bob")).toBeUndefined();
    db.close();
  });
});
