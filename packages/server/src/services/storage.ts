/**
 * Storage drivers for the DID documents this site serves.
 *
 * Documents are stored unsigned; `DocumentService` signs them per request.
 */

import { mkdir, readFile, readdir, rm, stat, utimes, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  DID_CBOR_MIME,
  DID_JSON_MIME,
  FanError,
  FanErrorCode,
  decodeDocument,
  encodeDocument,
  parseWireDocument,
  type DIDDocumentWire,
} from "@fan-auth/core";
import { Database, ROOT_NAME } from "../db/schema.js";

export interface StoredDocument {
  document: DIDDocumentWire;
  modifiedAt: Date;
}

export interface StorageDriver {
  /** The agent's own document, served at `/fan.did`. */
  loadRoot(): Promise<StoredDocument | undefined>;
  /** A user document by (decoded) identifier. */
  load(name: string): Promise<StoredDocument | undefined>;
  saveRoot(document: DIDDocumentWire, modifiedAt?: Date): Promise<StoredDocument>;
  save(name: string, document: DIDDocumentWire, modifiedAt?: Date): Promise<StoredDocument>;
  remove(name: string): Promise<boolean>;
  /** Identifiers of every stored user document, sorted. */
  list(): Promise<string[]>;
  close(): void;
}

/**
 * Reject names that could escape a storage directory.
 * @throws {FanError} MALFORMED_ADDRESS
 */
export function assertDocumentName(name: string): void {
  if (name === "" || name.startsWith(".") || /[/\\\0]/.test(name)) {
    throw new FanError(FanErrorCode.MALFORMED_ADDRESS, `Invalid document name "${name}"`, {
      name,
    });
  }
}

// ---------------------------------------------------------------------------
// SQLite
// ---------------------------------------------------------------------------

export class SqliteStorage implements StorageDriver {
  constructor(private readonly db: Database) {}

  async loadRoot(): Promise<StoredDocument | undefined> {
    return this.read("root", ROOT_NAME);
  }

  async load(name: string): Promise<StoredDocument | undefined> {
    assertDocumentName(name);
    return this.read("user", name);
  }

  async saveRoot(document: DIDDocumentWire, modifiedAt = new Date()): Promise<StoredDocument> {
    return this.write("root", ROOT_NAME, document, modifiedAt);
  }

  async save(name: string, document: DIDDocumentWire, modifiedAt = new Date()): Promise<StoredDocument> {
    assertDocumentName(name);
    return this.write("user", name, document, modifiedAt);
  }

  async remove(name: string): Promise<boolean> {
    assertDocumentName(name);
    return this.db.deleteDocument("user", name);
  }

  async list(): Promise<string[]> {
    return this.db.listDocumentNames("user");
  }

  close(): void {
    this.db.close();
  }

  private read(kind: "root" | "user", name: string): StoredDocument | undefined {
    const row = this.db.getDocument(kind, name);
    if (!row) return undefined;

    let value: unknown;
    try {
      value = JSON.parse(row.document);
    } catch (err) {
      throw new FanError(
        FanErrorCode.MALFORMED_DOCUMENT,
        `Stored ${kind} document "${name}" is not JSON`,
        undefined,
        { cause: err },
      );
    }
    return { document: parseWireDocument(value), modifiedAt: new Date(row.modified_at) };
  }

  private write(
    kind: "root" | "user",
    name: string,
    document: DIDDocumentWire,
    modifiedAt: Date,
  ): StoredDocument {
    this.db.putDocument({
      kind,
      name,
      document: JSON.stringify(document),
      modified_at: modifiedAt.toISOString(),
    });
    return { document, modifiedAt };
  }
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

const EXTENSIONS: Record<string, string> = {
  [DID_JSON_MIME]: ".json",
  [DID_CBOR_MIME]: ".cbor",
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Layout: `<root>/fan.did.<ext>` and `<root>/user/<name>.<ext>`, where the
 * extension follows the document format. File mtime is the modification time.
 */
export class FileSystemStorage implements StorageDriver {
  private readonly formats: readonly string[];

  constructor(
    private readonly root: string,
    private readonly format: string = DID_JSON_MIME,
  ) {
    if (!(format in EXTENSIONS)) {
      throw new FanError(FanErrorCode.MALFORMED_DOCUMENT, `Unsupported storage format "${format}"`);
    }
    this.formats = [format, ...Object.keys(EXTENSIONS).filter((mime) => mime !== format)];
  }

  async loadRoot(): Promise<StoredDocument | undefined> {
    return this.read(join(this.root, "fan.did"));
  }

  async load(name: string): Promise<StoredDocument | undefined> {
    assertDocumentName(name);
    return this.read(join(this.root, "user", name));
  }

  async saveRoot(document: DIDDocumentWire, modifiedAt?: Date): Promise<StoredDocument> {
    return this.write(join(this.root, "fan.did"), document, modifiedAt);
  }

  async save(name: string, document: DIDDocumentWire, modifiedAt?: Date): Promise<StoredDocument> {
    assertDocumentName(name);
    return this.write(join(this.root, "user", name), document, modifiedAt);
  }

  async remove(name: string): Promise<boolean> {
    assertDocumentName(name);
    let removed = false;
    for (const mime of this.formats) {
      const path = join(this.root, "user", name) + EXTENSIONS[mime];
      try {
        await rm(path);
        removed = true;
      } catch (err) {
        if (!isMissing(err)) throw err;
      }
    }
    return removed;
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(join(this.root, "user"));
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const names = new Set<string>();
    for (const file of files) {
      const ext = Object.values(EXTENSIONS).find((candidate) => file.endsWith(candidate));
      if (ext && file.length > ext.length) {
        names.add(file.slice(0, -ext.length));
      }
    }
    return [...names].sort();
  }

  close(): void {
    // nothing held open
  }

  /** First existing file among the supported extensions, preferred format first. */
  private async read(base: string): Promise<StoredDocument | undefined> {
    for (const mime of this.formats) {
      const path = base + EXTENSIONS[mime];
      let bytes: Buffer;
      try {
        bytes = await readFile(path);
      } catch (err) {
        if (isMissing(err)) continue;
        throw err;
      }
      const { mtime } = await stat(path);
      return { document: decodeDocument(new Uint8Array(bytes), mime), modifiedAt: mtime };
    }
    return undefined;
  }

  private async write(
    base: string,
    document: DIDDocumentWire,
    modifiedAt?: Date,
  ): Promise<StoredDocument> {
    const path = base + EXTENSIONS[this.format];
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, encodeDocument(document, this.format));
    if (modifiedAt) {
      await utimes(path, modifiedAt, modifiedAt);
    }
    const { mtime } = await stat(path);
    return { document, modifiedAt: mtime };
  }
}
