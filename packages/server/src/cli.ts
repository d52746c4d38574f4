/**
 * `fan-agent` command line.
 *
 *   fan-agent                          Start the server (environment config)
 *   fan-agent --generate-signing-jwk   Print a fresh P-256 private JWK
 *   fan-agent --write-root             Store the agent document built from SIGNING_KEYS
 *   fan-agent --list                   Print the identifiers of stored user documents
 *   fan-agent --publish <id> --key <file>
 *                                      Store a user document for <id> publishing
 *                                      the JWK (or JWK Set) in <file>
 */

import { parseArgs } from "node:util";
import { formatDid, generateKeyPair } from "@fan-auth/core";

import { createStorage, start } from "./app.js";
import { config } from "./config.js";
import { DocumentService } from "./services/documents.js";
import { loadSigningKeys, parseJwks, readKeyFile } from "./services/signing-keys.js";

export type CliCommand =
  | { kind: "serve" }
  | { kind: "help" }
  | { kind: "generate-signing-jwk" }
  | { kind: "write-root" }
  | { kind: "list" }
  | { kind: "publish"; name: string; keyPath: string };

const USAGE = `Usage: fan-agent [--generate-signing-jwk | --write-root | --list | --publish <id> --key <file>]`;

/**
 * @throws {TypeError} for unknown flags or a `--publish` without `--key`.
 */
export function parseCommand(argv: string[]): CliCommand {
  const { values } = parseArgs({
    args: argv,
    options: {
      "generate-signing-jwk": { type: "boolean" },
      "write-root": { type: "boolean" },
      list: { type: "boolean" },
      publish: { type: "string" },
      key: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) return { kind: "help" };
  if (values["generate-signing-jwk"]) return { kind: "generate-signing-jwk" };
  if (values["write-root"]) return { kind: "write-root" };
  if (values.list) return { kind: "list" };
  if (values.publish !== undefined) {
    if (values.key === undefined) {
      throw new TypeError("--publish needs --key <file>");
    }
    return { kind: "publish", name: values.publish, keyPath: values.key };
  }
  return { kind: "serve" };
}

/** A new P-256 private JWK as pretty-printed JSON. */
export async function generateSigningJwk(): Promise<string> {
  const { privateJwk } = await generateKeyPair("P-256");
  return JSON.stringify(privateJwk, null, 2);
}

async function withDocuments(task: (documents: DocumentService) => Promise<string>): Promise<string> {
  const storage = createStorage();
  try {
    const documents = new DocumentService({
      storage,
      signingKeys: await loadSigningKeys(config.signingKeysPath),
      domain: config.domain,
      defaultFormat: config.documentFormat,
      authPath: config.authPath,
    });
    return await task(documents);
  } finally {
    storage.close();
  }
}

export async function run(
  argv: string[],
  print: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Promise<void> {
  const command = parseCommand(argv);

  switch (command.kind) {
    case "help":
      print(USAGE);
      return;
    case "generate-signing-jwk":
      print(await generateSigningJwk());
      return;
    case "write-root":
      print(
        await withDocuments(async (documents) => {
          await documents.storage.saveRoot(documents.deriveRoot());
          return `wrote ${formatDid(documents.rootDid)}`;
        }),
      );
      return;
    case "list": {
      const storage = createStorage();
      try {
        for (const name of await storage.list()) {
          print(name);
        }
      } finally {
        storage.close();
      }
      return;
    }
    case "publish": {
      const keys = parseJwks(await readKeyFile(command.keyPath));
      print(
        await withDocuments(async (documents) => {
          const stored = await documents.publish(command.name, { authentication: keys });
          return `published ${stored.document.id}`;
        }),
      );
      return;
    }
    case "serve":
      await start();
      return;
  }
}

// If this module is the entry point, run the command line
const isMain =
  process.argv[1] &&
  (process.argv[1].endsWith("/cli.js") ||
    process.argv[1].endsWith("/cli.ts") ||
    process.argv[1].endsWith("\\cli.js") ||
    process.argv[1].endsWith("\\cli.ts"));

if (isMain) {
  run(process.argv.slice(2)).catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n${USAGE}\n`);
    process.exit(1);
  });
}
