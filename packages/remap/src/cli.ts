import { isHashrouteError } from "@hashroute/errors";
import { formatFnv64, hashFnv64String } from "@hashroute/fnv";
import { withRemapInstance } from "./instance.js";
import { LOG_TAG } from "./logger.js";
import { remap } from "./remap.js";
import type { RemapLogger } from "./types.js";
import { UrlRemapRequest } from "./url-request.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export type CliCommand =
  | { readonly kind: "hash"; readonly inputs: readonly string[] }
  | {
      readonly kind: "remap";
      readonly url: string;
      readonly suffix: string;
      readonly verbose: boolean;
    }
  | { readonly kind: "help" }
  | { readonly kind: "invalid"; readonly message: string };

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
}

/** Parse `process.argv`-shaped arguments (the first two entries are skipped) */
export function parseArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv.slice(2);

  switch (command) {
    case undefined:
    case "--help":
    case "help":
      return { kind: "help" };
    case "hash": {
      // "-s" is accepted for parity with `fnv164 -s <string>`
      const inputs = rest.filter((arg) => arg !== "-s");
      if (inputs.length === 0) {
        return { kind: "invalid", message: "hash: expected at least one string" };
      }
      return { kind: "hash", inputs };
    }
    case "remap": {
      let url: string | undefined;
      let suffix: string | undefined;
      let verbose = false;

      for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        switch (arg) {
          case "--suffix":
            suffix = rest[i + 1];
            i++;
            break;
          case "--verbose":
            verbose = true;
            break;
          default:
            if (url === undefined && arg !== undefined) {
              url = arg;
            } else {
              return { kind: "invalid", message: `remap: unexpected argument "${arg}"` };
            }
        }
      }

      if (url === undefined) {
        return { kind: "invalid", message: "remap: expected a URL" };
      }
      if (suffix === undefined) {
        return { kind: "invalid", message: "remap: --suffix <domain> is required" };
      }
      return { kind: "remap", url, suffix, verbose };
    }
    default:
      return { kind: "invalid", message: `unknown command "${command}"` };
  }
}

const HELP = `
hashroute: FNV-64 host hashing for cache-affinity routing

Usage:
  hashroute hash [-s] <string> [<string>...]   Print 0x<fnv64> of the concatenated strings
  hashroute remap <url> --suffix <domain>      Print the URL with its host rewritten
                [--verbose]                    Log the host change
  hashroute --help                             Show this help message

The path is hashed after the host without its leading "/":
  hashroute hash -s www.examplehello/world
`;

function cliLogger(io: CliIo): RemapLogger {
  return {
    debug: (message) => io.stderr(`[${LOG_TAG}] ${message}`),
    warn: (message) => io.stderr(`[${LOG_TAG}] warning: ${message}`),
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run the CLI and return its exit code:
 * 0 success, 1 usage or configuration error, 2 URL left unchanged.
 */
export function runCli(argv: readonly string[], io: CliIo): number {
  const command = parseArgs(argv);

  switch (command.kind) {
    case "help":
      io.stdout(HELP);
      return 0;
    case "invalid":
      io.stderr(`hashroute: ${command.message}`);
      io.stderr(HELP);
      return 1;
    case "hash":
      io.stdout(formatFnv64(hashFnv64String(command.inputs.join("")), { prefix: true }));
      return 0;
    case "remap":
      return runRemap(command.url, command.suffix, command.verbose, io);
  }
}

function runRemap(rawUrl: string, suffix: string, verbose: boolean, io: CliIo): number {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    io.stderr(`hashroute: invalid URL "${rawUrl}"`);
    return 1;
  }

  try {
    return withRemapInstance({ suffix, debug: verbose, logger: cliLogger(io) }, (instance) => {
      const request = new UrlRemapRequest(url);
      const result = remap(instance, request);
      io.stdout(request.toString());
      return result.status === "did_remap" ? 0 : 2;
    });
  } catch (error) {
    if (isHashrouteError(error)) {
      io.stderr(`hashroute: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
