#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import packageJson from "../package.json";
import { ARCHIVE_TYPE_NAMES, type ArchiveTypeName } from "./archive/ArchiveType";
import { CacheStore } from "./cache";
import { LOG_LEVEL_ENV } from "./config";
import { cachePrintOn, cacheOff, withCurlContext } from "./context/CurlContext";
import { Curl } from "./curl/Curl";
import type { CurlOptions } from "./curl/options";
import type { FetchResult } from "./result/FetchResult";
import { LogLevel, parseLogLevel, setLogLevel } from "./utils/logger";

interface RequestCommandOptions {
  get: string[];
  post: string[];
  header: string[];
  compr?: ArchiveTypeName;
  cacheDir?: string;
  sha256: boolean;
}

interface FetchCommandOptions extends RequestCommandOptions {
  cache: boolean;
  encoding?: string;
  file: string[];
  large: boolean;
  binary: boolean;
  retries: number;
  outFile?: string;
  dryRun: boolean;
  cachePrint: boolean;
  tolerateTruncation: boolean;
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

function archiveTypeName(value: string): ArchiveTypeName {
  const name = ARCHIVE_TYPE_NAMES.find((candidate) => candidate === value);
  if (!name) {
    throw new InvalidArgumentError(`Expected one of ${ARCHIVE_TYPE_NAMES.join(", ")}.`);
  }
  return name;
}

/**
 * `name=value` arguments as a record; a missing `=` gives an empty value.
 */
function parsePairs(pairs: string[]): Record<string, string> | undefined {
  if (pairs.length === 0) {
    return undefined;
  }
  const record: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator < 0) {
      record[pair] = "";
    } else {
      record[pair.slice(0, separator)] = pair.slice(separator + 1);
    }
  }
  return record;
}

function requestOptions(url: string, options: RequestCommandOptions): CurlOptions {
  return {
    url,
    silent: false,
    get: parsePairs(options.get),
    post: parsePairs(options.post),
    reqHeaders: options.header.length > 0 ? options.header : undefined,
    compr: options.compr,
    cacheDir: options.cacheDir,
    hashAlgorithm: options.sha256 ? "sha256" : "md5",
  };
}

function withRequestOptions(command: Command): Command {
  return command
    .option("-g, --get <name=value>", "Query parameter (repeatable)", collect, [])
    .option("-d, --post <name=value>", "Form field to POST (repeatable)", collect, [])
    .option("-H, --header <line>", 'Request header as "Name: value" (repeatable)', collect, [])
    .option("--compr <type>", `Archive type: ${ARCHIVE_TYPE_NAMES.join(", ")}`, archiveTypeName)
    .option("--cache-dir <path>", "Cache directory")
    .option("--sha256", "Key the cache with sha256 instead of md5", false);
}

async function write(chunk: string | Buffer): Promise<void> {
  if (!process.stdout.write(chunk)) {
    await new Promise<void>((resolve) => process.stdout.once("drain", () => resolve()));
  }
}

async function printResult(result: FetchResult): Promise<void> {
  switch (result.kind) {
    case "blob":
      await write(result.value);
      break;
    case "files":
      for (const [name, content] of Object.entries(result.files)) {
        await write(`==> ${name} <==\n`);
        await write(content);
      }
      break;
    case "streams":
      for (const [name, handle] of Object.entries(result.streams)) {
        await write(`==> ${name} <==\n`);
        for await (const line of handle.lines()) {
          await write(`${line}\n`);
        }
      }
      break;
    case "lines":
      for await (const line of result.handle.lines()) {
        await write(`${line}\n`);
      }
      break;
    case "handle":
      await write(await result.handle.buffer());
      break;
  }
}

async function main() {
  const program = new Command();

  program
    .name("biocurl")
    .description("Download, cache and extract resources over HTTP, FTP and SFTP")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  withRequestOptions(program.command("fetch <url>"))
    .description("Fetch a resource through the cache and print its content")
    .option("--no-cache", "Ignore cached copies and download again")
    .option("-e, --encoding <name>", "Character encoding of the content")
    .option("-f, --file <name>", "Archive member to extract (repeatable)", collect, [])
    .option("--large", "Stream the content instead of reading it into memory", false)
    .option("--binary", "Print bytes without decoding", false)
    .option("-r, --retries <number>", "Download attempts", positiveInt, 3)
    .option("-o, --out-file <path>", "Also copy the downloaded file here")
    .option("--tolerate-truncation", "Accept bodies cut short by a connection reset", false)
    .option("--dry-run", "Resolve the cache file without downloading", false)
    .option("--cache-print", "Log the cache file of the request", false)
    .action(async (url: string, options: FetchCommandOptions) => {
      const request: CurlOptions = {
        ...requestOptions(url, options),
        encoding: options.encoding,
        filesNeeded: options.file.length > 0 ? options.file : undefined,
        large: options.large,
        defaultMode: options.binary ? "rb" : "r",
        retries: options.retries,
        outFile: options.outFile,
        tolerateTruncation: options.tolerateTruncation,
      };
      const run = () => Curl.fetch(request);
      const scoped = options.cache ? run : () => cacheOff(run);
      const printing = options.cachePrint ? () => cachePrintOn(scoped) : scoped;
      const curl = await withCurlContext({ dryRun: options.dryRun }, printing);

      try {
        if (curl.downloadFailed) {
          console.error(`❌ Failed to fetch ${curl.url} (Status: ${curl.status})`);
          process.exitCode = 1;
          return;
        }
        if (curl.result) {
          await printResult(curl.result);
        }
      } finally {
        curl.close();
      }
    });

  withRequestOptions(program.command("path <url>"))
    .description("Print the cache file a request maps to")
    .action(async (url: string, options: RequestCommandOptions) => {
      const curl = await Curl.fetch({ ...requestOptions(url, options), silent: true, call: false, process: false });
      console.log(curl.cacheFile ?? curl.url);
    });

  withRequestOptions(program.command("evict <url>"))
    .description("Delete the cached copy of a request")
    .action(async (url: string, options: RequestCommandOptions) => {
      const curl = await Curl.fetch({ ...requestOptions(url, options), silent: true, call: false, process: false });
      if (curl.isLocal || curl.cacheFile === undefined) {
        console.error(`${curl.url} is a local file, not a cached download`);
        process.exitCode = 1;
        return;
      }
      const removed = await new CacheStore(options.cacheDir).invalidate(curl.cacheFile);
      console.log(removed ? `🗑️ Removed ${curl.cacheFile}` : `Not cached: ${curl.cacheFile}`);
    });

  // Set the log level after parsing global options but before executing the command
  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<{ verbose: boolean; silent: boolean }>();
    if (options.silent) {
      // silent overrides verbose
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    } else {
      setLogLevel(parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? LogLevel.INFO);
    }
  });

  await program.parseAsync();
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
