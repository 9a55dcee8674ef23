#!/usr/bin/env node
/**
 * index.ts — CLI entry point
 *
 * Supports three commands:
 *   1. HTTP API:        ca-bridge [serve]
 *   2. Parameter dump:  ca-bridge params
 *   3. Release helper:  ca-bridge bump patch|minor|major
 */

import { config as dotenvConfig } from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

// Load .env from the package directory, not cwd
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenvConfig({ path: resolve(__dirname, "..", ".env") });
import chalk from "chalk";

import { log, printBanner, printHelp, printStatus, startSpinner, stopSpinner } from "./ui/terminal.js";
import { formatParameterLines } from "./ui/formatter.js";
import { getBridgeConfig, type BridgeConfig } from "./config.js";
import { createCadBridge } from "./bridge/cad.js";
import { MappingStore } from "./mapping/store.js";
import { createApp, listen } from "./server/app.js";
import { toParameterView } from "./server/views.js";
import { bumpVersion, getCurrentVersion, isBumpType, updatePackageVersion } from "./version.js";

// ─── Preflight Checks ────────────────────────────────────

function preflight(): void {
  if (process.platform !== "win32") {
    log.warn(
      "The CAD application is reached over COM, which requires Windows. Host calls will fail on this platform.",
    );
  }
}

// ─── Serve ───────────────────────────────────────────────

async function serve(config: BridgeConfig): Promise<void> {
  const version = getCurrentVersion();
  const app = createApp({
    bridge: createCadBridge({ progId: config.progId, timeout: config.timeout }),
    store: new MappingStore(config.mappingDir),
    allowedOrigins: config.allowedOrigins,
    version,
  });

  const server = await listen(app, config.host, config.port);
  const address = server.address();
  const port = typeof address === "object" && address ? address.port : config.port;

  printBanner(version);
  printStatus({
    url: `http://${config.host}:${port}`,
    progId: config.progId,
    origins: config.allowedOrigins,
    mappingDir: config.mappingDir,
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) {
        log.error(err.message);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// ─── Parameter Dump ──────────────────────────────────────

async function printParameters(config: BridgeConfig): Promise<void> {
  const bridge = createCadBridge({ progId: config.progId, timeout: config.timeout });

  startSpinner("Reading parameters...");
  try {
    const { document, parameters } = await bridge.listParameters();
    stopSpinner();

    log.info(`${chalk.bold(document.name)} ${chalk.gray(`(${document.type}) ${document.fullPath}`)}`);
    log.divider();
    if (parameters.length === 0) {
      log.info("No parameters.");
      return;
    }
    const views = parameters.map(toParameterView);
    formatParameterLines(views).forEach((line) => console.log(line));
    log.divider();
    const bound = views.filter((p) => p.mapping).length;
    log.info(chalk.gray(`[${parameters.length} parameters · ${bound} bound to symbols]`));
  } finally {
    stopSpinner();
  }
}

// ─── Version Bump ────────────────────────────────────────

function bump(arg: string | undefined): void {
  const type = (arg ?? "").toLowerCase();
  if (!isBumpType(type)) {
    log.error(`Invalid bump type '${arg ?? ""}'. Use: patch, minor, or major`);
    process.exit(1);
  }

  const newVersion = bumpVersion(getCurrentVersion(), type);
  const oldVersion = updatePackageVersion(newVersion);

  log.success(`Updated package.json: ${oldVersion} → ${newVersion}`);
  log.blank();
  log.info(`Version bumped: ${oldVersion} → ${chalk.bold(newVersion)} (${type})`);
  log.info("Next steps:");
  console.log("    1. Review changes: git diff");
  console.log(`    2. Commit: git add . && git commit -m 'chore: bump version to ${newVersion}'`);
  console.log("    3. Push: git push origin main");
}

// ─── Main ────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--version") || args.includes("-v")) {
    console.log(`ca-bridge v${getCurrentVersion()}`);
    process.exit(0);
  }

  if (args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const [command = "serve", ...rest] = args.filter((a) => !a.startsWith("-"));

  switch (command) {
    case "serve":
      preflight();
      await serve(getBridgeConfig());
      break;
    case "params":
      preflight();
      await printParameters(getBridgeConfig());
      break;
    case "bump":
      bump(rest[0]);
      break;
    default:
      log.error(`Unknown command: ${command}. Run ca-bridge --help for usage.`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
