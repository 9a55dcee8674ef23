/**
 * terminal.ts — Terminal output: chalk + ora
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";

// ─── Output Utilities ────────────────────────────────────

export const log = {
  info: (msg: string) => console.log(chalk.cyan("ℹ ") + msg),
  success: (msg: string) => console.log(chalk.green("✓ ") + msg),
  warn: (msg: string) => console.log(chalk.yellow("⚠ ") + msg),
  error: (msg: string) => console.error(chalk.red("✗ ") + msg),
  request: (method: string, path: string, status: number, ms: number) => {
    const color = status >= 500 ? chalk.red : status >= 400 ? chalk.yellow : chalk.green;
    console.log(
      chalk.gray("  → ") +
        chalk.bold(method.padEnd(6)) +
        path +
        " " +
        color(String(status)) +
        chalk.gray(` (${ms}ms)`),
    );
  },
  divider: () => console.log(chalk.gray("─".repeat(60))),
  blank: () => console.log(),
};

// ─── Spinner ─────────────────────────────────────────────

let spinner: Ora | null = null;

export function startSpinner(text: string): void {
  spinner = ora({ text, color: "cyan" }).start();
}

export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

// ─── Welcome Banner ──────────────────────────────────────

export function printBanner(version?: string): void {
  const ver = version || "0.0.0";
  const verPad = `v${ver}`.padStart(8);
  log.blank();
  console.log(chalk.cyan.bold("  ╔═══════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold(`  ║       CAD Parameter Bridge  ${verPad}          ║`));
  console.log(chalk.cyan.bold("  ║    Parameters + formula symbols over HTTP     ║"));
  console.log(chalk.cyan.bold("  ╚═══════════════════════════════════════════════╝"));
  log.blank();
}

export function printStatus(opts: {
  url: string;
  progId: string;
  origins: string[];
  mappingDir: string;
}): void {
  log.info(`Listening on ${chalk.bold(opts.url)}`);
  log.info(`Host application: ${chalk.bold(opts.progId)}`);
  log.info(`Allowed origins: ${opts.origins.map((o) => chalk.bold(o)).join(", ")}`);
  log.info(`Mappings stored in ${chalk.gray(opts.mappingDir)}`);
  log.info(`Press ${chalk.bold("Ctrl+C")} to stop`);
  log.divider();
}

export function printHelp(): void {
  console.log(`
Usage:
  ca-bridge [serve]          Start the HTTP API
  ca-bridge params           Print the active document's parameters
  ca-bridge bump <type>      Bump the package version (patch | minor | major)
  ca-bridge --version        Show version
  ca-bridge --help           Show help

Environment Variables:
  HOST                       Interface to listen on (default: 127.0.0.1)
  PORT                       Port to listen on (default: 8000)
  ALLOWED_ORIGINS            Comma-separated CORS origins (default: http://localhost:3000)
  CAD_PROG_ID                COM ProgID of the CAD application (default: Inventor.Application)
  BRIDGE_TIMEOUT             Per-call timeout in ms (default: 30000)
  MAPPING_DIR                Where mapping blobs are kept (default: ~/.ca-bridge/mappings)

Comment format:
  CA0:<symbol> #<note>       e.g. "CA0:L #Length of the main beam"
`);
}
