import { readFileSync } from "node:fs";
import {
  type DemangleOptions,
  decodeWithDiagnostics,
  demangleText,
  dumpTree,
  formatDemangled,
} from "./index.ts";
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_NODES } from "./options.ts";

const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set([
  "--sugar",
  "--no-field-offset-type",
  "--max-depth",
  "--compact",
  "--tree",
  "--help",
  "--version",
]);

// ─── Argument parsing ────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  printHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-V")) {
  console.log(`swift-demangle ${VERSION}`);
  process.exit(0);
}

const symbols: string[] = [];
const flags = new Set<string>();
let maxDepth = DEFAULT_MAX_DEPTH;

for (let i = 0; i < args.length; i++) {
  const arg = args[i] ?? "";
  if (!arg.startsWith("-")) {
    symbols.push(arg);
    continue;
  }
  if (!KNOWN_FLAGS.has(arg)) {
    console.error(`error: unknown flag '${arg}'`);
    console.error("Run with --help to see available options.\n");
    process.exit(1);
  }
  flags.add(arg);
  if (arg === "--max-depth") {
    maxDepth = parseDepth(args[++i]);
  }
}

const options: DemangleOptions = {
  synthesizeSugarOnTypes: flags.has("--sugar"),
  displayTypeOfIVarFieldOffset: !flags.has("--no-field-offset-type"),
  maxDepth,
  maxNodes: DEFAULT_MAX_NODES,
};
const compact = flags.has("--compact");
const showTree = flags.has("--tree");

function parseDepth(value: string | undefined): number {
  const depth = Number(value);
  if (value === undefined || !Number.isSafeInteger(depth) || depth <= 0) {
    console.error(`error: --max-depth expects a positive integer, got '${value ?? ""}'`);
    process.exit(1);
  }
  return depth;
}

function printHelp(): void {
  console.log(`swift-demangle ${VERSION}: linkage name demangler

Usage: swift-demangle [options] [symbol...]

Options:
  --sugar                 Print Array, Dictionary and Optional with shorthand
  --no-field-offset-type  Omit the declared type from field offset records
  --max-depth <n>         Give up on names nested deeper than n (default ${DEFAULT_MAX_DEPTH})
  --compact               Print only the demangled text
  --tree                  Print the decoded tree instead of the text
  --help, -h              Show this help message
  --version, -V           Show the version

With no symbol arguments, standard input is read and every linkage name
found in it is replaced by its demangled text.

Examples:
  swift-demangle _TF1M1fFVS_3IntVS_3Str
  swift-demangle --sugar --compact _TtGSaSS_
  nm app.o | swift-demangle`);
}

// ─── Main ────────────────────────────────────────────────────────────────────

let failed = false;

if (symbols.length === 0) {
  const input = readFileSync(0, "utf8");
  process.stdout.write(demangleText(input, options));
} else {
  for (const symbol of symbols) {
    if (showTree) {
      const { tree, diagnostics } = decodeWithDiagnostics(symbol, options);
      console.log(dumpTree(tree));
      for (const diag of diagnostics) {
        console.error(`${symbol}:${diag.offset}: ${diag.severity}: ${diag.message}`);
        failed = true;
      }
      continue;
    }
    console.log(formatDemangled(symbol, options, compact));
  }
}

process.exit(failed ? 1 : 0);
