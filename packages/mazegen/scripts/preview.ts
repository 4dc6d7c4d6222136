#!/usr/bin/env node
/**
 * Maze Preview Script
 *
 * Usage:
 *   npx tsx scripts/preview.ts [options]
 *
 * Examples:
 *   npx tsx scripts/preview.ts --seed 12345
 *   npx tsx scripts/preview.ts --width 41 --height 21 --fill 0.07 --route breadth-first
 *   npx tsx scripts/preview.ts --exit random --format svg,dot --trace
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { MazeConfigInput } from "@labyrinth/contracts";
import {
  createTraceCollector,
  type DecisionEvent,
  generateMaze,
  printMaze,
  renderAscii,
  renderDOT,
  renderSVG,
  type RouteOrder,
  type TraceEvent,
  validateMaze,
} from "../src";

type Format = "ascii" | "svg" | "dot";
type RouteChoice = RouteOrder | "none";

const FORMATS: readonly Format[] = ["ascii", "svg", "dot"];
const ROUTES: readonly RouteChoice[] = ["depth-first", "breadth-first", "none"];

// =============================================================================
// CLI PARSING
// =============================================================================

interface Options {
  config: MazeConfigInput;
  output: string;
  formats: Set<Format>;
  route: RouteChoice;
  scale: number;
  trace: boolean;
  quiet: boolean;
  color: boolean;
  help: boolean;
}

function isFormat(value: string): value is Format {
  return FORMATS.some((format) => format === value);
}

function isRouteChoice(value: string): value is RouteChoice {
  return ROUTES.some((route) => route === value);
}

function isExitSide(
  value: string,
): value is "left" | "right" | "top" | "bottom" | "random" {
  return ["left", "right", "top", "bottom", "random"].includes(value);
}

function parseArgs(args: readonly string[]): Options {
  const options: Options = {
    config: {},
    output: "output",
    formats: new Set(FORMATS),
    route: "depth-first",
    scale: 10,
    trace: false,
    quiet: false,
    color: true,
    help: false,
  };

  const config: MazeConfigInput = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1] ?? "";

    switch (arg) {
      case "--seed":
      case "-s":
        config.seed = Number.parseInt(next, 10);
        i++;
        break;
      case "--width":
      case "-w":
        config.width = Number.parseInt(next, 10);
        i++;
        break;
      case "--height":
      case "-h":
        config.height = Number.parseInt(next, 10);
        i++;
        break;
      case "--room-size":
      case "-r":
        config.roomSize = Number.parseInt(next, 10);
        i++;
        break;
      case "--exit":
      case "-e":
        if (!isExitSide(next)) throw new Error(`Unknown exit side: ${next}`);
        config.exitSide = next;
        i++;
        break;
      case "--fill":
      case "-a":
        config.fillRatio = Number.parseFloat(next);
        i++;
        break;
      case "--output":
      case "-o":
        options.output = next;
        i++;
        break;
      case "--format":
      case "-f":
        options.formats =
          next === "all" ? new Set(FORMATS) : new Set(next.split(",").filter(isFormat));
        i++;
        break;
      case "--route":
        if (!isRouteChoice(next)) throw new Error(`Unknown route order: ${next}`);
        options.route = next;
        i++;
        break;
      case "--scale":
        options.scale = Number.parseFloat(next);
        i++;
        break;
      case "--trace":
      case "-t":
        options.trace = true;
        break;
      case "--quiet":
      case "-q":
        options.quiet = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--help":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  options.config = config;
  return options;
}

function showHelp(): void {
  console.log(`
Maze Preview Script

Usage:
  npx tsx scripts/preview.ts [options]

Options:
  --seed, -s <n>         Seed for generation (default: random)
  --width, -w <n>        Maze width, rounded up to 7 + 4k (default: 63)
  --height, -h <n>       Maze height, rounded up to 7 + 4k (default: 31)
  --room-size, -r <n>    Side of the central room (default: 3)
  --exit, -e <side>      left, right, top, bottom or random (default: right)
  --fill, -a <ratio>     Share of corridor cells given artifacts (default: 0)
  --output, -o <dir>     Output directory (default: output)
  --format, -f <fmt>     ascii, svg, dot or all, comma separated (default: all)
  --route <order>        depth-first, breadth-first or none (default: depth-first)
  --scale <n>            SVG pixels per cell (default: 10)
  --trace, -t            Show generation trace/decisions
  --quiet, -q            Minimal console output
  --no-color             Disable ANSI colors
  --help                 Show this help
`);
}

// =============================================================================
// COLORS
// =============================================================================

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

function c(color: keyof typeof colors, text: string, enabled: boolean): string {
  return enabled ? `${colors[color]}${text}${colors.reset}` : text;
}

// =============================================================================
// OUTPUT
// =============================================================================

function isDecisionEvent(event: TraceEvent): event is DecisionEvent {
  return event.eventType === "decision";
}

function describeEvent(event: TraceEvent, color: boolean): string {
  if (isDecisionEvent(event)) {
    return `${event.data.question} -> ${JSON.stringify(event.data.chosen)}`;
  }
  if (event.eventType === "end") {
    return c("dim", JSON.stringify(event.data), color);
  }
  if (event.eventType === "warning") {
    return c("yellow", JSON.stringify(event.data), color);
  }
  return "";
}

function printTrace(events: readonly TraceEvent[], color: boolean): void {
  console.log(c("dim", "\n--- Generation Trace ---", color));
  for (const event of events) {
    const passId = c("blue", `[${event.passId}]`, color);
    const eventType = c("magenta", event.eventType, color);
    console.log(`  ${eventType} ${passId} ${describeEvent(event, color)}`);
  }
}

function main(): number {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    showHelp();
    return 0;
  }

  const trace = createTraceCollector(options.trace);
  const started = performance.now();
  const result = generateMaze(options.config, { trace });
  if (!result.success) {
    console.error(c("red", `Generation failed: ${result.error.message}`, options.color));
    if (result.error.details) {
      console.error(JSON.stringify(result.error.details, null, 2));
    }
    return 1;
  }

  const { maze, config, report, artifacts } = result.value;
  const route =
    options.route === "none" ? null : maze.routeSearch({ order: options.route });
  const tree = maze.minimumSpanningTree();
  const duration = performance.now() - started;

  if (!options.quiet) {
    console.log(c("bold", "\nMaze Preview", options.color));
    console.log(c("dim", "-".repeat(40), options.color));
    console.log(`  Dimensions: ${c("cyan", `${config.width}x${config.height}`, options.color)}`);
    console.log(`  Seed:       ${c("cyan", String(report.seed), options.color)}`);
    console.log(`  Exit:       ${c("cyan", report.exitSide, options.color)}`);
    console.log(`  Loops:      ${c("cyan", String(report.wallsRemoved), options.color)}`);
    if (artifacts) {
      console.log(
        `  Artifacts:  ${c("cyan", `${artifacts.rewards} rewards, ${artifacts.dangers} dangers`, options.color)}`,
      );
    }
    console.log(`  Route:      ${c("cyan", route ? `${route.length} cells` : "none", options.color)}`);
    console.log(`  MST weight: ${c("cyan", String(tree.totalWeight), options.color)}`);
    console.log(`  Time:       ${c("yellow", `${duration.toFixed(1)}ms`, options.color)}`);

    const validation = validateMaze(maze);
    for (const violation of validation.violations) {
      const tone = violation.severity === "error" ? "red" : "yellow";
      console.log(`  ${c(tone, violation.severity, options.color)} ${violation.message}`);
    }
  }

  if (options.trace && !options.quiet) {
    printTrace(trace.getEvents(), options.color);
  }

  if (!existsSync(options.output)) {
    mkdirSync(options.output, { recursive: true });
  }

  const routeCells = route ?? undefined;
  if (options.formats.has("ascii")) {
    if (!options.quiet) {
      console.log("");
      printMaze(maze, { route: routeCells, useColors: options.color });
    }
    writeFileSync(join(options.output, "maze.txt"), `${renderAscii(maze, { route: routeCells })}\n`);
  }
  if (options.formats.has("svg")) {
    const path = join(options.output, "maze.svg");
    writeFileSync(path, renderSVG(maze, { cellSize: options.scale, route: routeCells }));
    if (!options.quiet) console.log(`  -> SVG: ${c("cyan", path, options.color)}`);
  }
  if (options.formats.has("dot")) {
    const path = join(options.output, "maze.dot");
    writeFileSync(path, `${renderDOT(maze.buildGraph())}\n`);
    if (!options.quiet) console.log(`  -> DOT: ${c("cyan", path, options.color)}`);
  }

  return 0;
}

process.exitCode = main();
