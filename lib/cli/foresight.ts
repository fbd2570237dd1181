#!/usr/bin/env node
/**
 * Foresight CLI
 *
 * Drive a session from the command line: validate the key, analyze a book
 * into a planning table, and generate and export appendices.
 *
 * Usage:
 *   npm run foresight validate
 *   npm run foresight analyze <pdf_path>
 *   npm run foresight run <pdf_path>
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { apiKeyEnvName, loadConfigWithOverrides, readApiKey, type AppConfig } from "../config";
import { createForesightSession, type ForesightSession } from "../pipeline/runner";
import { EXPORT_FORMATS, parseExportFormat, type ExportFormat } from "../pipeline/export";
import { PLANNING_TABLE_FILE_NAME } from "../pipeline/planning/planning-markdown";
import { planningTableToWire } from "../pipeline/planning/planning-table";
import { appendLogEntry } from "../pipeline/llm-log";
import type { PipelineError } from "../pipeline/core/errors";
import type { PlanningTable, Result, WordCountRange } from "../pipeline/core/types";
import { SpinnerProgress } from "./progress";

const BASE_CONFIG = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config.yaml");
const DEFAULT_OUT_DIR = "foresight-output";

const USAGE = `Usage: npm run foresight <command> [args] [options]

Commands:
  validate                  Check the provider API key
  analyze <pdf_path>        Extract and analyze a book, write the planning table
  run <pdf_path>            Analyze, then generate and export appendices

Options:
  --config <path>           YAML file merged over the default config
  --out <dir>               Output directory (default: ${DEFAULT_OUT_DIR})
  --log-file <path>         Append every provider call to a JSONL log
  --edit <instruction>      Apply a change request to the planning table (repeatable)
  --groups <ids>            Comma-separated group ids to generate (default: all)
  --format <formats>        Comma-separated: ${EXPORT_FORMATS.join(", ")} (default: markdown)
  --time-horizon <range>    e.g. 2040-2050
  --word-count <min-max>    e.g. 2500-3500
  --focus <text>            Thematic focus for every generated appendix`;

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const config = loadConfigWithOverrides(flags.config, BASE_CONFIG);
  const apiKey = readApiKey(config);
  if (!apiKey) {
    console.error(`No API key found. Set ${apiKeyEnvName(config)} for provider "${config.provider}".`);
    process.exit(1);
  }

  const progress = new SpinnerProgress();
  const logFile = flags.logFile ? path.resolve(flags.logFile) : undefined;
  const { session } = createForesightSession({
    config,
    apiKey,
    progress,
    onLog: logFile ? (entry) => appendLogEntry(logFile, entry) : undefined,
  });

  try {
    switch (command) {
      case "validate": {
        unwrap(await session.validateCredential());
        console.log(`API key for ${config.provider} is valid.`);
        break;
      }

      case "analyze": {
        const [pdfPath] = flags.positional;
        if (!pdfPath) {
          console.error("Usage: npm run foresight analyze <pdf_path>");
          process.exit(1);
        }
        const table = await planBook(session, pdfPath, flags);
        writePlanningTable(session, table, flags.outDir);
        break;
      }

      case "run": {
        const [pdfPath] = flags.positional;
        if (!pdfPath) {
          console.error("Usage: npm run foresight run <pdf_path>");
          process.exit(1);
        }
        const table = await planBook(session, pdfPath, flags);
        writePlanningTable(session, table, flags.outDir);
        await generateAll(session, table, config, flags);
        break;
      }

      default:
        console.error(`Unknown command: ${command}\n`);
        console.log(USAGE);
        process.exit(1);
    }
  } finally {
    progress.stop();
  }
}

// ============================================================================
// Commands
// ============================================================================

async function planBook(session: ForesightSession, pdfPath: string, flags: ParsedFlags): Promise<PlanningTable> {
  if (!fs.existsSync(pdfPath)) {
    throw new Error(`PDF not found: ${pdfPath}`);
  }

  unwrap(await session.validateCredential());
  const source = unwrap(await session.upload(path.basename(pdfPath), new Uint8Array(fs.readFileSync(pdfPath))));
  console.log(`${source.fileName}: ${source.pageCount} pages, ${source.wordCount} words`);

  let table = unwrap(await session.analyze());
  for (const instruction of flags.edits) {
    table = unwrap(await session.requestEdit(instruction));
  }

  console.log(`\n${table.overview.title}: ${table.groups.length} chapter groups`);
  for (const group of table.groups) {
    console.log(`  ${group.groupId}  ${group.label}`);
  }
  return table;
}

function writePlanningTable(session: ForesightSession, table: PlanningTable, outDir: string): void {
  fs.mkdirSync(outDir, { recursive: true });
  const markdown = unwrap(session.planningTableMarkdown());
  fs.writeFileSync(path.join(outDir, PLANNING_TABLE_FILE_NAME), markdown);
  fs.writeFileSync(
    path.join(outDir, "planning_table.json"),
    JSON.stringify(planningTableToWire(table), null, 2) + "\n"
  );
  console.log(`\nPlanning table written to ${path.join(outDir, PLANNING_TABLE_FILE_NAME)}`);
}

async function generateAll(
  session: ForesightSession,
  table: PlanningTable,
  config: AppConfig,
  flags: ParsedFlags
): Promise<void> {
  const groupIds = flags.groups ?? table.groups.map((g) => g.groupId);
  fs.mkdirSync(flags.outDir, { recursive: true });

  for (const groupId of groupIds) {
    if (session.state.stage.name === "Generated") unwrap(session.openReview());
    const appendix = unwrap(
      await session.generate(groupId, {
        timeHorizon: flags.timeHorizon ?? config.generation.time_horizon,
        wordCount: flags.wordCount ?? config.generation.word_count,
        thematicFocus: flags.focus,
      })
    );
    console.log(`${appendix.title}: ${appendix.wordCount} words`);

    for (const format of flags.formats) {
      const file = unwrap(await session.export(groupId, format));
      const target = path.join(flags.outDir, file.fileName);
      fs.writeFileSync(target, file.bytes);
      console.log(`  wrote ${target}`);
    }
  }
}

function unwrap<T>(result: Result<T, PipelineError>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

// ============================================================================
// Flags
// ============================================================================

interface ParsedFlags {
  positional: string[];
  config?: string;
  outDir: string;
  logFile?: string;
  edits: string[];
  groups?: string[];
  formats: ExportFormat[];
  timeHorizon?: string;
  wordCount?: WordCountRange;
  focus?: string;
}

function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [], outDir: DEFAULT_OUT_DIR, edits: [], formats: ["markdown"] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === "--config" && value) {
      flags.config = value;
      i++;
    } else if (arg === "--out" && value) {
      flags.outDir = value;
      i++;
    } else if (arg === "--log-file" && value) {
      flags.logFile = value;
      i++;
    } else if (arg === "--edit" && value) {
      flags.edits.push(value);
      i++;
    } else if (arg === "--groups" && value) {
      flags.groups = splitList(value);
      i++;
    } else if (arg === "--format" && value) {
      flags.formats = splitList(value).map(parseFormat);
      i++;
    } else if (arg === "--time-horizon" && value) {
      flags.timeHorizon = value;
      i++;
    } else if (arg === "--word-count" && value) {
      flags.wordCount = parseWordCount(value);
      i++;
    } else if (arg === "--focus" && value) {
      flags.focus = value;
      i++;
    } else if (!arg.startsWith("-")) {
      flags.positional.push(arg);
    }
  }

  return flags;
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseFormat(value: string): ExportFormat {
  const format = parseExportFormat(value);
  if (!format) throw new Error(`Unknown export format: ${value}`);
  return format;
}

function parseWordCount(value: string): WordCountRange {
  const match = /^(\d+)\s*-\s*(\d+)$/.exec(value.trim());
  if (!match) throw new Error(`--word-count must look like 2500-3500, got "${value}"`);
  const min = parseInt(match[1], 10);
  const max = parseInt(match[2], 10);
  if (min < 1 || min > max) throw new Error(`Invalid word count range: ${value}`);
  return { min, max };
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error("\nForesight failed:", message);
  process.exit(1);
});
