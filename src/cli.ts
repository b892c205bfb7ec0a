#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { Session } from "./session";
import type { ProgressEvent } from "./types";
import { loadSettings, saveSettings, updateSettings, getSettingsPath } from "./config/settings";
import type { Settings } from "./config/settings";
import { describeProgress } from "./output/progress";
import { buildWordList, formatWordList, toCsv } from "./output/word-list";
import type { WordListSort } from "./output/word-list";
import { formatOccurrences, renderOccurrencesHtml } from "./output/occurrences";
import { displayPath } from "./utils/shared";
import { parseArgs } from "./utils/args";
import type { ParsedArgs } from "./utils/args";
import { describeError } from "./errors";
import Logger from "./utils/logger";

const logger = Logger.getInstance();

const HELP_TEXT = `
usfm-speller - word list and whole-word spelling correction for USFM files

Scans a directory of USFM scripture files, lists every distinct word by
frequency, shows each occurrence in context and corrects a misspelled word in
every file at once. Corrected files can then be committed and pushed.

COMMANDS:
  words [options]                   List words by frequency
    --filter <text>                   Only words containing <text> (any case)
    --sort count|word                 Sort order (default: count)
    --limit <n>                       Show at most <n> words
    --csv <file>                      Also export the list as CSV

  show <word> [options]             Show every occurrence of <word>
    --html <file>                     Also write an HTML report

  fix <word> <replacement>          Replace <word> everywhere (whole words, exact case)
    --dry-run                         Report what would change, write nothing

  publish [options]                 Stage, commit and push the corrected files
    --message <text>                  Commit message (default from settings)
    --password-stdin                  Read the password from stdin
                                      (otherwise USFM_SPELLER_PASSWORD)

  config [options]                  Show or change saved settings
    --name <name>  --email <email>  --user <remote user>
    --repo <dir>   --remote <name>  --branch <name>

  mcp                               Start the MCP server (stdio)
  help, --help                      Show this help message

GLOBAL OPTIONS:
  --dir <dir>       USFM directory (default: repoDir from settings, else cwd)
  --trace           Log scan and correction progress
  --timing, -t      Show performance timing breakdown

EXAMPLES:
  usfm-speller words --dir ~/repos/en_ulb --limit 50
  usfm-speller show Jesus --dir ~/repos/en_ulb
  usfm-speller fix recieve receive --dir ~/repos/en_ulb
  echo "$PASSWORD" | usfm-speller publish --password-stdin
`;

function resolveDirectory(args: ParsedArgs, settings: Settings): string {
    const dir = args.values.get("--dir") ?? (settings.repoDir || process.cwd());
    return path.resolve(dir);
}

function requirePositional(args: ParsedArgs, index: number, name: string): string {
    const value = args.positionals[index];
    if (value === undefined || value === "") {
        throw new Error(`Missing <${name}>. Run 'usfm-speller help' for usage.`);
    }
    return value;
}

function onProgress(event: ProgressEvent): void {
    if (event.type === "scan:warning") {
        logger.warn(describeProgress(event));
    } else {
        logger.debug(describeProgress(event));
    }
}

async function openSession(args: ParsedArgs, settings: Settings): Promise<Session> {
    const session = new Session({ settings, onProgress });
    const directory = resolveDirectory(args, settings);
    const index = await logger.timeAsync("scan", () => session.scan(directory));
    const stats = session.stats();
    logger.log(`Indexed ${stats.words} distinct word(s) in ${stats.files} file(s) under ${index.root}`);
    for (const warning of index.warnings) {
        logger.warn(`${displayPath(index.root, warning.file)}: ${warning.error.message}`);
    }
    return session;
}

async function commandWords(args: ParsedArgs, settings: Settings): Promise<void> {
    const sortValue = args.values.get("--sort") ?? "count";
    if (sortValue !== "count" && sortValue !== "word") {
        throw new Error(`--sort must be "count" or "word", got "${sortValue}"`);
    }
    const sort: WordListSort = sortValue;
    const limitValue = args.values.get("--limit");
    const limit = limitValue !== undefined ? parseInt(limitValue, 10) : undefined;
    if (limit !== undefined && (Number.isNaN(limit) || limit < 0)) {
        throw new Error(`--limit must be a non-negative number, got "${limitValue}"`);
    }
    const filter = args.values.get("--filter") ?? "";

    const session = await openSession(args, settings);
    const rows = session.wordList({ filter, sort, ...(limit !== undefined && { limit }) });
    console.log(formatWordList(rows));

    const csvPath = args.values.get("--csv");
    if (csvPath !== undefined) {
        const index = session.current;
        const allRows = index ? buildWordList(index, { filter }) : [];
        fs.writeFileSync(csvPath, toCsv(allRows), "utf8");
        logger.log(`Word list exported to ${csvPath}`);
    }
}

async function commandShow(args: ParsedArgs, settings: Settings): Promise<void> {
    const word = requirePositional(args, 0, "word");
    const session = await openSession(args, settings);
    const index = session.current;
    if (!index) return;

    console.log(formatOccurrences(index, word));

    const htmlPath = args.values.get("--html");
    if (htmlPath !== undefined) {
        fs.writeFileSync(htmlPath, renderOccurrencesHtml(index, word), "utf8");
        logger.log(`Occurrence report written to ${htmlPath}`);
    }
}

async function commandFix(args: ParsedArgs, settings: Settings): Promise<void> {
    const word = requirePositional(args, 0, "word");
    const replacement = requirePositional(args, 1, "replacement");
    const dryRun = args.flags.has("--dry-run");

    const session = await openSession(args, settings);
    const root = session.directory ?? "";
    const outcome = await logger.timeAsync("correct", () => session.correct(word, replacement, { dryRun }));

    console.log(`\n${dryRun ? "Would correct" : "Corrected"} "${word}" -> "${replacement}":`);
    for (const result of outcome.results) {
        const symbol = result.error ? "✗" : "✓";
        const detail = result.error ? result.error.message : `${result.replacements} replacement(s)`;
        console.log(`  ${symbol} ${displayPath(root, result.file)}: ${detail}`);
    }

    const total = outcome.results.reduce((sum, r) => sum + r.replacements, 0);
    const failures = outcome.results.filter(r => r.error).length;
    console.log(`\n  ${total} replacement(s) in ${outcome.results.length - failures} file(s)`);
    if (failures > 0) {
        console.log(`  ${failures} file(s) need manual attention\n`);
        process.exit(1);
    }
}

async function readPassword(args: ParsedArgs): Promise<string> {
    if (args.flags.has("--password-stdin")) {
        const chunks: Buffer[] = [];
        for await (const chunk of process.stdin) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
        }
        return (Buffer.concat(chunks).toString("utf8").split(/\r?\n/)[0] ?? "").trim();
    }
    return process.env["USFM_SPELLER_PASSWORD"] ?? "";
}

async function commandPublish(args: ParsedArgs, settings: Settings): Promise<void> {
    const password = await readPassword(args);
    const session = await openSession(args, settings);
    const result = await session.publish(password, args.values.get("--message"));

    if (result.steps.length === 0) {
        console.log("\nNothing to publish: no modified USFM files and no unpushed commits.\n");
        return;
    }

    console.log("");
    for (const step of result.steps) {
        const symbol = step.success ? "✓" : "✗";
        console.log(`  ${symbol} ${step.step}: ${step.message}`);
    }

    if (result.success) {
        const summary = result.files.length > 0 ? `Published ${result.files.length} file(s)` : "Pushed earlier commits";
        console.log(`\n  ✅ ${summary}\n`);
    } else {
        console.log("\n  Publishing failed. Check the errors above.\n");
        process.exit(1);
    }
}

async function commandConfig(args: ParsedArgs, settings: Settings): Promise<void> {
    const changes: Partial<Settings> = {};
    const name = args.values.get("--name");
    const email = args.values.get("--email");
    const user = args.values.get("--user");
    const repo = args.values.get("--repo");
    const remote = args.values.get("--remote");
    const branch = args.values.get("--branch");
    if (name !== undefined) changes.userName = name;
    if (email !== undefined) changes.email = email;
    if (user !== undefined) changes.remoteUser = user;
    if (repo !== undefined) changes.repoDir = path.resolve(repo);
    if (remote !== undefined) changes.remote = remote;
    if (branch !== undefined) changes.branch = branch;

    if (Object.keys(changes).length === 0) {
        console.log(`Settings (${getSettingsPath()}):`);
        console.log(JSON.stringify(settings, null, 4));
        return;
    }

    const updated = updateSettings(settings, changes);
    const written = await saveSettings(updated);
    logger.log(`Saved settings to ${written}`);
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    logger.setTraceEnabled(args.flags.has("--trace"));
    logger.setTimingEnabled(args.flags.has("--timing"));

    if (args.flags.has("--help") || args.command === undefined || args.command === "help") {
        console.log(HELP_TEXT);
        return;
    }

    const settings = loadSettings();

    switch (args.command) {
        case "words":
            await commandWords(args, settings);
            break;
        case "show":
            await commandShow(args, settings);
            break;
        case "fix":
            await commandFix(args, settings);
            break;
        case "publish":
            await commandPublish(args, settings);
            break;
        case "config":
            await commandConfig(args, settings);
            break;
        case "mcp":
            // Dynamically import and run MCP server
            await import("./mcp/server");
            return;
        default:
            console.log(`Unknown command: ${args.command}`);
            console.log("Run 'usfm-speller --help' for usage.\n");
            process.exit(1);
    }

    logger.printTimings();
}

// Run main
main().catch((err) => {
    logger.error(describeError(err));
    process.exit(1);
});
