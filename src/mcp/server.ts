/**
 * MCP Server entry point
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { Session } from "../session";
import { loadSettings } from "../config/settings";
import { describeProgress } from "../output/progress";
import { correctTool, occurrencesTool, publishTool, scanTool, wordListTool } from "./tools";
import { describeError } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

// stdout carries the protocol
logger.setInfoStream("stderr");
logger.setTraceEnabled(process.argv.includes("--trace"));

const session = new Session({
    settings: loadSettings(),
    onProgress: event => logger.debug(describeProgress(event)),
});

function text(value: string) {
    return { content: [{ type: "text" as const, text: value }] };
}

/**
 * Turn a thrown error into a tool error result instead of a protocol failure
 */
async function respond(run: () => Promise<string> | string) {
    try {
        return text(await run());
    } catch (err) {
        return { ...text(`Error: ${describeError(err)}`), isError: true };
    }
}

// Create MCP server
const server = new McpServer({
    name: "usfm_speller",
    version: "0.1.0",
});

server.tool(
    "usfm_scan",
    `Scan a directory of USFM scripture files and build the word index used by the other tools.
Call this first, and again after the files were changed outside this server.`,
    {
        directory: z.string().describe("Directory containing .usfm files (searched recursively)"),
    },
    async ({ directory }) => respond(() => scanTool(session, directory))
);

server.tool(
    "usfm_word_list",
    `List distinct words with their number of occurrences. Rare words near common ones are likely misspellings.`,
    {
        filter: z.string().optional().describe("Only words containing this text (case-insensitive)"),
        sort: z.enum(["count", "word"]).optional().describe("Sort by count (default) or alphabetically"),
        limit: z.number().int().min(0).optional().describe("Maximum rows (default: 100)"),
    },
    async ({ filter, sort, limit }) =>
        respond(() =>
            wordListTool(session, {
                ...(filter !== undefined && { filter }),
                ...(sort !== undefined && { sort }),
                ...(limit !== undefined && { limit }),
            })
        )
);

server.tool(
    "usfm_occurrences",
    `Show every occurrence of a word (exact case) with its verse reference and surrounding text.`,
    {
        word: z.string().describe("Word to look up, exact case"),
    },
    async ({ word }) => respond(() => occurrencesTool(session, word))
);

server.tool(
    "usfm_correct",
    `Replace a word with a corrected spelling in every file where it occurs. Only whole words with exactly the same case are replaced ("the" never changes "them" or "The").`,
    {
        word: z.string().describe("Misspelled word, exact case"),
        replacement: z.string().describe("Corrected spelling, a single word"),
        dryRun: z.boolean().optional().describe("Report what would change without writing (default: false)"),
    },
    async ({ word, replacement, dryRun }) => respond(() => correctTool(session, word, replacement, dryRun ?? false))
);

server.tool(
    "usfm_publish",
    `Stage, commit and push the corrected files to the remote repository. Author and remote user come from the saved settings; the password is taken from the USFM_SPELLER_PASSWORD environment variable of the server.`,
    {
        message: z.string().optional().describe("Commit message (default from settings)"),
    },
    async ({ message }) =>
        respond(() => publishTool(session, process.env["USFM_SPELLER_PASSWORD"] ?? "", message))
);

// Start the server
async function main() {
    const transport = new StdioServerTransport();
    await server.connect(transport);
}

main().catch((error) => {
    logger.error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
});
