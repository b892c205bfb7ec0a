/**
 * Text responses for the MCP tools. Each function works on an explicit
 * session so it can be exercised without a transport.
 */

import * as path from "path";
import type { Session } from "../session";
import { formatOccurrences } from "../output/occurrences";
import { formatWordList } from "../output/word-list";
import type { WordListSort } from "../output/word-list";
import { displayPath } from "../utils/shared";

export async function scanTool(session: Session, directory: string): Promise<string> {
    const index = await session.scan(path.resolve(directory));
    const stats = session.stats();
    const lines = [
        `Indexed ${stats.occurrences} occurrence(s) of ${stats.words} distinct word(s) in ${stats.files} file(s) under ${index.root}.`,
    ];
    if (index.warnings.length > 0) {
        lines.push("", `${index.warnings.length} file(s) skipped:`);
        for (const warning of index.warnings) {
            lines.push(`- ${displayPath(index.root, warning.file)}: ${warning.error.message}`);
        }
    }
    return lines.join("\n");
}

export function wordListTool(
    session: Session,
    options: { filter?: string; sort?: WordListSort; limit?: number }
): string {
    const rows = session.wordList({ limit: 100, ...options });
    return formatWordList(rows);
}

export function occurrencesTool(session: Session, word: string): string {
    const index = session.current;
    if (!index) {
        return "No directory has been scanned yet. Call usfm_scan first.";
    }
    return formatOccurrences(index, word);
}

export async function correctTool(
    session: Session,
    word: string,
    replacement: string,
    dryRun: boolean = false
): Promise<string> {
    const outcome = await session.correct(word, replacement, { dryRun });
    const root = session.directory ?? "";
    const lines = [`${dryRun ? "Would correct" : "Corrected"} "${word}" -> "${replacement}":`];
    for (const result of outcome.results) {
        lines.push(
            result.error
                ? `- FAILED ${displayPath(root, result.file)}: ${result.error.message}`
                : `- ${displayPath(root, result.file)}: ${result.replacements} replacement(s)`
        );
    }
    return lines.join("\n");
}

export async function publishTool(session: Session, password: string, message?: string): Promise<string> {
    const result = await session.publish(password, message);
    if (result.steps.length === 0) {
        return "Nothing to publish: no modified USFM files and no unpushed commits.";
    }
    const lines = result.steps.map(step => `- ${step.step}: ${step.success ? "ok" : "FAILED"} - ${step.message}`);
    const summary = result.files.length > 0 ? `Published ${result.files.length} file(s).` : "Pushed earlier commits.";
    lines.unshift(result.success ? summary : "Publishing failed.");
    return lines.join("\n");
}
