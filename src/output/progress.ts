import * as path from "path";
import type { ProgressEvent } from "../types";

/**
 * One log line for a progress event
 */
export function describeProgress(event: ProgressEvent): string {
    switch (event.type) {
        case "scan:start":
            return `Scanning ${event.directory} (${event.fileCount} file(s))`;
        case "scan:file":
            return `Read ${path.basename(event.file)}: ${event.words} word(s) [${event.done}/${event.total}]`;
        case "scan:warning":
            return `Skipped ${event.file}: ${event.message}`;
        case "scan:done":
            return `Indexed ${event.occurrences} occurrence(s) of ${event.words} distinct word(s) in ${event.files} file(s)`;
        case "correct:start":
            return `Correcting "${event.word}" to "${event.replacement}" in ${event.fileCount} file(s)`;
        case "correct:file":
            return event.error !== undefined
                ? `Failed ${path.basename(event.file)}: ${event.error} [${event.done}/${event.total}]`
                : `Corrected ${path.basename(event.file)}: ${event.replacements} replacement(s) [${event.done}/${event.total}]`;
        case "correct:done":
            return `Finished "${event.word}": ${event.replacements} replacement(s), ${event.failures} failure(s)`;
        case "publish:step":
            return `${event.step}: ${event.success ? "ok" : "failed"} - ${event.message}`;
    }
}
