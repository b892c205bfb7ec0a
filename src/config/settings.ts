import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { z } from "zod";
import { SettingsError, describeError } from "../errors";
import { writeFileAtomic } from "../utils/atomic-write";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

const SETTINGS_FILENAME = "settings.json";

/**
 * Persisted between runs. The remote password is deliberately absent: it is
 * supplied per push and never written to disk.
 */
export const SettingsSchema = z.object({
    userName: z.string().default(""),
    email: z.string().default(""),
    remoteUser: z.string().default(""),
    repoDir: z.string().default(""),
    remote: z.string().min(1).default("origin"),
    branch: z.string().min(1).default("master"),
    commitMessage: z.string().min(1).default("Correct spelling"),
    extensions: z.array(z.string().regex(/^\.[^./\\]+$/, "extension must look like .usfm")).min(1).default([".usfm"]),
    contextRadius: z.number().int().min(0).max(500).default(40),
});

export type Settings = z.infer<typeof SettingsSchema>;

export function defaultSettings(): Settings {
    return SettingsSchema.parse({});
}

/**
 * Directory holding settings.json: $USFM_SPELLER_HOME, else ~/.usfm-speller
 */
export function getConfigDir(): string {
    const override = process.env["USFM_SPELLER_HOME"];
    if (override) {
        return path.resolve(override);
    }
    return path.join(os.homedir(), ".usfm-speller");
}

export function getSettingsPath(configDir: string = getConfigDir()): string {
    return path.join(configDir, SETTINGS_FILENAME);
}

/**
 * Load settings. A missing file gives the defaults; unreadable JSON or values
 * that fail the schema throw SettingsError.
 */
export function loadSettings(configDir: string = getConfigDir()): Settings {
    const settingsPath = getSettingsPath(configDir);
    if (!fs.existsSync(settingsPath)) {
        logger.debug(`Settings file not found, using defaults: ${settingsPath}`);
        return defaultSettings();
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(settingsPath, "utf8"));
    } catch (err) {
        throw new SettingsError(settingsPath, describeError(err), err);
    }

    return validateSettings(raw, settingsPath);
}

function validateSettings(raw: unknown, settingsPath: string): Settings {
    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
        const reason = parsed.error.issues
            .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
        throw new SettingsError(settingsPath, reason, parsed.error);
    }
    return parsed.data;
}

export async function saveSettings(settings: Settings, configDir: string = getConfigDir()): Promise<string> {
    const validated = validateSettings(settings, getSettingsPath(configDir));
    fs.mkdirSync(configDir, { recursive: true });
    const settingsPath = getSettingsPath(configDir);
    await writeFileAtomic(settingsPath, JSON.stringify(validated, null, 4) + "\n");
    logger.debug(`Wrote settings to: ${settingsPath}`);
    return settingsPath;
}

/**
 * Apply the fields that were given, leaving the rest as they are
 */
export function updateSettings(
    settings: Settings,
    changes: Partial<Settings>,
    configDir: string = getConfigDir()
): Settings {
    const merged: Record<string, unknown> = { ...settings };
    for (const [key, value] of Object.entries(changes)) {
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return validateSettings(merged, getSettingsPath(configDir));
}
