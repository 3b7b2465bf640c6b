import { reactive, watch } from 'vue';
import { existsSync, readFileSync } from 'fs';
import { EOL } from 'os';
import { resolve } from 'path';
import { LogHandler } from '@/utilities/log-handler';
import { type LogLevel, isLogLevel } from '@/utilities/log-manager';

const log = new LogHandler('WorldSettings');

/** Environment variable naming a settings file */
export const SETTINGS_ENV_VAR = 'BLOCK_WORLD_SETTINGS';

/** Settings file looked up in the working directory when the variable is unset */
export const SETTINGS_FILE_NAME = 'block-world.settings.json';

export type LineSeparatorSetting = 'system' | 'lf' | 'crlf';

/**
 * World settings schema - add new settings here together with a default
 * and a validator below.
 */
export interface WorldSettings {
    /** Minimum level written by the log manager */
    logLevel: LogLevel;
    /** Line terminator used when saving worlds */
    lineSeparator: LineSeparatorSetting;
    /** Action-source argument that means "read actions from stdin" */
    stdinSentinel: string;
}

/** Default values for all settings */
const DEFAULT_SETTINGS: WorldSettings = {
    logLevel: 'info',
    lineSeparator: 'system',
    stdinSentinel: '-',
};

const SETTING_VALIDATORS: { [K in keyof WorldSettings]: (value: unknown) => value is WorldSettings[K] } = {
    logLevel: isLogLevel,
    lineSeparator: (value): value is LineSeparatorSetting =>
        value === 'system' || value === 'lf' || value === 'crlf',
    stdinSentinel: (value): value is string => typeof value === 'string' && value.length > 0,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickSetting<K extends keyof WorldSettings>(
    target: WorldSettings,
    source: Record<string, unknown>,
    key: K
): void {
    if (!(key in source)) {
        return;
    }
    const value = source[key];
    if (SETTING_VALIDATORS[key](value)) {
        target[key] = value;
    } else {
        log.warn(`Ignoring invalid value for setting '${key}': ${JSON.stringify(value)}`);
    }
}

/**
 * Parse a settings document, merging valid keys over the defaults.
 * Invalid values and unknown keys are ignored with a warning.
 */
export function parseSettings(json: string): WorldSettings {
    const settings = { ...DEFAULT_SETTINGS };

    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        log.warn(`Settings are not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
        return settings;
    }

    if (!isRecord(parsed)) {
        log.warn('Settings must be a JSON object');
        return settings;
    }

    for (const key of Object.keys(parsed)) {
        if (!(key in DEFAULT_SETTINGS)) {
            log.warn(`Unknown setting '${key}'`);
        }
    }

    pickSetting(settings, parsed, 'logLevel');
    pickSetting(settings, parsed, 'lineSeparator');
    pickSetting(settings, parsed, 'stdinSentinel');
    return settings;
}

/** Settings file path from the environment, or the working-directory default */
export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
    return env[SETTINGS_ENV_VAR] ?? resolve(process.cwd(), SETTINGS_FILE_NAME);
}

/** Load settings from a file, falling back to defaults when it is missing or unreadable */
function loadSettings(path: string): WorldSettings {
    if (!existsSync(path)) {
        return { ...DEFAULT_SETTINGS };
    }
    try {
        return parseSettings(readFileSync(path, 'utf-8'));
    } catch (e) {
        log.warn(`Failed to read settings from ${path}: ${e instanceof Error ? e.message : String(e)}`);
        return { ...DEFAULT_SETTINGS };
    }
}

/**
 * Centralized world settings manager.
 * - Loads settings from the settings file on init
 * - Keeps the log manager's level in sync with `logLevel`
 */
class WorldSettingsManager {
    public readonly state: WorldSettings;

    constructor() {
        this.state = reactive<WorldSettings>(loadSettings(resolveSettingsPath()));

        watch(
            () => this.state.logLevel,
            (level) => LogHandler.getLogManager().setLevel(level),
            { immediate: true, flush: 'sync' }
        );
    }

    /** Replace the current settings with the contents of a settings file */
    public loadFrom(path: string): void {
        Object.assign(this.state, loadSettings(path));
    }

    /** Line terminator to write, resolved from `lineSeparator` */
    public getLineSeparator(): string {
        switch (this.state.lineSeparator) {
        case 'lf':
            return '\n';
        case 'crlf':
            return '\r\n';
        case 'system':
            return EOL;
        }
    }

    /** Reset all settings to defaults */
    public resetToDefaults(): void {
        Object.assign(this.state, DEFAULT_SETTINGS);
    }

    /** Get a copy of the default settings */
    public getDefaults(): WorldSettings {
        return { ...DEFAULT_SETTINGS };
    }
}

// Singleton instance
export const worldSettings = new WorldSettingsManager();
