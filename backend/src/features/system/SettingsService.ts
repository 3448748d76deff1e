import fs from 'fs-extra';
import { AppSettings } from '../../../../shared/types';
import { SETTINGS_FILE } from '../../constants';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/AppError';

export const DEFAULT_DOMAINS = ['google.com', 'cloudflare.com', 'github.com'];

export const DEFAULT_SETTINGS: AppSettings = {
    backupRetention: 10,
    backupMaxAgeDays: 7,
    probeConcurrency: 8,
    probeTimeoutMs: 2000,
    samplesPerDomain: 3,
    reliabilityThreshold: 0.5,
    benchmarkDomains: DEFAULT_DOMAINS,
    leakDomains: DEFAULT_DOMAINS
};

type NumericKey = {
    [K in keyof AppSettings]: AppSettings[K] extends number ? K : never
}[keyof AppSettings];

const NUMERIC_RULES: Record<NumericKey, { min: number; max: number; integer: boolean }> = {
    backupRetention: { min: 1, max: 1000, integer: true },
    backupMaxAgeDays: { min: 0, max: 3650, integer: true },
    probeConcurrency: { min: 1, max: 64, integer: true },
    probeTimeoutMs: { min: 100, max: 60000, integer: true },
    samplesPerDomain: { min: 1, max: 50, integer: true },
    reliabilityThreshold: { min: 0, max: 1, integer: false }
};

const NUMERIC_KEYS: NumericKey[] = [
    'backupRetention',
    'backupMaxAgeDays',
    'probeConcurrency',
    'probeTimeoutMs',
    'samplesPerDomain',
    'reliabilityThreshold'
];

const isDomainList = (value: unknown): value is string[] =>
    Array.isArray(value) && value.length > 0 && value.every(v => typeof v === 'string' && v.trim().length > 0);

export class SettingsService {
    private settings: AppSettings | null = null;

    constructor(private readonly settingsFile: string = SETTINGS_FILE) {}

    getSettings(): AppSettings {
        if (!this.settings) {
            this.settings = this.load();
        }
        return this.settings;
    }

    /**
     * Merges a raw settings object over the defaults.
     * Each invalid field falls back to its default with a warning.
     */
    static sanitize(raw: unknown): AppSettings {
        const result: AppSettings = { ...DEFAULT_SETTINGS };
        if (typeof raw !== 'object' || raw === null) return result;
        const input: Record<string, unknown> = { ...raw };

        for (const key of NUMERIC_KEYS) {
            const value = input[key];
            if (value === undefined) continue;
            const rule = NUMERIC_RULES[key];
            const valid = typeof value === 'number'
                && Number.isFinite(value)
                && value >= rule.min
                && value <= rule.max
                && (!rule.integer || Number.isInteger(value));

            if (valid) {
                result[key] = value;
            } else {
                logger.warn(`[SettingsService] Invalid ${key}=${JSON.stringify(value)}, using default ${DEFAULT_SETTINGS[key]}`);
            }
        }

        for (const key of ['benchmarkDomains', 'leakDomains'] as const) {
            const value = input[key];
            if (value === undefined) continue;
            if (isDomainList(value)) {
                result[key] = value.map(d => d.trim());
            } else {
                logger.warn(`[SettingsService] Invalid ${key}, using defaults`);
            }
        }

        return result;
    }

    private load(): AppSettings {
        try {
            if (fs.existsSync(this.settingsFile)) {
                return SettingsService.sanitize(fs.readJSONSync(this.settingsFile));
            }
        } catch (e) {
            logger.error(`[SettingsService] Failed to load ${this.settingsFile}: ${errorMessage(e)}`);
        }
        return { ...DEFAULT_SETTINGS };
    }
}
