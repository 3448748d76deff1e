// --- Shared / Core Types ---

export * from './network';

export type ProviderId = 'google' | 'cloudflare' | 'quad9' | 'adguard' | 'cleanbrowsing';

/**
 * Immutable descriptor of a registered DNS service.
 * The registry is fixed at startup; nothing mutates a Provider at runtime.
 */
export interface Provider {
    readonly id: ProviderId;
    readonly displayName: string;
    readonly primaryAddress: string;
    readonly secondaryAddress?: string;
    readonly ipv6Addresses: readonly string[];
    readonly supportsDot: boolean;
    readonly dotHostname?: string; // Required when supportsDot
}

export type BackupReason = 'pre-switch' | 'pre-reset' | 'pre-restore';

export interface BackupRecord {
    id: string;
    createdAt: string; // ISO
    storagePath: string;
    contentDigest: string; // sha256 hex of the backed-up bytes
    reason: BackupReason;
    size: number;
}

export interface SystemState {
    activeProviderId: ProviderId | null; // null = DHCP / OS default
    dotEnabled: boolean;
    locked: boolean;
    lastSwitchAt: string | null;
    lastBackupRef: string | null; // BackupRecord.id
}

export type SwitchStep = 'read' | 'unlock' | 'backup' | 'transport' | 'write' | 'lock' | 'state';

export type SwitchKind = 'switch' | 'reset' | 'restore';

interface SwitchResultBase {
    kind: SwitchKind;
    state: SystemState;
}

export interface AppliedSwitchResult extends SwitchResultBase {
    status: 'applied';
    backup: BackupRecord;
    transportBackup: BackupRecord | null; // set when the resolver descriptor was rewritten
    verified: boolean;
}

/** Idempotent success: the live configuration already matched the target. */
export interface NoOpResult extends SwitchResultBase {
    status: 'noop';
}

/** New configuration is live but the lock could not be re-acquired. */
export interface DegradedSwitchResult extends SwitchResultBase {
    status: 'degraded';
    backup: BackupRecord;
    transportBackup: BackupRecord | null;
    verified: boolean;
    step: SwitchStep;
    error: string;
}

export type SwitchResult = AppliedSwitchResult | NoOpResult | DegradedSwitchResult;

export interface AppSettings {
    backupRetention: number;
    backupMaxAgeDays: number; // 0 disables age-based eviction
    probeConcurrency: number;
    probeTimeoutMs: number;
    samplesPerDomain: number;
    reliabilityThreshold: number; // 0.0 to 1.0
    benchmarkDomains: string[];
    leakDomains: string[];
}
