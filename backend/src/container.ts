/**
 * Dependency wiring.
 * Production defaults use the real OS primitives; tests pass fakes for the seams.
 */

import { AppSettings } from '../../shared/types';
import { DATA_PATHS, DataPaths } from './constants';
import { BackupStore } from './features/backups/BackupStore';
import { ChattrLock, ConfigLock, LockFileLock } from './features/dns/ConfigLock';
import { ConfigManager } from './features/dns/ConfigManager';
import { StateStore } from './features/dns/StateStore';
import { Benchmarker } from './features/probing/Benchmarker';
import { DnsTransport, NodeDnsTransport } from './features/probing/DnsTransport';
import { LeakDetector } from './features/probing/LeakDetector';
import { ProbeEngine } from './features/probing/ProbeEngine';
import { OsResolverPath, SystemResolverPath } from './features/probing/SystemResolverPath';
import { ResolverService, SystemdResolverService } from './features/system/ResolverService';
import { ExecutionContext, SafetyService, detectExecutionContext } from './features/system/SafetyService';
import { SettingsService } from './features/system/SettingsService';
import { ProcessLock } from './utils/ProcessLock';

export type LockKind = 'chattr' | 'lockfile';

export interface ContainerDeps {
    paths?: Partial<DataPaths>;
    context?: ExecutionContext;
    settings?: AppSettings;
    lockKind?: LockKind;
    lock?: ConfigLock;
    resolver?: ResolverService;
    transport?: DnsTransport;
    resolverPath?: SystemResolverPath;
    now?: () => Date;
}

export interface Container {
    paths: DataPaths;
    settings: AppSettings;
    safety: SafetyService;
    lock: ConfigLock;
    backups: BackupStore;
    transportBackups: BackupStore;
    state: StateStore;
    resolver: ResolverService;
    configManager: ConfigManager;
    probeEngine: ProbeEngine;
    benchmarker: Benchmarker;
    leakDetector: LeakDetector;
}

export function createContainer(deps: ContainerDeps = {}): Container {
    const paths: DataPaths = { ...DATA_PATHS, ...deps.paths };
    const settings = deps.settings ?? new SettingsService(paths.SETTINGS_FILE).getSettings();
    const safety = new SafetyService(deps.context ?? detectExecutionContext());

    const lockKind: LockKind = deps.lockKind ?? (safety.platform === 'linux' ? 'chattr' : 'lockfile');
    const lock = deps.lock ?? (lockKind === 'chattr'
        ? new ChattrLock(paths.RESOLV_CONF, safety)
        : new LockFileLock(paths.RESOLV_CONF, safety));

    const backups = new BackupStore(paths.BACKUPS_DIR, {
        retention: settings.backupRetention,
        maxAgeDays: settings.backupMaxAgeDays,
        ...(deps.now ? { now: deps.now } : {})
    });
    const transportBackups = new BackupStore(paths.TRANSPORT_BACKUPS_DIR, {
        retention: settings.backupRetention,
        maxAgeDays: settings.backupMaxAgeDays,
        ...(deps.now ? { now: deps.now } : {})
    });
    const state = new StateStore(paths.STATE_FILE);
    const resolver = deps.resolver ?? new SystemdResolverService(paths.RESOLVED_CONF);

    const configManager = new ConfigManager({
        lock,
        backups,
        transportBackups,
        operationLock: new ProcessLock(paths.LOCK_FILE),
        state,
        resolver,
        safety,
        livePath: paths.RESOLV_CONF,
        now: deps.now
    });

    const probeEngine = new ProbeEngine(deps.transport ?? new NodeDnsTransport());
    const benchmarker = new Benchmarker(probeEngine, {
        timeoutMs: settings.probeTimeoutMs,
        concurrency: settings.probeConcurrency,
        reliabilityThreshold: settings.reliabilityThreshold
    });
    const leakDetector = new LeakDetector(deps.resolverPath ?? new OsResolverPath(paths.RESOLV_CONF), {
        domains: settings.leakDomains,
        timeoutMs: settings.probeTimeoutMs,
        concurrency: settings.probeConcurrency
    });

    return {
        paths,
        settings,
        safety,
        lock,
        backups,
        transportBackups,
        state,
        resolver,
        configManager,
        probeEngine,
        benchmarker,
        leakDetector
    };
}
