import { BackupReason, BackupRecord, Provider, SwitchKind, SwitchResult, SwitchStep, SystemState } from '../../../../shared/types';
import { PROVIDERS } from '../../../../shared/utils/ProviderUtils';
import { RESOLV_CONF } from '../../constants';
import { AppError, errorMessage } from '../../utils/AppError';
import { FileUtils } from '../../utils/FileUtils';
import { logger } from '../../utils/logger';
import { Mutex } from '../../utils/Mutex';
import { ProcessLock } from '../../utils/ProcessLock';
import { BackupStore } from '../backups/BackupStore';
import { ResolverService } from '../system/ResolverService';
import { SafetyService } from '../system/SafetyService';
import { ConfigLock } from './ConfigLock';
import { DEFAULT_TRANSPORT, expectedNameservers, isDotTransport, readNameservers, renderConfig } from './ConfigRenderer';
import { StateStore } from './StateStore';

export interface ConfigManagerDeps {
    lock: ConfigLock;
    backups: BackupStore;
    /** Snapshots of the transport descriptor, taken before it is rewritten. */
    transportBackups: BackupStore;
    /** Exclusion across dnsswitch processes. */
    operationLock: ProcessLock;
    state: StateStore;
    resolver: ResolverService;
    safety: SafetyService;
    livePath?: string;
    now?: () => Date;
}

export interface StatusReport {
    state: SystemState;
    nameservers: string[];
    dotTransportActive: boolean;
    lockObserved: boolean;
    lockDesync: boolean;
}

/**
 * keep: never touch the descriptor. clear-dot: reset it only when it enables DoT.
 */
type TransportPlan =
    | { mode: 'keep' }
    | { mode: 'clear-dot' }
    | { mode: 'set'; content: string };

interface StepFailure {
    step: SwitchStep;
    liveModified: boolean;
    backup?: BackupRecord;
    transportBackup?: BackupRecord;
    transportRewritten?: boolean;
}

interface SwitchPlan {
    kind: SwitchKind;
    reason: BackupReason;
    provider: Provider | null;
    dot: boolean;
    live: Buffer;
    transport: TransportPlan;
    relock: boolean;
}

/**
 * Sole writer of the live resolver file and of SystemState.
 * switchTo / reset / restore run one at a time and never interleave their steps.
 */
export class ConfigManager {
    private readonly mutex = new Mutex();
    private readonly livePath: string;
    private readonly now: () => Date;

    constructor(private readonly deps: ConfigManagerDeps) {
        this.livePath = deps.livePath ?? RESOLV_CONF;
        this.now = deps.now ?? (() => new Date());
    }

    async switchTo(provider: Provider, enableDot: boolean): Promise<SwitchResult> {
        if (!PROVIDERS.some(p => p.id === provider.id)) {
            throw AppError.from('E_UNKNOWN_PROVIDER', `Provider '${provider.id}' is not registered.`);
        }
        if (enableDot && (!provider.supportsDot || !provider.dotHostname)) {
            throw AppError.from('E_DOT_UNSUPPORTED', `${provider.displayName} does not support DNS-over-TLS.`);
        }

        this.deps.safety.assertPrivileged('switch');
        const rendered = renderConfig(provider, enableDot);
        return this.exclusive(() => this.apply({
            kind: 'switch',
            reason: 'pre-switch',
            provider,
            dot: enableDot,
            live: Buffer.from(rendered.live),
            transport: enableDot ? { mode: 'set', content: rendered.transport } : { mode: 'clear-dot' },
            relock: true
        }));
    }

    /**
     * Back to the OS default (DHCP). The live file is left unlocked so the network manager can rewrite it.
     */
    async reset(): Promise<SwitchResult> {
        this.deps.safety.assertPrivileged('reset');
        const rendered = renderConfig(null, false);
        return this.exclusive(() => this.apply({
            kind: 'reset',
            reason: 'pre-reset',
            provider: null,
            dot: false,
            live: Buffer.from(rendered.live),
            transport: { mode: 'set', content: rendered.transport },
            relock: false
        }));
    }

    /**
     * Puts a verified backup's content back as the live file. The transport descriptor is not touched.
     */
    async restore(backupId: string): Promise<SwitchResult> {
        this.deps.safety.assertPrivileged('restore');
        return this.exclusive(async () => {
            const record = await this.deps.backups.find(backupId);
            const content = await this.deps.backups.restore(record);
            return this.apply({
                kind: 'restore',
                reason: 'pre-restore',
                provider: ConfigManager.identifyProvider(content.toString('utf8')),
                dot: false,
                live: content,
                transport: { mode: 'keep' },
                relock: true
            });
        });
    }

    /**
     * Read-only view for status displays. Does not resynchronize.
     */
    async status(): Promise<StatusReport> {
        const state = await this.deps.state.read();
        const live = await FileUtils.readOrEmpty(this.livePath);
        const transport = await this.deps.resolver.readTransport();
        const lockObserved = await this.deps.lock.isLocked();

        return {
            state,
            nameservers: readNameservers(live.toString('utf8')),
            dotTransportActive: isDotTransport(transport),
            lockObserved,
            lockDesync: lockObserved !== state.locked
        };
    }

    /**
     * Compares the observed lock primitive with the recorded flag. On mismatch the
     * record follows observed reality (LockDesync), logged as a warning.
     */
    async reconcileLock(): Promise<SystemState> {
        const state = await this.deps.state.read();
        const observed = await this.deps.lock.isLocked();
        if (observed === state.locked) return state;

        logger.warn(`[ConfigManager] LockDesync: state says locked=${state.locked}, ${this.deps.lock.kind} says locked=${observed}. Resynchronizing.`);
        logger.event('LOCK_DESYNC', { recorded: state.locked, observed });

        const synced: SystemState = { ...state, locked: observed };
        await this.deps.state.write(synced);
        return synced;
    }

    /**
     * Matches plain nameserver content against the registry.
     */
    static identifyProvider(content: string): Provider | null {
        const servers = readNameservers(content);
        if (servers.length === 0) return null;
        return PROVIDERS.find(p => {
            const expected = expectedNameservers(p, false);
            return expected.length === servers.length && expected.every((s, i) => s === servers[i]);
        }) ?? null;
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(() => this.deps.operationLock.runExclusive(task));
    }

    private async apply(plan: SwitchPlan): Promise<SwitchResult> {
        const { lock, backups, transportBackups, state: stateStore, resolver } = this.deps;

        const previous = await this.reconcileLock();
        const label = plan.provider ? `${plan.provider.displayName}${plan.dot ? ' (DoT)' : ''}` : 'system default';

        // 1. Read current live content
        let current: Buffer;
        let currentTransport: string;
        try {
            current = await FileUtils.readOrEmpty(this.livePath);
            currentTransport = await resolver.readTransport();
        } catch (e) {
            throw this.stepError(e, { step: 'read', liveModified: false });
        }

        const targetTransport = ConfigManager.targetTransport(plan.transport, currentTransport);
        if (current.equals(plan.live) && targetTransport === null) {
            return this.noop(plan, previous, label);
        }

        logger.info(`[ConfigManager] Applying ${label}...`);

        // 2. Unlock (the primitive forbids writes while set)
        try {
            await lock.release();
        } catch (e) {
            throw this.stepError(e, { step: 'unlock', liveModified: false });
        }

        // 3. Snapshot the live file, then the descriptor when it is about to change
        let backup: BackupRecord;
        try {
            backup = await backups.snapshot(current, plan.reason);
        } catch (e) {
            await this.recoverLock(previous);
            throw this.stepError(e, { step: 'backup', liveModified: false });
        }

        let transportBackup: BackupRecord | null = null;
        if (targetTransport !== null) {
            try {
                transportBackup = await transportBackups.snapshot(Buffer.from(currentTransport), plan.reason);
            } catch (e) {
                await this.recoverLock(previous);
                throw this.stepError(e, { step: 'backup', liveModified: false, backup });
            }
        }

        // Past this point the operation runs to completion or reports a fatal error.

        // 4a. Transport descriptor
        if (targetTransport !== null && transportBackup !== null) {
            try {
                await resolver.applyTransport(targetTransport);
            } catch (e) {
                await this.recoverLock(previous);
                throw this.stepError(e, { step: 'transport', liveModified: false, backup, transportBackup, transportRewritten: true });
            }
        }

        // 4b. Temp write + fsync + single rename over the live path
        try {
            await FileUtils.atomicWrite(this.livePath, plan.live);
        } catch (e) {
            await this.recoverLock(previous);
            throw this.stepError(e, {
                step: 'write',
                liveModified: false,
                backup,
                ...(transportBackup ? { transportBackup, transportRewritten: true } : {})
            });
        }

        // 5. Re-lock, only after the rename has completed
        let locked = false;
        let lockError: string | null = null;
        if (plan.relock) {
            try {
                await lock.acquire();
                locked = true;
            } catch (e) {
                lockError = errorMessage(e);
                logger.error(`[ConfigManager] New configuration is live but NOT locked: ${lockError}`);
            }
        }

        // 6. Persist state
        const next: SystemState = {
            activeProviderId: plan.provider ? plan.provider.id : null,
            dotEnabled: plan.provider !== null && plan.dot,
            locked,
            lastSwitchAt: this.now().toISOString(),
            lastBackupRef: backup.id
        };
        try {
            await stateStore.write(next);
        } catch (e) {
            throw this.stepError(e, { step: 'state', liveModified: true, backup, ...(transportBackup ? { transportBackup } : {}) });
        }

        await this.afterApply(plan);
        const verified = await this.verify(plan);

        logger.event(plan.kind === 'switch' ? 'SWITCH' : plan.kind === 'reset' ? 'RESET' : 'RESTORE', {
            provider: next.activeProviderId,
            dot: next.dotEnabled,
            locked,
            backup: backup.id,
            ...(transportBackup ? { transportBackup: transportBackup.id } : {}),
            verified,
            ...(lockError ? { lockError } : {})
        });

        if (lockError !== null) {
            return { status: 'degraded', kind: plan.kind, state: next, backup, transportBackup, verified, step: 'lock', error: lockError };
        }

        logger.success(`[ConfigManager] ${label} applied${verified ? ' and verified' : ''}.`);
        return { status: 'applied', kind: plan.kind, state: next, backup, transportBackup, verified };
    }

    /** Descriptor content to write, or null when it stays as it is. */
    private static targetTransport(plan: TransportPlan, current: string): string | null {
        switch (plan.mode) {
            case 'keep':
                return null;
            case 'clear-dot':
                return isDotTransport(current) ? DEFAULT_TRANSPORT : null;
            case 'set':
                return plan.content === current ? null : plan.content;
        }
    }

    private async noop(plan: SwitchPlan, previous: SystemState, label: string): Promise<SwitchResult> {
        let locked = previous.locked;
        if (plan.relock && !locked) {
            await this.deps.lock.acquire();
            locked = true;
        }

        const next: SystemState = {
            ...previous,
            activeProviderId: plan.provider ? plan.provider.id : null,
            dotEnabled: plan.provider !== null && plan.dot,
            locked
        };
        const changed = next.activeProviderId !== previous.activeProviderId
            || next.dotEnabled !== previous.dotEnabled
            || next.locked !== previous.locked;
        if (changed) {
            await this.deps.state.write(next);
        }

        logger.info(`[ConfigManager] ${label} already active, nothing to do.`);
        logger.event('NOOP', { kind: plan.kind, provider: next.activeProviderId, dot: next.dotEnabled });
        return { status: 'noop', kind: plan.kind, state: next };
    }

    private async afterApply(plan: SwitchPlan): Promise<void> {
        try {
            await this.deps.resolver.flushCaches();
        } catch (e) {
            logger.warn(`[ConfigManager] Cache flush failed: ${errorMessage(e)}`);
        }

        if (plan.kind === 'reset') {
            try {
                await this.deps.resolver.regenerateDefault();
            } catch (e) {
                logger.warn(`[ConfigManager] Network manager did not regenerate the default configuration: ${errorMessage(e)}`);
            }
        }
    }

    /**
     * Re-reads the live file and checks every expected nameserver is present.
     */
    private async verify(plan: SwitchPlan): Promise<boolean> {
        const expected = plan.kind === 'switch' ? expectedNameservers(plan.provider, plan.dot) : [];
        if (expected.length === 0) return true;

        try {
            const current = readNameservers((await FileUtils.readOrEmpty(this.livePath)).toString('utf8'));
            const valid = expected.every(ns => current.includes(ns));
            if (!valid) {
                logger.error(`[ConfigManager] Verification failed: expected ${expected.join(', ')}, found ${current.join(', ') || 'none'}`);
            }
            return valid;
        } catch (e) {
            logger.warn(`[ConfigManager] Verification read failed: ${errorMessage(e)}`);
            return false;
        }
    }

    /**
     * Re-takes a lock that was held before the failed operation. When that fails
     * the recorded state is marked unlocked so it matches the file.
     */
    private async recoverLock(previous: SystemState): Promise<void> {
        if (!previous.locked) return;
        try {
            await this.deps.lock.acquire();
            return;
        } catch (e) {
            logger.error(`[ConfigManager] Could not restore lock after failure: ${errorMessage(e)}`);
        }

        try {
            await this.deps.state.write({ ...previous, locked: false });
            logger.event('LOCK_DESYNC', { recorded: false, observed: false, reason: 'relock-failed' });
        } catch (e) {
            logger.error(`[ConfigManager] Could not record the lost lock: ${errorMessage(e)}`);
        }
    }

    private stepError(e: unknown, failure: StepFailure): AppError {
        const { step, liveModified, backup, transportBackup, transportRewritten } = failure;
        const context = {
            step,
            liveModified,
            ...(backup ? { backup: backup.id } : {}),
            ...(transportBackup ? { transportBackup: transportBackup.id } : {}),
            ...(transportRewritten ? { transportRewritten } : {})
        };

        let where = liveModified
            ? `new config written but ${step} failed`
            : `failed at '${step}', live configuration unchanged`;
        if (transportRewritten && transportBackup) {
            where += `; resolver descriptor may have been rewritten, previous copy in backup ${transportBackup.id}`;
        }

        logger.error(`[ConfigManager] Switch ${where}: ${errorMessage(e)}`);

        if (e instanceof AppError) {
            return new AppError(e.exitCode, e.errorCode, `${e.message} (${where})`, e.isOperational, { ...e.details, ...context });
        }
        return AppError.from('E_IO_FAILURE', `${errorMessage(e)} (${where})`, context);
    }
}
