#!/usr/bin/env node
/**
 * dnsswitch CLI
 *
 * Thin caller over the core: every command maps to one ConfigManager,
 * Benchmarker or LeakDetector operation.
 *
 * Usage:
 *   sudo dnsswitch <provider> [--dot]   switch (1-5 or id, e.g. "2" or "cloudflare")
 *   dnsswitch --status | --list | --backups
 *   dnsswitch --benchmark | --test
 *   sudo dnsswitch --reset | --restore <backup-id>
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { BenchmarkReport, LeakReport, SwitchResult } from '../../shared/types';
import { PROVIDERS, findProvider, getProviderById } from '../../shared/utils/ProviderUtils';
import { Container, createContainer } from './container';
import { StatusReport } from './features/dns/ConfigManager';
import { AppError } from './utils/AppError';
import { handleCliError } from './utils/errorHandler';

export type Printer = (line: string) => void;

interface CliOptions {
    dot?: boolean;
    test?: boolean;
    benchmark?: boolean;
    status?: boolean;
    reset?: boolean;
    list?: boolean;
    backups?: boolean;
    restore?: string;
}

const formatLatency = (ms: number | null) => ms === null ? '-' : `${ms.toFixed(1)}ms`;

export function printSwitchResult(result: SwitchResult, print: Printer): void {
    const target = result.state.activeProviderId ?? 'system default';
    const dot = result.state.dotEnabled ? ' (DNS-over-TLS)' : '';

    switch (result.status) {
        case 'noop':
            print(chalk.blue(`[i] ${target}${dot} is already configured. Nothing changed.`));
            break;
        case 'applied':
            print(chalk.green(`[+] ${result.kind} complete: ${target}${dot}`));
            print(`    Backup: ${result.backup.id}  Locked: ${result.state.locked ? 'yes' : 'no'}`);
            if (result.transportBackup) print(`    Resolver backup: ${result.transportBackup.id}`);
            if (!result.verified) print(chalk.red('[✗] Verification failed: live file does not list the expected nameservers.'));
            break;
        case 'degraded':
            print(chalk.yellow(`[!] ${target}${dot} is live but the file could not be locked: ${result.error}`));
            print(chalk.yellow('    Re-run the same command to retry the lock.'));
            break;
    }
}

export function printStatus(status: StatusReport, print: Printer): void {
    const { state } = status;
    const provider = state.activeProviderId ? getProviderById(state.activeProviderId).displayName : 'System default (DHCP)';
    print(`Active provider : ${chalk.green(provider)}`);
    print(`Nameservers     : ${status.nameservers.join(', ') || '(none)'}`);
    print(`DNS-over-TLS    : ${state.dotEnabled || status.dotTransportActive ? chalk.green('enabled') : 'disabled'}`);
    print(`Locked          : ${status.lockObserved ? 'yes' : 'no'}${status.lockDesync ? chalk.yellow(' (state record disagrees)') : ''}`);
    print(`Last switch     : ${state.lastSwitchAt ?? 'never'}`);
}

export function printBenchmark(report: BenchmarkReport, print: Printer): void {
    print(chalk.yellow('[*] DNS benchmark (median latency, lower is better)'));
    report.ranking.forEach((entry, i) => {
        const rate = `${Math.round(entry.successRate * 100)}%`;
        const line = `${String(i + 1).padStart(2)}. ${entry.provider.displayName.padEnd(24)} ${formatLatency(entry.score).padStart(9)}  ${rate.padStart(4)} ok`;
        print(entry.unreliable ? chalk.red(`${line}  unreliable`) : line);
    });
    if (report.winner) {
        print(chalk.blue(`[i] Fastest: ${chalk.bold(report.winner.provider.displayName)} (${formatLatency(report.winner.score)})`));
    } else {
        print(chalk.red('[!] Every provider timed out. Check your connection.'));
    }
}

export function printLeakReport(report: LeakReport, print: Printer): void {
    for (const o of report.observations) {
        print(o.success
            ? chalk.green(`[✓] ${o.domain} -> ${o.resolvedAddress} via ${o.respondingServer ?? 'unknown'}`)
            : chalk.red(`[✗] ${o.domain} : ${o.latency === 'timeout' ? 'TIMEOUT' : 'FAILED'}`));
    }
    print(`Connectivity: ${report.connectivity}`);
    if (report.leaked) {
        print(chalk.red(`[!] DNS LEAK: expected ${report.expectedAddress}, answered by ${report.observedAddress}`));
    } else if (report.expectedAddress) {
        print(chalk.green(`[✓] No leak: resolver matches ${report.expectedAddress}`));
    }
}

export function buildProgram(container: Container, print: Printer = console.log): Command {
    const program = new Command();
    program
        .name('dnsswitch')
        .description('Switch system DNS providers, with optional DNS-over-TLS, backups and leak checks')
        .argument('[provider]', `provider index (1-${PROVIDERS.length}) or id`)
        .option('--dot', 'enable DNS-over-TLS for the selected provider')
        .option('--test', 'run a DNS leak / connectivity test')
        .option('--benchmark', 'benchmark every provider')
        .option('--status', 'show the current DNS configuration')
        .option('--reset', 'restore the system default (DHCP)')
        .option('--list', 'list registered providers')
        .option('--backups', 'list configuration backups')
        .option('--restore <backupId>', 'restore the live file from a backup')
        .action(async (selection: string | undefined, opts: CliOptions) => {
            const { configManager, benchmarker, leakDetector, backups, state, settings } = container;

            if (opts.list) {
                PROVIDERS.forEach((p, i) => {
                    const addresses = [p.primaryAddress, p.secondaryAddress].filter(Boolean).join(', ');
                    print(`${i + 1}. ${p.displayName} (${addresses})${p.supportsDot ? '  [DoT]' : ''}`);
                });
                return;
            }

            if (opts.status) {
                printStatus(await configManager.status(), print);
                return;
            }

            if (opts.backups) {
                const records = await backups.list();
                if (records.length === 0) print('No backups.');
                for (const r of records) {
                    print(`${r.id}  ${r.createdAt}  ${r.reason}  ${r.size} bytes`);
                }
                return;
            }

            if (opts.benchmark) {
                printBenchmark(await benchmarker.run([...PROVIDERS], settings.benchmarkDomains, settings.samplesPerDomain), print);
                return;
            }

            if (opts.test) {
                const current = await state.read();
                const expected = current.activeProviderId ? getProviderById(current.activeProviderId) : null;
                printLeakReport(await leakDetector.check(expected), print);
                return;
            }

            if (opts.reset) {
                printSwitchResult(await configManager.reset(), print);
                return;
            }

            if (opts.restore) {
                printSwitchResult(await configManager.restore(opts.restore), print);
                return;
            }

            if (selection) {
                const provider = findProvider(selection);
                if (!provider) {
                    throw AppError.from('E_UNKNOWN_PROVIDER', `Unknown provider '${selection}'. Use --list.`);
                }
                const result = await configManager.switchTo(provider, opts.dot === true);
                printSwitchResult(result, print);
                if (result.status !== 'noop' && result.verified) {
                    printLeakReport(await leakDetector.check(provider), print);
                }
                return;
            }

            program.help();
        });

    return program;
}

export async function main(argv: string[]): Promise<number> {
    try {
        await buildProgram(createContainer()).parseAsync(argv);
        return 0;
    } catch (e) {
        return handleCliError(e);
    }
}

if (require.main === module) {
    main(process.argv).then(code => {
        process.exitCode = code;
    });
}
