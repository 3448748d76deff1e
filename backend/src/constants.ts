import path from 'path';

const fromEnv = (key: string, fallback: string) => process.env[key] || fallback;

export const RESOLV_CONF = fromEnv('DNSSWITCH_RESOLV_CONF', '/etc/resolv.conf');
export const RESOLVED_CONF = fromEnv('DNSSWITCH_RESOLVED_CONF', '/etc/systemd/resolved.conf');
export const DATA_DIR = fromEnv('DNSSWITCH_DATA_DIR', '/var/lib/dnsswitch');
export const LOG_DIR = fromEnv('DNSSWITCH_LOG_DIR', '/var/log/dnsswitch');

export const STATE_FILE = path.join(DATA_DIR, 'state.json');
export const SETTINGS_FILE = path.join(DATA_DIR, 'settings.json');
export const BACKUPS_DIR = path.join(DATA_DIR, 'backups');
export const TRANSPORT_BACKUPS_DIR = path.join(DATA_DIR, 'backups-resolved');
export const LOCK_FILE = path.join(DATA_DIR, 'dnsswitch.lock');

export const RESOLVED_STUB_ADDRESS = '127.0.0.53';
export const RESOLVER_SERVICE = 'systemd-resolved';
export const NETWORK_SERVICE = 'NetworkManager';

export const DATA_PATHS = {
    RESOLV_CONF,
    RESOLVED_CONF,
    DATA_DIR,
    LOG_DIR,
    STATE_FILE,
    SETTINGS_FILE,
    BACKUPS_DIR,
    TRANSPORT_BACKUPS_DIR,
    LOCK_FILE
};

export type DataPaths = typeof DATA_PATHS;
