import { describe, test, expect } from 'vitest';
import { ConfigError } from '@facility-pulse/contracts';
import { loadConfig } from '../config';

describe('loadConfig', () => {
    test('defaults', () => {
        const config = loadConfig({});
        expect(config.port).toBe(3000);
        expect(config.storage.driver).toBe('postgres');
        expect(config.snapshots).toEqual({
            intervalMs: 2000,
            retentionLimit: 50,
            randomSeed: undefined,
            autostart: false,
        });
        expect(config.adminToken).toBeUndefined();
    });

    test('reads overrides', () => {
        const config = loadConfig({
            STORAGE_DRIVER: 'memory',
            SNAPSHOT_INTERVAL_MS: '500',
            SNAPSHOT_RANDOM_SEED: '7',
            SNAPSHOT_AUTOSTART: 'true',
            API_KEY: 'test-key',
            ADMIN_TOKEN: 'test-admin',
        });
        expect(config.storage.driver).toBe('memory');
        expect(config.snapshots.intervalMs).toBe(500);
        expect(config.snapshots.randomSeed).toBe(7);
        expect(config.snapshots.autostart).toBe(true);
        expect(config.auth.apiKey).toBe('test-key');
        expect(config.adminToken).toBe('test-admin');
    });

    test('blank values fall back to defaults', () => {
        expect(loadConfig({ ADMIN_TOKEN: '', PORT: ' ' }).port).toBe(3000);
        expect(loadConfig({ ADMIN_TOKEN: '' }).adminToken).toBeUndefined();
    });

    test('invalid values raise ConfigError', () => {
        expect(() => loadConfig({ SNAPSHOT_INTERVAL_MS: 'soon' })).toThrow(ConfigError);
        expect(() => loadConfig({ STORAGE_DRIVER: 'mongo' })).toThrow(/STORAGE_DRIVER/);
    });
});
