/**
 * 환경 변수 설정 로드 테스트
 */
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { loadConfig, parseAdminIds, requireEnv } from './env.js';

const base = {
    BOT_TOKEN: 'test-bot-token',
    GITHUB_TOKEN: 'test-secret',
};

describe('loadConfig', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('applies defaults', () => {
        const config = loadConfig(base);

        expect(config).toEqual({
            botToken: 'test-bot-token',
            githubToken: 'test-secret',
            adminIds: [],
            checkIntervalSeconds: 60,
            storage: {
                backend: 'file',
                statePath: 'commit-watch-state.json',
                supabaseUrl: '',
                supabaseKey: '',
            },
            transportWebhookUrl: '',
            apiPort: 3001,
            githubTimeoutMs: 15000,
            maxCommitsPerDelivery: 5,
            unreachableThreshold: 3,
        });
    });

    it('reads overrides', () => {
        const config = loadConfig({
            ...base,
            CHECK_INTERVAL: '120',
            ADMIN_CHAT_IDS: '[1001, -42]',
            STORAGE_BACKEND: 'memory',
            API_PORT: '8080',
            MAX_COMMITS_PER_DELIVERY: '3',
        });

        expect(config.checkIntervalSeconds).toBe(120);
        expect(config.adminIds).toEqual(['1001', '-42']);
        expect(config.storage.backend).toBe('memory');
        expect(config.apiPort).toBe(8080);
        expect(config.maxCommitsPerDelivery).toBe(3);
    });

    it('raises the check interval to the minimum', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(loadConfig({ ...base, CHECK_INTERVAL: '10' }).checkIntervalSeconds).toBe(30);
        expect(warn).toHaveBeenCalledTimes(1);
    });

    it.each(['abc', '0', '-5', '1.5'])('rejects CHECK_INTERVAL=%s', value => {
        expect(() => loadConfig({ ...base, CHECK_INTERVAL: value })).toThrow(ConfigError);
    });

    it('requires both tokens', () => {
        expect(() => loadConfig({ GITHUB_TOKEN: 'test-secret' })).toThrow('BOT_TOKEN');
        expect(() => loadConfig({ BOT_TOKEN: 'test-bot-token' })).toThrow('GITHUB_TOKEN');
    });

    it('requires Supabase credentials for the supabase backend', () => {
        expect(() => loadConfig({ ...base, STORAGE_BACKEND: 'supabase' })).toThrow(
            'STORAGE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY'
        );
    });

    it('rejects unknown storage backends', () => {
        expect(() => loadConfig({ ...base, STORAGE_BACKEND: 'redis' })).toThrow(ConfigError);
    });
});

describe('parseAdminIds', () => {
    it.each([
        ['', []],
        ['123', ['123']],
        ['123,456', ['123', '456']],
        ['[123, 456]', ['123', '456']],
        [' 1, ,2 ', ['1', '2']],
    ])('parses %j', (raw, expected) => {
        expect(parseAdminIds(raw)).toEqual(expected);
    });

    it('rejects non-integer ids', () => {
        expect(() => parseAdminIds('123,abc')).toThrow(
            "ADMIN_CHAT_IDS must be comma-separated integers! Example: '123,456,789' or '[123,456,789]'"
        );
    });
});

describe('requireEnv', () => {
    it('names the missing variable and service', () => {
        expect(() => requireEnv('GITHUB_TOKEN', 'GitHub', {})).toThrow('[GitHub] 필수 환경 변수가 누락되었습니다: GITHUB_TOKEN');
    });
});
