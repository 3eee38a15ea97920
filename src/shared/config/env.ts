/**
 * 환경 변수 관리
 *
 * .env 파일에서 읽는 변수 목록은 .env.example 참고
 */
import { ConfigError } from '../errors.js';

export type StorageBackend = 'file' | 'supabase' | 'memory';

export interface AppConfig {
    botToken: string;
    githubToken: string;
    /** 명령을 보낼 수 있는 채팅 id (비어 있으면 제한 없음) */
    adminIds: string[];
    checkIntervalSeconds: number;
    storage: {
        backend: StorageBackend;
        statePath: string;
        supabaseUrl: string;
        supabaseKey: string;
    };
    transportWebhookUrl: string;
    apiPort: number;
    githubTimeoutMs: number;
    maxCommitsPerDelivery: number;
    unreachableThreshold: number;
}

/** GitHub rate limit을 고려한 최소 폴링 간격 (초) */
export const MIN_CHECK_INTERVAL_SECONDS = 30;
export const DEFAULT_CHECK_INTERVAL_SECONDS = 60;

type Env = Record<string, string | undefined>;

/**
 * 필수 환경 변수 검증
 */
export function requireEnv(key: string, serviceName: string, source: Env = process.env): string {
    const value = source[key];
    if (!value) {
        throw new ConfigError(
            `[${serviceName}] 필수 환경 변수가 누락되었습니다: ${key}\n` +
            `서비스가 정상적으로 작동하려면 .env 파일에 ${key}를 설정해주세요.`
        );
    }
    return value;
}

/**
 * 선택적 환경 변수 (기본값 사용)
 */
export function getEnv(key: string, defaultValue: string = '', source: Env = process.env): string {
    return source[key] || defaultValue;
}

function getIntEnv(key: string, defaultValue: number, source: Env): number {
    const raw = source[key];
    if (!raw) return defaultValue;

    const value = Number(raw.trim());
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
    }
    return value;
}

/**
 * ADMIN_CHAT_IDS 파싱
 * '123,456' 또는 '[123,456]' 형식을 허용합니다.
 */
export function parseAdminIds(raw: string): string[] {
    let value = raw.trim();
    if (value.startsWith('[') && value.endsWith(']')) {
        value = value.slice(1, -1);
    }

    const ids = value.split(',').map(id => id.trim()).filter(id => id.length > 0);
    for (const id of ids) {
        if (!/^-?\d+$/.test(id)) {
            throw new ConfigError(
                `ADMIN_CHAT_IDS must be comma-separated integers! Example: '123,456,789' or '[123,456,789]'`
            );
        }
    }
    return ids;
}

function parseStorageBackend(raw: string): StorageBackend {
    if (raw === 'file' || raw === 'supabase' || raw === 'memory') {
        return raw;
    }
    throw new ConfigError(`STORAGE_BACKEND must be one of file, supabase, memory (got "${raw}")`);
}

/**
 * 환경 변수에서 전체 설정 로드
 */
export function loadConfig(source: Env = process.env): AppConfig {
    const botToken = requireEnv('BOT_TOKEN', 'Transport', source);
    const githubToken = requireEnv('GITHUB_TOKEN', 'GitHub', source);

    let checkIntervalSeconds = getIntEnv('CHECK_INTERVAL', DEFAULT_CHECK_INTERVAL_SECONDS, source);
    if (checkIntervalSeconds < MIN_CHECK_INTERVAL_SECONDS) {
        console.warn(
            `⚠️  CHECK_INTERVAL=${checkIntervalSeconds}s is below the minimum, using ${MIN_CHECK_INTERVAL_SECONDS}s`
        );
        checkIntervalSeconds = MIN_CHECK_INTERVAL_SECONDS;
    }

    const backend = parseStorageBackend(getEnv('STORAGE_BACKEND', 'file', source));
    const supabaseUrl = getEnv('SUPABASE_URL', '', source);
    const supabaseKey = getEnv('SUPABASE_SERVICE_ROLE_KEY', '', source);
    if (backend === 'supabase' && (!supabaseUrl || !supabaseKey)) {
        throw new ConfigError('STORAGE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
    }

    return {
        botToken,
        githubToken,
        adminIds: parseAdminIds(getEnv('ADMIN_CHAT_IDS', '', source)),
        checkIntervalSeconds,
        storage: {
            backend,
            statePath: getEnv('DATABASE_PATH', 'commit-watch-state.json', source),
            supabaseUrl,
            supabaseKey,
        },
        transportWebhookUrl: getEnv('TRANSPORT_WEBHOOK_URL', '', source),
        apiPort: getIntEnv('API_PORT', 3001, source),
        githubTimeoutMs: getIntEnv('GITHUB_TIMEOUT_MS', 15000, source),
        maxCommitsPerDelivery: getIntEnv('MAX_COMMITS_PER_DELIVERY', 5, source),
        unreachableThreshold: getIntEnv('UNREACHABLE_THRESHOLD', 3, source),
    };
}
