/**
 * Supabase 테이블 마이그레이션
 * 테이블이 없을 때 exec_sql 함수를 통해 생성을 시도합니다.
 */
import fs from 'fs';
import { fileURLToPath } from 'url';
import type { SupabaseClient } from '@supabase/supabase-js';
import { errorMessage } from '../../shared/errors.js';
import { CURSORS_TABLE, SUBSCRIPTIONS_TABLE } from './supabaseStateStore.js';

const SCHEMA_PATH = fileURLToPath(new URL('../../../supabase/schema.sql', import.meta.url));

/**
 * 테이블 스키마 SQL 반환 (사용자 안내용)
 */
export function getSchemaSQL(): string {
    return fs.readFileSync(SCHEMA_PATH, 'utf-8');
}

/**
 * 테이블 존재 여부 확인
 */
export async function checkTableExists(client: SupabaseClient, tableName: string): Promise<boolean> {
    try {
        const { error } = await client
            .from(tableName)
            .select('*', { count: 'exact', head: true })
            .limit(1);

        // PGRST205는 테이블이 없다는 의미
        if (error && (error.code === 'PGRST205' || error.message?.includes('does not exist'))) {
            return false;
        }

        return !error;
    } catch {
        return false;
    }
}

export interface MigrationStatus {
    subscriptions: boolean;
    repository_cursors: boolean;
    allTablesExist: boolean;
}

export async function getMigrationStatus(client: SupabaseClient): Promise<MigrationStatus> {
    const subscriptions = await checkTableExists(client, SUBSCRIPTIONS_TABLE);
    const repositoryCursors = await checkTableExists(client, CURSORS_TABLE);

    return {
        subscriptions,
        repository_cursors: repositoryCursors,
        allTablesExist: subscriptions && repositoryCursors,
    };
}

/**
 * 자동 마이그레이션 실행 (테이블이 없을 때 시작 시 호출)
 * exec_sql 함수가 먼저 생성되어 있어야 합니다.
 */
export async function ensureTablesExist(client: SupabaseClient): Promise<boolean> {
    const status = await getMigrationStatus(client);
    if (status.allTablesExist) {
        return true;
    }

    console.log('📋 테이블이 없습니다. 자동 마이그레이션을 시도합니다...');

    try {
        const { error } = await client.rpc('exec_sql', { sql_query: getSchemaSQL() });
        if (error) {
            console.warn('⚠️ 자동 마이그레이션 실패:', error.message);
            console.warn(`   Supabase SQL Editor에서 ${SCHEMA_PATH}를 실행하세요.`);
            return false;
        }
    } catch (error) {
        console.warn('⚠️ 자동 마이그레이션 오류:', errorMessage(error));
        return false;
    }

    console.log('✅ 자동 마이그레이션 성공');
    return true;
}
