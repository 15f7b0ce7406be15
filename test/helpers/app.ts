import type { Hono } from 'hono'
import { loadBindings } from '../../src/config/bindings'
import { createApp } from '../../src/index'
import type { AppEnv } from '../../src/types/bindings'
import { TEST_JWT_SECRET, TEST_SSO_TOKEN } from './fixtures'

/**
 * インメモリアダプターで動くテスト用アプリ
 *
 * 呼び出し前に resetApplication() でコンテナを空にしておくこと。
 */
export function createTestApp(overrides: Record<string, string> = {}): Hono<AppEnv> {
    return createApp(
        loadBindings({
            JWT_SECRET: TEST_JWT_SECRET,
            SSO_EVENT_TOKEN: TEST_SSO_TOKEN,
            ...overrides,
        })
    )
}

/**
 * JSON ボディのリクエスト
 */
export function jsonRequest(
    method: string,
    body: unknown,
    headers: Record<string, string> = {}
): RequestInit {
    return {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
    }
}
