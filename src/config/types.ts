import type { SupabaseClient } from '@supabase/supabase-js'

/**
 * データベース接続設定
 */
export interface DatabaseConfig {
    url: string
    key: string
}

/**
 * Supabase クライアント
 *
 * テーブルの行は各アダプターで zod により検証してからドメインに変換する。
 */
export type TypedSupabaseClient = SupabaseClient

/**
 * DI用のトークン
 */
export const DatabaseConfigToken = Symbol('DatabaseConfig')
export const SupabaseClientToken = Symbol('SupabaseClient')

export const EventBusToken = Symbol('EventBus')
