/**
 * DIコンテナ設定ファイル
 *
 * 【tsyringe の基本用語】
 * - Token: 依存オブジェクトを識別するためのキー（通常はSymbol）
 * - register: コンテナに「このTokenならこのクラス/値を使う」というルールを登録
 * - resolve / resolveAll: Tokenを指定して、対応するインスタンスを取得
 * - inject / injectAll: クラスのコンストラクタで、どの依存が必要かを宣言
 *
 * 出力ポートの実装は USE_SUPABASE で切り替える：
 * - USE_SUPABASE=true  → Supabase アダプター
 * - USE_SUPABASE=false → InMemory アダプター（シードデータ入り）
 */

import 'reflect-metadata' // tsyringe が必要とするメタデータ機能を有効化
import { createClient } from '@supabase/supabase-js'
import { container, instanceCachingFactory } from 'tsyringe'
import { EventBus } from '../common/event/EventBus'
import { LoggingEmailAdapter } from '../notification/adapter/out/email/LoggingEmailAdapter'
import { ResendEmailAdapter } from '../notification/adapter/out/email/ResendEmailAdapter'
import { AccountApprovalHandler } from '../notification/adapter/out/email/handlers/AccountApprovalHandler'
import { ApiSignupApprovalHandler } from '../notification/adapter/out/email/handlers/ApiSignupApprovalHandler'
import { InMemoryNotificationRepository } from '../notification/adapter/out/persistence/InMemoryNotificationRepository'
import { SupabaseNotificationRepository } from '../notification/adapter/out/persistence/SupabaseNotificationRepository'
import { NotificationDispatcher } from '../notification/application/handler/NotificationDispatcher'
import { NotificationHandlerToken } from '../notification/application/handler/NotificationHandler'
import { SendNotificationUseCaseToken } from '../notification/application/port/in/SendNotificationUseCase'
import type { EmailSenderPort } from '../notification/application/port/out/EmailSenderPort'
import { EmailSenderPortToken } from '../notification/application/port/out/EmailSenderPort'
import { NotificationRepositoryPortToken } from '../notification/application/port/out/NotificationRepositoryPort'
import { ApiSignupNotificationProducer } from '../notification/application/producer/ApiSignupNotificationProducer'
import { NewAccountNotificationProducer } from '../notification/application/producer/NewAccountNotificationProducer'
import { NotificationProducerToken } from '../notification/application/producer/NotificationProducer'
import { NotificationService } from '../notification/application/service/NotificationService'
import { InMemoryApiCatalogAdapter } from '../portal/adapter/out/persistence/InMemoryApiCatalogAdapter'
import { InMemoryOrganizationAdapter } from '../portal/adapter/out/persistence/InMemoryOrganizationAdapter'
import { SupabaseApiCatalogAdapter } from '../portal/adapter/out/persistence/SupabaseApiCatalogAdapter'
import { SupabaseOrganizationAdapter } from '../portal/adapter/out/persistence/SupabaseOrganizationAdapter'
import { ApiCatalogPortToken } from '../portal/application/port/out/ApiCatalogPort'
import { OrganizationPortToken } from '../portal/application/port/out/OrganizationPort'
import { ApiService } from '../portal/application/service/ApiService'
import { DevPortalService } from '../portal/application/service/DevPortalService'
import { OrganizationService } from '../portal/application/service/OrganizationService'
import { InMemoryUserDirectoryAdapter } from '../security/adapter/out/persistence/InMemoryUserDirectoryAdapter'
import { SupabaseUserDirectoryAdapter } from '../security/adapter/out/persistence/SupabaseUserDirectoryAdapter'
import { UserDirectoryPortToken } from '../security/application/port/out/UserDirectoryPort'
import { SsoEventProperties, SsoEventPropertiesToken } from '../sso/application/domain/model/SsoEventProperties'
import { SsoEventService } from '../sso/application/service/SsoEventService'
import type { AppBindings } from './bindings'
import type { DatabaseConfig, TypedSupabaseClient } from './types'
import { DatabaseConfigToken, EventBusToken, SupabaseClientToken } from './types'

// 初期化済みフラグ（複数回初期化を防ぐ）
let isInitialized = false

/**
 * DIコンテナの初期化と依存関係の登録
 *
 * 【処理の流れ】
 * 1. 設定オブジェクトの登録
 * 2. 永続化アダプター（InMemory または Supabase）の登録
 * 3. EventBus とメール送信アダプターの登録
 * 4. アプリケーションサービスの登録
 * 5. 通知プロデューサー・ハンドラーの登録
 *
 * イベントの購読は app-initializer.ts で各コンテキストが行う。
 */
export function setupContainer(bindings: AppBindings): void {
    // 既に初期化済みなら何もしない（冪等性の確保）
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing DI container...')

    // ========================================
    // 1. 設定オブジェクトの登録
    // ========================================


    container.register(SsoEventPropertiesToken, {
        useValue: new SsoEventProperties(bindings.EVENT_SOURCE_URL, bindings.ACCOUNT_APPROVAL_REQUIRED),
    })

    // ========================================
    // 2. 出力アダプター（永続化層）の登録
    // ========================================

    if (bindings.USE_SUPABASE && bindings.SUPABASE_URL && bindings.SUPABASE_PUBLISHABLE_KEY) {
        console.log('📦 Using Supabase adapters')

        const dbConfig: DatabaseConfig = {
            url: bindings.SUPABASE_URL,
            key: bindings.SUPABASE_PUBLISHABLE_KEY,
        }
        container.register(DatabaseConfigToken, { useValue: dbConfig })

        // クライアントは接続を共有するので1つだけ作る
        const supabaseClient = createClient(dbConfig.url, dbConfig.key, {
            auth: {
                persistSession: false, // サーバー側ではセッション永続化不要
            },
            global: {
                headers: {
                    'x-application-name': 'api-portal-manager',
                },
            },
        })
        container.register<TypedSupabaseClient>(SupabaseClientToken, { useValue: supabaseClient })

        container.registerSingleton(SupabaseApiCatalogAdapter, SupabaseApiCatalogAdapter)
        container.registerSingleton(SupabaseOrganizationAdapter, SupabaseOrganizationAdapter)
        container.registerSingleton(SupabaseNotificationRepository, SupabaseNotificationRepository)
        container.registerSingleton(SupabaseUserDirectoryAdapter, SupabaseUserDirectoryAdapter)

        // Port（インターフェース）と Adapter（実装）の紐付け
        container.register(ApiCatalogPortToken, { useToken: SupabaseApiCatalogAdapter })
        container.register(OrganizationPortToken, { useToken: SupabaseOrganizationAdapter })
        container.register(NotificationRepositoryPortToken, { useToken: SupabaseNotificationRepository })
        container.register(UserDirectoryPortToken, { useToken: SupabaseUserDirectoryAdapter })
    } else {
        console.log('💾 Using InMemory adapters')

        container.registerSingleton(InMemoryApiCatalogAdapter, InMemoryApiCatalogAdapter)
        container.registerSingleton(InMemoryOrganizationAdapter, InMemoryOrganizationAdapter)
        container.registerSingleton(InMemoryNotificationRepository, InMemoryNotificationRepository)
        container.registerSingleton(InMemoryUserDirectoryAdapter, InMemoryUserDirectoryAdapter)

        container.register(ApiCatalogPortToken, { useToken: InMemoryApiCatalogAdapter })
        container.register(OrganizationPortToken, { useToken: InMemoryOrganizationAdapter })
        container.register(NotificationRepositoryPortToken, { useToken: InMemoryNotificationRepository })
        container.register(UserDirectoryPortToken, { useToken: InMemoryUserDirectoryAdapter })
    }

    // ========================================
    // 3. EventBus・メール送信
    // ========================================

    container.register(EventBusToken, { useValue: new EventBus() })

    // API キーがなければログに出すだけの送信アダプターを使う
    const { RESEND_API_KEY: resendApiKey, EMAIL_FROM: emailFrom } = bindings
    container.register<EmailSenderPort>(EmailSenderPortToken, {
        useFactory: instanceCachingFactory<EmailSenderPort>(() =>
            resendApiKey ? new ResendEmailAdapter(resendApiKey, emailFrom) : new LoggingEmailAdapter()
        ),
    })

    // ========================================
    // 4. アプリケーションサービス
    // ========================================

    container.registerSingleton(ApiService, ApiService)
    container.registerSingleton(DevPortalService, DevPortalService)
    container.registerSingleton(OrganizationService, OrganizationService)
    container.registerSingleton(SsoEventService, SsoEventService)

    container.registerSingleton(NotificationService, NotificationService)
    container.register(SendNotificationUseCaseToken, { useToken: NotificationService })

    // ========================================
    // 5. 通知プロデューサー・ハンドラー
    // ========================================

    /**
     * 同じトークンに複数登録し、resolveAll / injectAll でまとめて取得する。
     * プロデューサーやハンドラーを増やす場合はここに1行足すだけでよい。
     */
    container.register(NotificationProducerToken, { useClass: NewAccountNotificationProducer })
    container.register(NotificationProducerToken, { useClass: ApiSignupNotificationProducer })

    container.register(NotificationHandlerToken, { useClass: AccountApprovalHandler })
    container.register(NotificationHandlerToken, { useClass: ApiSignupApprovalHandler })

    container.registerSingleton(NotificationDispatcher, NotificationDispatcher)

    isInitialized = true
    console.log(`✅ DI container initialized (Supabase: ${bindings.USE_SUPABASE ? 'enabled' : 'disabled'})`)
}

/**
 * コンテナをリセット（主にテスト用）
 *
 * 登録ごと消すので、次の setupContainer() で登録し直される。
 */
export function resetContainer(): void {
    container.reset()
    isInitialized = false
    console.log('🔄 DI container reset')
}

export { container }
