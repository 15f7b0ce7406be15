import { container } from 'tsyringe'
import type { EventBus } from '../common/event/EventBus'
import { setupNotificationContext } from '../notification/config/setup'
import type { AppBindings } from './bindings'
import { resetContainer, setupContainer } from './container'
import { EventBusToken } from './types'

/**
 * アプリケーション全体の初期化
 *
 * 【責務】
 * 1. DIコンテナの設定（setupContainer）
 * 2. 各コンテキストの初期化（setupXxxContext）
 */

let isInitialized = false

export function initializeApplication(bindings: AppBindings): void {
    if (isInitialized) {
        return
    }

    console.log('🚀 Initializing application...')

    // ① DIコンテナの設定
    setupContainer(bindings)

    // ② EventBusを取得
    const eventBus = container.resolve<EventBus>(EventBusToken)

    // ③ 各コンテキストの初期化
    setupNotificationContext(eventBus, container)

    isInitialized = true
    console.log('✅ Application initialized')
}

/**
 * 初期化状態とコンテナを破棄する（主にテスト用）
 */
export function resetApplication(): void {
    resetContainer()
    isInitialized = false
    console.log('🔄 Application reset')
}
