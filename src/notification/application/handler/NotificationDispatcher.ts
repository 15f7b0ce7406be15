import { injectAll, injectable } from 'tsyringe'
import type { NotificationDto } from '../domain/model/Notification'
import type { NotificationHandler } from './NotificationHandler'
import { NotificationHandlerToken } from './NotificationHandler'

/**
 * 配信された通知を、それを必要とする全ハンドラーに渡す
 *
 * ハンドラーは並列に実行し、失敗はログに記録する（他のハンドラーは止めない）。
 */
@injectable()
export class NotificationDispatcher {
    constructor(
        @injectAll(NotificationHandlerToken)
        private readonly handlers: NotificationHandler[]
    ) {}

    /**
     * @returns 成功したハンドラーの数
     */
    async dispatch(notification: NotificationDto): Promise<number> {
        const interested = this.handlers.filter((handler) => handler.wants(notification))

        if (interested.length === 0) {
            console.debug(`ℹ️  No handler wants notification ${String(notification.id)} (${notification.reason})`)
            return 0
        }

        const results = await Promise.allSettled(
            interested.map((handler) => handler.handle(notification))
        )

        let succeeded = 0
        results.forEach((result, index) => {
            if (result.status === 'fulfilled') {
                succeeded++
                return
            }
            console.error(
                `❌ ${interested[index].constructor.name} failed for notification ${String(notification.id)}:`,
                result.reason
            )
        })

        return succeeded
    }
}
