import { zValidator } from '@hono/zod-validator'
import { Hono } from 'hono'
import { container } from 'tsyringe'
import { toErrorResponse, toErrorWebResponse, validationHook } from '../../../../common/adapter/in/web/ErrorMapper'
import { PagingSchema } from '../../../../common/search/Paging'
import { requireLogin } from '../../../../security/adapter/in/web/authenticate'
import type { AppEnv } from '../../../../types/bindings'
import { NotificationService } from '../../../application/service/NotificationService'
import { MarkNotificationsWebRequestSchema } from './models/MarkNotificationsWebRequest'

/**
 * ログイン中ユーザーの通知を扱うルーター
 *
 * 全ルートでログインが必要。他人の通知には触れない。
 */
export const notificationRouter = new Hono<AppEnv>()

notificationRouter.use('/notifications/*', requireLogin)

/**
 * GET /api/notifications?page=1&pageSize=20
 * 未読通知を新しい順に返す
 */
notificationRouter.get(
    '/notifications',
    zValidator('query', PagingSchema, validationHook),
    async (c): Promise<Response> => {
        try {
            const currentUser = c.get('securityContext').requireCurrentUser()
            const paging = c.req.valid('query')

            const results = await container
                .resolve(NotificationService)
                .getLatestNotifications(currentUser, paging)
            return c.json(results, 200)
        } catch (error) {
            return toErrorWebResponse(c, error)
        }
    }
)

/**
 * GET /api/notifications/count
 */
notificationRouter.get('/notifications/count', async (c): Promise<Response> => {
    try {
        const currentUser = c.get('securityContext').requireCurrentUser()
        const count = await container.resolve(NotificationService).unreadNotifications(currentUser)
        return c.json({ count }, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * PUT /api/notifications
 * 指定した通知を既読（USER_DISMISSED など）にする
 */
notificationRouter.put(
    '/notifications',
    zValidator('json', MarkNotificationsWebRequestSchema, validationHook),
    async (c): Promise<Response> => {
        try {
            const currentUser = c.get('securityContext').requireCurrentUser()
            const request = c.req.valid('json')

            await container
                .resolve(NotificationService)
                .markNotificationsAsRead(currentUser, request.notificationIds, request.status)
            return c.body(null, 204)
        } catch (error) {
            return toErrorWebResponse(c, error)
        }
    }
)

/**
 * GET /api/notifications/preferences/:type
 */
notificationRouter.get('/notifications/preferences/:type', async (c): Promise<Response> => {
    try {
        const currentUser = c.get('securityContext').requireCurrentUser()
        const type = c.req.param('type')

        const preference = await container
            .resolve(NotificationService)
            .getNotificationPreference(currentUser, type)

        if (!preference) {
            return c.json(
                toErrorResponse(`Notification preference not found: ${type}`, 'NOTIFICATION_PREFERENCE_NOT_FOUND', {
                    type,
                }),
                404
            )
        }

        return c.json(preference, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})
