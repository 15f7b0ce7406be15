import { zValidator } from '@hono/zod-validator'
import { Hono } from 'hono'
import { bearerAuth } from 'hono/bearer-auth'
import { container } from 'tsyringe'
import { toErrorWebResponse, validationHook } from '../../../../common/adapter/in/web/ErrorMapper'
import type { AppEnv } from '../../../../types/bindings'
import type { NewAccountCreated } from '../../../application/domain/model/NewAccountCreated'
import { SsoEventService } from '../../../application/service/SsoEventService'
import type { NewAccountCreatedWebRequest } from './models/NewAccountCreatedWebRequest'
import { NewAccountCreatedWebRequestSchema } from './models/NewAccountCreatedWebRequest'

function toNewAccountCreated(request: NewAccountCreatedWebRequest): NewAccountCreated {
    return {
        userId: request.userId,
        username: request.username,
        emailAddress: request.emailAddress ?? null,
        firstName: request.firstName ?? null,
        surname: request.surname ?? null,
        time: new Date(request.time),
    }
}

/**
 * SSO からのイベントを受け付けるルーター
 *
 * SSO 側と共有したトークン（SSO_EVENT_TOKEN）で保護する。
 */
export function createSsoEventRouter(token: string): Hono<AppEnv> {
    const router = new Hono<AppEnv>()

    router.use('/events/sso/*', bearerAuth({ token }))

    /**
     * POST /api/events/sso/new-account
     */
    router.post(
        '/events/sso/new-account',
        zValidator('json', NewAccountCreatedWebRequestSchema, validationHook),
        async (c): Promise<Response> => {
            try {
                const request = c.req.valid('json')
                const ssoEventService = container.resolve(SsoEventService)

                const event = await ssoEventService.newAccountCreated(toNewAccountCreated(request))

                return c.json({ eventId: event.eventId }, 202)
            } catch (error) {
                return toErrorWebResponse(c, error)
            }
        }
    )

    return router
}
