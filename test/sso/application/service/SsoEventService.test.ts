import 'reflect-metadata'

import { beforeEach, describe, expect, it } from 'vitest'
import { EventBus } from '../../../../src/common/event/EventBus'
import { AccountSignupEvent } from '../../../../src/common/event/events/AccountSignupEvent'
import { SsoEventProperties } from '../../../../src/sso/application/domain/model/SsoEventProperties'
import { SSO_NEW_ACCOUNT_SUBJECT, SsoEventService } from '../../../../src/sso/application/service/SsoEventService'

describe('SsoEventService', () => {
    let eventBus: EventBus
    let received: AccountSignupEvent[]

    beforeEach(() => {
        eventBus = new EventBus()
        received = []
        eventBus.subscribe<AccountSignupEvent>(AccountSignupEvent.TYPE, (event) => {
            received.push(event)
            return Promise.resolve()
        })
    })

    it('新規アカウントを AccountSignupEvent として発行すること', async () => {
        const service = new SsoEventService(eventBus, new SsoEventProperties('http://localhost/api', true))
        const time = new Date('2024-05-01T10:00:00Z')

        const event = await service.newAccountCreated({
            userId: 'u-100',
            username: 'carol',
            emailAddress: 'carol@example.com',
            firstName: 'Carol',
            surname: 'Smith',
            time,
        })

        expect(received).toEqual([event])
        expect(event.eventId).toBe('u-100-2024-05-01T10:00:00.000Z')
        expect(event.headers).toEqual({
            id: 'u-100-2024-05-01T10:00:00.000Z',
            source: 'http://localhost/api',
            subject: SSO_NEW_ACCOUNT_SUBJECT,
            time,
        })
        expect(event.approvalRequired).toBe(true)
    })

    it('承認の要否は設定に従うこと', async () => {
        const service = new SsoEventService(eventBus, new SsoEventProperties('http://localhost/api', false))

        const event = await service.newAccountCreated({
            userId: 'u-101',
            username: 'dave',
            emailAddress: null,
            firstName: null,
            surname: null,
            time: new Date('2024-05-02T00:00:00Z'),
        })

        expect(event.approvalRequired).toBe(false)
        expect(event.occurredOn).toEqual(new Date('2024-05-02T00:00:00Z'))
    })
})
