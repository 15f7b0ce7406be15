import { inject, injectable } from 'tsyringe'
import type { EventBus } from '../../../common/event/EventBus'
import { AccountSignupEvent } from '../../../common/event/events/AccountSignupEvent'
import { EventBusToken } from '../../../config/types'
import type { NewAccountCreated } from '../domain/model/NewAccountCreated'
import { SsoEventProperties, SsoEventPropertiesToken } from '../domain/model/SsoEventProperties'

export const SSO_NEW_ACCOUNT_SUBJECT = 'SsoNewAccount'

/**
 * SSO から届いたイベントをドメインイベントに変換して発行する
 */
@injectable()
export class SsoEventService {
    constructor(
        @inject(EventBusToken)
        private readonly eventBus: EventBus,
        @inject(SsoEventPropertiesToken)
        private readonly properties: SsoEventProperties
    ) {}

    /**
     * 新規アカウント作成を AccountSignupEvent として発行する
     *
     * イベント ID は `<userId>-<作成日時>` なので、同じ通知の再送は同じ ID になる。
     */
    async newAccountCreated(newAccount: NewAccountCreated): Promise<AccountSignupEvent> {
        console.debug(`📥 Received an account creation event (externally): ${newAccount.username}`)

        const event = new AccountSignupEvent({
            headers: {
                id: `${newAccount.userId}-${newAccount.time.toISOString()}`,
                source: this.properties.eventSource,
                subject: SSO_NEW_ACCOUNT_SUBJECT,
                time: newAccount.time,
            },
            userId: newAccount.userId,
            username: newAccount.username,
            emailAddress: newAccount.emailAddress,
            firstName: newAccount.firstName,
            surname: newAccount.surname,
            approvalRequired: this.properties.accountApprovalRequired,
        })

        await this.eventBus.publish(event)
        return event
    }
}
