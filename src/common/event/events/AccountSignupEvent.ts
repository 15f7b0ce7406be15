import type { DomainEvent } from '../DomainEvent'

/**
 * 外部から受け取ったイベントのヘッダー
 */
export interface EventHeaders {
    id: string
    source: string
    subject: string
    time: Date
}

export interface AccountSignupDetails {
    headers: EventHeaders
    userId: string
    username: string
    emailAddress: string | null
    firstName: string | null
    surname: string | null
    approvalRequired: boolean
}

/**
 * アカウント登録イベント
 *
 * 【いつ発行されるか】
 * SSO から新規アカウント作成の通知を受けた時（SsoEventService）
 *
 * 【誰が購読するか】
 * - NewAccountNotificationProducer: 承認が必要なら承認者に通知する
 */
export class AccountSignupEvent implements DomainEvent {
    static readonly TYPE = 'AccountSignup'

    readonly eventId: string
    readonly occurredOn: Date
    readonly eventType = AccountSignupEvent.TYPE

    readonly headers: EventHeaders
    readonly userId: string
    readonly username: string
    readonly emailAddress: string | null
    readonly firstName: string | null
    readonly surname: string | null
    readonly approvalRequired: boolean

    constructor(details: AccountSignupDetails) {
        this.eventId = details.headers.id
        this.occurredOn = details.headers.time
        this.headers = details.headers
        this.userId = details.userId
        this.username = details.username
        this.emailAddress = details.emailAddress
        this.firstName = details.firstName
        this.surname = details.surname
        this.approvalRequired = details.approvalRequired
    }
}
