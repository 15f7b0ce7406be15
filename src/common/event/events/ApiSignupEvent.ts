import { randomUUID } from 'node:crypto'
import type { DomainEvent } from '../DomainEvent'

export interface ApiSignupDetails {
    organizationId: string
    apiId: string
    apiVersion: string
    planId: string
    planVersion: string
    requestedBy: string
    approvalRequired: boolean
}

/**
 * API 利用申請イベント
 *
 * 【いつ発行されるか】
 * 開発者がポータルから API プランへの利用を申請した時（DevPortalService）
 *
 * 【誰が購読するか】
 * - ApiSignupNotificationProducer: 承認が必要なら API 承認者に通知する
 */
export class ApiSignupEvent implements DomainEvent {
    static readonly TYPE = 'ApiSignup'

    readonly eventId: string
    readonly occurredOn: Date
    readonly eventType = ApiSignupEvent.TYPE

    readonly organizationId: string
    readonly apiId: string
    readonly apiVersion: string
    readonly planId: string
    readonly planVersion: string
    readonly requestedBy: string
    readonly approvalRequired: boolean

    constructor(details: ApiSignupDetails) {
        this.eventId = randomUUID()
        this.occurredOn = new Date()
        this.organizationId = details.organizationId
        this.apiId = details.apiId
        this.apiVersion = details.apiVersion
        this.planId = details.planId
        this.planVersion = details.planVersion
        this.requestedBy = details.requestedBy
        this.approvalRequired = details.approvalRequired
    }
}
