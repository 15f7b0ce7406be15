/**
 * SSO イベント受信の設定プロパティ
 */
export class SsoEventProperties {
    constructor(
        /** 発行するイベントの source */
        public readonly eventSource: string,
        /** 新規アカウントに承認が必要か */
        public readonly accountApprovalRequired: boolean
    ) {}
}

/**
 * DI用のシンボル
 */
export const SsoEventPropertiesToken = Symbol('SsoEventProperties')
