/**
 * SSO から届く「新規アカウント作成」通知
 */
export interface NewAccountCreated {
    userId: string
    username: string
    emailAddress: string | null
    firstName: string | null
    surname: string | null
    /** アカウントの作成日時 */
    time: Date
}
