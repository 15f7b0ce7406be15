/**
 * API 利用申請のレスポンス
 */
export interface ApiSignupWebResponse {
    success: true
    message: string
    data: {
        organizationId: string
        apiId: string
        version: string
        planId: string
        approvalRequired: boolean
    }
}
