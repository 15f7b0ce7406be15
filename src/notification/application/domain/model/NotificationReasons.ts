/**
 * 通知の reason（ハンドラーが購読するタグ）
 */
export const ACCOUNT_APPROVAL_REQUEST = 'account.approval.request'

export const API_APPROVAL_REQUEST = 'api.approval.request'
