/**
 * 組織作成リクエスト
 */
export interface NewOrganization {
    name: string
    description?: string
}

/**
 * 組織
 */
export interface Organization {
    id: string
    name: string
    description: string
    createdBy: string
    createdOn: Date
}

/**
 * 組織名から ID を作る
 *
 * 英数字と `-` `_` `.` 以外の文字を取り除く。
 *
 * @example
 * organizationIdFromName('Acme Corp!') // 'AcmeCorp'
 */
export function organizationIdFromName(name: string): string {
    return name.replace(/[^A-Za-z0-9\-_.]/g, '')
}
